export type ErrorKind = 'PermissionDenied' | 'InvalidStateTransition' | 'AncestorNotPublic' | 'NotFound' | 'InvalidInput';

export class EngineError extends Error {
  readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }
}

export class PermissionDenied extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('PermissionDenied', message, details);
  }
}

export class InvalidStateTransition extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('InvalidStateTransition', message, details);
  }
}

/**
 * Raised when a node is materialized while an ancestor has no public
 * counterpart. The state machine never lets it escape an approval: a blocked
 * node parks in APPROVED_WAITING_FOR_PARENTS instead.
 */
export class AncestorNotPublic extends EngineError {
  constructor(nodeId: string, blockingAncestorId: string) {
    super('AncestorNotPublic', `Node ${nodeId} is blocked by unpublished ancestor ${blockingAncestorId}`, {
      nodeId,
      blockingAncestorId,
    });
  }
}

export class NotFound extends EngineError {
  constructor(entity: 'node' | 'user' | 'grant', id: string) {
    super('NotFound', `${entity} not found: ${id}`, { entity, id });
  }
}

export class InvalidInput extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('InvalidInput', message, details);
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

const statusByKind: Record<ErrorKind, number> = {
  PermissionDenied: 403,
  InvalidStateTransition: 409,
  AncestorNotPublic: 409,
  NotFound: 404,
  InvalidInput: 400,
};

/** Transport status a caller should map an engine failure to. */
export function errorStatus(kind: ErrorKind): number {
  return statusByKind[kind];
}
