import { AuditLogger } from './audit.js';
import { loadEngineConfig, type EngineConfig } from './config.js';
import { DatabaseConnection } from './db/database.js';
import { createLogger, type Logger } from './logger.js';
import { MemoryStore } from './store/memory.js';
import { SqliteStore } from './store/sqlite.js';
import type { EngineStore } from './store/types.js';
import type { ModeratorState, NodeContent } from './types.js';
import { WorkflowOrchestrator, type ApproveOptions, type WorkflowOptions } from './workflow.js';

/**
 * The four operations the surrounding application calls. Failures surface as
 * EngineError subclasses; `errorStatus(err.kind)` maps them to a status code.
 */
export class ModerationEngine {
  readonly workflow: WorkflowOrchestrator;

  constructor(options: WorkflowOptions | WorkflowOrchestrator = {}) {
    this.workflow = options instanceof WorkflowOrchestrator ? options : new WorkflowOrchestrator(options);
  }

  create(actorId: string, parentNodeId: string | null, content: NodeContent): string {
    return this.workflow.createNode(actorId, parentNodeId, content).id;
  }

  requestPublish(actorId: string, nodeId: string): ModeratorState {
    return this.workflow.requestPublish(actorId, nodeId).moderatorState;
  }

  approve(actorId: string, nodeId: string, options: ApproveOptions = {}): ModeratorState {
    return this.workflow.approve(actorId, nodeId, options).moderatorState;
  }

  copy(actorId: string, sourceNodeId: string, targetParentId: string | null): string {
    return this.workflow.copySubtree(actorId, sourceNodeId, targetParentId).id;
  }
}

export interface EngineRuntime {
  engine: ModerationEngine;
  store: EngineStore;
  logger: Logger;
  close(): void;
}

/** Wires an engine from configuration (environment by default). */
export function createEngine(config: EngineConfig = loadEngineConfig()): EngineRuntime {
  const logger = createLogger(config);
  if (config.storage === 'sqlite') {
    const connection = new DatabaseConnection(config.dbPath);
    const store = new SqliteStore(connection);
    const audit = new AuditLogger({ db: connection });
    logger.info({ dbPath: config.dbPath }, 'engine using sqlite store');
    return {
      engine: new ModerationEngine({ store, config, logger, audit }),
      store,
      logger,
      close: () => connection.close(),
    };
  }
  const store = new MemoryStore();
  return {
    engine: new ModerationEngine({ store, config, logger, audit: new AuditLogger() }),
    store,
    logger,
    close: () => undefined,
  };
}
