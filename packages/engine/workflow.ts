import { v4 as uuidv4 } from 'uuid';
import { AuditLogger, type AuditDetails, type AuditEventType } from './audit.js';
import { defaultEngineConfig, type EngineConfig } from './config.js';
import { InvalidInput, InvalidStateTransition, NotFound, PermissionDenied, isEngineError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { recordOperation, recordPermissionDenied } from './metrics.js';
import { ModerationStateMachine, type ApproveOptions } from './moderation.js';
import { PermissionResolver } from './permissions.js';
import { PublicationPropagator } from './publication.js';
import { GrantInputSchema, NodeContentSchema, UserSchema, formatIssues, type GrantInput } from './schemas.js';
import { MemoryStore } from './store/memory.js';
import type { EngineStore } from './store/types.js';
import { withSpan } from './tracing.js';
import { TreeNavigator } from './tree.js';
import type { Capability, InsertPosition, Node, NodeContent, PermissionGrant, PublicCounterpart, User } from './types.js';

export interface WorkflowOptions {
  store?: EngineStore;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  audit?: AuditLogger;
}

export interface CreateOptions {
  position?: InsertPosition;
  /** Request publication as part of the same operation. */
  publish?: boolean;
}

export interface EditOptions {
  publish?: boolean;
}

export interface CopyOptions {
  position?: InsertPosition;
  copyPermissions?: boolean;
  copyModeration?: boolean;
}

export type { ApproveOptions };

interface OperationContext {
  actor: User;
  tree: TreeNavigator;
  permissions: PermissionResolver;
  publication: PublicationPropagator;
  moderation: ModerationStateMachine;
}

interface PendingEvent {
  type: AuditEventType;
  details: AuditDetails;
}

function insertChild(parent: Node, childId: string, position: InsertPosition): void {
  if (position === 'first-child') {
    parent.childIds.unshift(childId);
  } else {
    parent.childIds.push(childId);
  }
}

/**
 * Entry point for every mutating operation. Each call checks the actor's
 * permissions, then runs as one store transaction: audit events are only
 * written once it commits.
 */
export class WorkflowOrchestrator {
  readonly config: EngineConfig;
  readonly store: EngineStore;
  readonly audit: AuditLogger;
  private readonly log: Logger;

  constructor(options: WorkflowOptions = {}) {
    this.config = { ...defaultEngineConfig, ...options.config };
    this.store = options.store ?? new MemoryStore();
    this.audit = options.audit ?? new AuditLogger();
    this.log = (options.logger ?? createLogger(this.config)).child({ component: 'workflow' });
  }

  registerUser(input: Partial<User> & { id: string }): User {
    const parsed = UserSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInput('Invalid user', { issues: formatIssues(parsed.error) });
    }
    const user: User = parsed.data;
    this.store.transaction(() => this.store.putUser(user));
    return user;
  }

  getNode(id: string): Node {
    return new TreeNavigator(this.store).get(id);
  }

  getPublic(id: string): PublicCounterpart | null {
    return this.store.getPublic(id) ?? null;
  }

  children(id: string): Node[] {
    const tree = new TreeNavigator(this.store);
    return tree.children(tree.get(id));
  }

  moderatorCount(nodeId: string): number {
    const tree = new TreeNavigator(this.store);
    return new PermissionResolver(tree, this.store.listGrants()).moderatorCount(tree.get(nodeId));
  }

  canPerform(userId: string, nodeId: string | null, capability: Capability): boolean {
    const tree = new TreeNavigator(this.store);
    const user = this.loadUser(userId);
    const node = nodeId === null ? null : tree.get(nodeId);
    return new PermissionResolver(tree, this.store.listGrants()).canPerform(user, node, capability);
  }

  createNode(actorId: string, parentId: string | null, content: NodeContent, options: CreateOptions = {}): Node {
    const { title } = this.parseContent(content);
    return this.run('create', actorId, (ctx, emit) => {
      const parent = parentId === null ? null : ctx.tree.get(parentId);
      this.requireAddChild(ctx, parent);

      const now = new Date().toISOString();
      const node: Node = {
        id: uuidv4(),
        parentId: parent ? parent.id : null,
        childIds: [],
        treeId: parent ? parent.treeId : this.nextTreeId(ctx.tree),
        title,
        moderatorState: 'CHANGED',
        publicId: null,
        signOffs: [],
        version: 1,
        revision: 1,
        createdBy: ctx.actor.id,
        createdAt: now,
        updatedAt: now,
      };
      this.store.putNode(node);
      if (parent) {
        insertChild(parent, node.id, options.position ?? 'last-child');
        this.store.putNode(parent);
      }
      emit('node.created', { userId: ctx.actor.id, nodeId: node.id, data: { parentId: node.parentId } });
      ctx.publication.syncStructure();

      if (options.publish) {
        return ctx.moderation.requestPublish(node);
      }
      return node;
    });
  }

  editNode(actorId: string, nodeId: string, content: NodeContent, options: EditOptions = {}): Node {
    const { title } = this.parseContent(content);
    return this.run('edit', actorId, (ctx, emit) => {
      const node = ctx.tree.get(nodeId);
      this.require(ctx, node, 'change');

      node.title = title;
      node.revision += 1;
      if (this.config.retractionPolicy === 'retract' && node.publicId !== null) {
        ctx.moderation.retract(node);
      }
      ctx.moderation.markChanged(node);
      emit('node.edited', { userId: ctx.actor.id, nodeId: node.id, data: { revision: node.revision } });

      if (options.publish) {
        return ctx.moderation.requestPublish(node);
      }
      return node;
    });
  }

  requestPublish(actorId: string, nodeId: string): Node {
    return this.run('requestPublish', actorId, ctx => {
      const node = ctx.tree.get(nodeId);
      if (!ctx.permissions.canPerform(ctx.actor, node, 'publish')) {
        this.require(ctx, node, 'change');
      }
      return ctx.moderation.requestPublish(node);
    });
  }

  approve(actorId: string, nodeId: string, options: ApproveOptions = {}): Node {
    return this.run('approve', actorId, ctx => ctx.moderation.approve(ctx.tree.get(nodeId), ctx.actor, options));
  }

  /**
   * Deep-copies `sourceId`'s subtree under `targetParentId`. Copies start
   * CHANGED with no public counterpart; grants anchored inside the subtree
   * come along unless the copy options leave them out.
   */
  copySubtree(actorId: string, sourceId: string, targetParentId: string | null, options: CopyOptions = {}): Node {
    const copyPermissions = options.copyPermissions ?? true;
    const copyModeration = options.copyModeration ?? true;

    return this.run('copy', actorId, (ctx, emit) => {
      const source = ctx.tree.get(sourceId);
      const target = targetParentId === null ? null : ctx.tree.get(targetParentId);
      if (target && (target.id === source.id || ctx.tree.isDescendantOf(target, source))) {
        throw new InvalidStateTransition(`Cannot copy node ${source.id} into its own subtree`, {
          sourceId: source.id,
          targetId: target.id,
        });
      }
      this.require(ctx, source, 'change');
      this.requireAddChild(ctx, target);

      const originals = [source, ...ctx.tree.descendants(source)];
      const idMap = new Map(originals.map(original => [original.id, uuidv4()] as const));
      const mapId = (id: string): string => {
        const mapped = idMap.get(id);
        if (!mapped) throw new NotFound('node', id);
        return mapped;
      };
      const copiedParentId = (original: Node): string | null => {
        if (original.id === source.id) return target ? target.id : null;
        return original.parentId === null ? null : mapId(original.parentId);
      };

      const treeId = target ? target.treeId : this.nextTreeId(ctx.tree);
      const now = new Date().toISOString();
      for (const original of originals) {
        this.store.putNode({
          id: mapId(original.id),
          parentId: copiedParentId(original),
          childIds: original.childIds.map(mapId),
          treeId,
          title: original.title,
          moderatorState: 'CHANGED',
          publicId: null,
          signOffs: [],
          version: 1,
          revision: 1,
          createdBy: ctx.actor.id,
          createdAt: now,
          updatedAt: now,
        });
      }
      const copyRootId = mapId(source.id);
      if (target) {
        insertChild(target, copyRootId, options.position ?? 'last-child');
        this.store.putNode(target);
      }

      let grantsCopied = 0;
      for (const grant of this.store.listGrants()) {
        if (grant.nodeId === null || !idMap.has(grant.nodeId)) continue;
        const copy: PermissionGrant = {
          ...grant,
          id: uuidv4(),
          nodeId: mapId(grant.nodeId),
          capabilities: copyPermissions ? [...grant.capabilities] : [],
          moderate: copyModeration && grant.moderate,
        };
        if (!copy.moderate && copy.capabilities.length === 0) continue;
        this.store.putGrant(copy);
        grantsCopied++;
      }

      ctx.publication.syncStructure();
      emit('node.copied', {
        userId: ctx.actor.id,
        nodeId: copyRootId,
        data: { sourceId: source.id, targetId: target ? target.id : null, nodes: originals.length, grants: grantsCopied },
      });
      return ctx.tree.get(copyRootId);
    });
  }

  deleteNode(actorId: string, nodeId: string): void {
    this.run('delete', actorId, (ctx, emit) => {
      const node = ctx.tree.get(nodeId);
      this.require(ctx, node, 'delete');

      const doomed = [node, ...ctx.tree.descendants(node)];
      const doomedIds = new Set(doomed.map(member => member.id));
      for (const grant of this.store.listGrants()) {
        if (grant.nodeId !== null && doomedIds.has(grant.nodeId)) {
          this.store.removeGrant(grant.id);
        }
      }
      for (const member of doomed.reverse()) {
        if (member.publicId !== null) {
          this.store.removePublic(member.publicId);
        }
        this.store.removeNode(member.id);
      }
      const parent = ctx.tree.parent(node);
      if (parent) {
        parent.childIds = parent.childIds.filter(id => id !== node.id);
        this.store.putNode(parent);
      }
      ctx.publication.syncStructure();
      emit('node.deleted', { userId: ctx.actor.id, nodeId: node.id, data: { removed: doomedIds.size } });
    });
  }

  grantPermission(actorId: string, input: GrantInput): PermissionGrant {
    const parsed = GrantInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInput('Invalid permission grant', { issues: formatIssues(parsed.error) });
    }
    return this.run('grant', actorId, (ctx, emit) => {
      this.requireSuperuser(ctx);
      this.loadUser(parsed.data.userId);
      if (parsed.data.nodeId !== null) {
        ctx.tree.get(parsed.data.nodeId);
      }
      const grant: PermissionGrant = { id: uuidv4(), ...parsed.data };
      this.store.putGrant(grant);
      emit('grant.created', {
        userId: ctx.actor.id,
        nodeId: grant.nodeId ?? undefined,
        data: { grantId: grant.id, grantee: grant.userId, capabilities: grant.capabilities, moderate: grant.moderate },
      });
      return grant;
    });
  }

  revokePermission(actorId: string, grantId: string): void {
    this.run('revoke', actorId, (ctx, emit) => {
      this.requireSuperuser(ctx);
      const grant = this.store.listGrants().find(candidate => candidate.id === grantId);
      if (!grant) {
        throw new NotFound('grant', grantId);
      }
      this.store.removeGrant(grant.id);
      emit('grant.revoked', { userId: ctx.actor.id, nodeId: grant.nodeId ?? undefined, data: { grantId } });
    });
  }

  private run<T>(
    operation: string,
    actorId: string,
    fn: (ctx: OperationContext, emit: (type: AuditEventType, details: AuditDetails) => void) => T,
  ): T {
    const started = Date.now();
    const pending: PendingEvent[] = [];
    const emit = (type: AuditEventType, details: AuditDetails) => {
      pending.push({ type, details });
    };

    try {
      const result = withSpan(`canopy.${operation}`, { operation, actor: actorId }, () =>
        this.store.transaction(() => fn(this.context(actorId, emit), emit)),
      );
      if (this.config.auditEnabled) {
        for (const event of pending) {
          this.audit.record(event.type, event.details);
        }
      }
      recordOperation(operation, 'ok', Date.now() - started);
      return result;
    } catch (err) {
      recordOperation(operation, isEngineError(err) ? err.kind : 'error', Date.now() - started);
      if (err instanceof PermissionDenied) {
        recordPermissionDenied(operation, String(err.details.capability ?? 'moderate'));
        if (this.config.auditEnabled) {
          this.audit.record('permission.denied', { userId: actorId, data: { operation, ...err.details } });
        }
        this.log.warn({ operation, actor: actorId, ...err.details }, err.message);
      } else if (isEngineError(err)) {
        this.log.warn({ operation, actor: actorId, kind: err.kind }, err.message);
      } else {
        this.log.error({ operation, actor: actorId, err }, 'operation failed');
      }
      throw err;
    }
  }

  private context(actorId: string, emit: (type: AuditEventType, details: AuditDetails) => void): OperationContext {
    const actor = this.loadUser(actorId);
    const tree = new TreeNavigator(this.store);
    const permissions = new PermissionResolver(tree, this.store.listGrants());
    const log = this.log.child({ actor: actor.id });
    const publication = new PublicationPropagator(this.store, tree, emit, log);
    const moderation = new ModerationStateMachine(this.store, tree, permissions, publication, emit, log);
    return { actor, tree, permissions, publication, moderation };
  }

  private loadUser(id: string): User {
    const user = this.store.getUser(id);
    if (!user) {
      throw new NotFound('user', id);
    }
    return user;
  }

  private require(ctx: OperationContext, node: Node | null, capability: Capability): void {
    if (!ctx.permissions.canPerform(ctx.actor, node, capability)) {
      throw new PermissionDenied(
        `User ${ctx.actor.id} lacks ${capability} on ${node ? `node ${node.id}` : 'the root level'}`,
        { userId: ctx.actor.id, nodeId: node ? node.id : null, capability },
      );
    }
  }

  private requireAddChild(ctx: OperationContext, parent: Node | null): void {
    if (!ctx.permissions.canAddChild(ctx.actor, parent)) {
      throw new PermissionDenied(
        `User ${ctx.actor.id} may not add pages under ${parent ? `node ${parent.id}` : 'the root level'}`,
        { userId: ctx.actor.id, nodeId: parent ? parent.id : null, capability: 'add' },
      );
    }
  }

  private requireSuperuser(ctx: OperationContext): void {
    if (!ctx.actor.isSuperuser) {
      throw new PermissionDenied(`User ${ctx.actor.id} may not manage permissions`, {
        userId: ctx.actor.id,
        capability: 'manage_permissions',
      });
    }
  }

  private nextTreeId(tree: TreeNavigator): number {
    return tree.roots().reduce((max, root) => Math.max(max, root.treeId), 0) + 1;
  }

  private parseContent(content: NodeContent): NodeContent {
    const parsed = NodeContentSchema.safeParse(content);
    if (!parsed.success) {
      throw new InvalidInput('Invalid node content', { issues: formatIssues(parsed.error) });
    }
    return parsed.data;
  }
}
