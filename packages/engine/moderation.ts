import { InvalidStateTransition, PermissionDenied } from './errors.js';
import type { Logger } from './logger.js';
import { recordPromotion } from './metrics.js';
import type { ModeratorLevel, PermissionResolver } from './permissions.js';
import type { AuditSink, PublicationPropagator } from './publication.js';
import type { EngineStore } from './store/types.js';
import type { TreeNavigator } from './tree.js';
import type { ModeratorState, Node, User } from './types.js';

export interface ApproveOptions {
  /** Fails with InvalidStateTransition unless the node is still at this version. */
  expectedVersion?: number;
}

const settled: ReadonlySet<ModeratorState> = new Set(['APPROVED', 'APPROVED_WAITING_FOR_PARENTS']);

export class ModerationStateMachine {
  constructor(
    private readonly store: EngineStore,
    private readonly tree: TreeNavigator,
    private readonly permissions: PermissionResolver,
    private readonly publication: PublicationPropagator,
    private readonly emit: AuditSink,
    private readonly log: Logger,
  ) {}

  /** Create and edit both land here. */
  markChanged(node: Node): Node {
    node.signOffs = [];
    return this.transition(node, 'CHANGED');
  }

  requestPublish(node: Node): Node {
    const moderators = this.permissions.moderatorCount(node);
    this.emit('node.publish_requested', { nodeId: node.id, data: { moderators } });
    if (moderators === 0) {
      return this.settle(node);
    }
    if (node.moderatorState !== 'NEED_APPROVEMENT') {
      node.signOffs = [];
    }
    return this.transition(node, 'NEED_APPROVEMENT');
  }

  /**
   * Records `approver`'s sign-off. A sign-off given under a moderator level
   * also covers every level below it; the node settles once the root-most
   * level is covered. Approving an already approved node is a no-op, but
   * only for someone entitled to approve it.
   */
  approve(node: Node, approver: User, options: ApproveOptions = {}): Node {
    if (options.expectedVersion !== undefined && options.expectedVersion !== node.version) {
      throw new InvalidStateTransition(
        `Node ${node.id} changed concurrently (expected version ${options.expectedVersion}, found ${node.version})`,
        { nodeId: node.id, expectedVersion: options.expectedVersion, version: node.version },
      );
    }
    if (settled.has(node.moderatorState)) {
      this.authorizeApprover(node, approver, this.permissions.moderatorLevels(node));
      return node;
    }
    if (node.moderatorState !== 'NEED_APPROVEMENT') {
      throw new InvalidStateTransition(`Node ${node.id} is ${node.moderatorState}, not awaiting approval`, {
        nodeId: node.id,
        state: node.moderatorState,
      });
    }

    const levels = this.permissions.moderatorLevels(node);
    const rank = this.authorizeApprover(node, approver, levels);
    if (levels.length === 0) {
      // every moderator was revoked after the request
      return this.settle(node);
    }

    node.signOffs = [
      ...node.signOffs.filter(signOff => signOff.userId !== approver.id),
      { userId: approver.id, levelId: rank < 0 ? null : levels[rank].levelId, signedAt: new Date().toISOString() },
    ];
    this.emit('node.signed_off', { userId: approver.id, nodeId: node.id, data: { level: rank < 0 ? null : levels[rank].levelId } });

    if (this.coveredFrom(node, levels.map(level => level.levelId)) === 0) {
      return this.settle(node);
    }
    return this.transition(node, 'NEED_APPROVEMENT');
  }

  /**
   * Removes the public counterparts of `node`'s subtree; approved descendants
   * fall back to waiting for their parents.
   */
  retract(node: Node): string[] {
    const retracted = this.publication.retract(node);
    for (const id of retracted) {
      if (id === node.id) continue;
      const member = this.tree.get(id);
      if (member.moderatorState === 'APPROVED') {
        this.transition(member, 'APPROVED_WAITING_FOR_PARENTS');
      }
    }
    return retracted;
  }

  /**
   * Throws PermissionDenied unless `approver` may approve `node`: a moderator
   * of one of its levels, a superuser, or a `publish` holder when the node has
   * no moderators. Returns the approver's moderator rank.
   */
  private authorizeApprover(node: Node, approver: User, levels: ModeratorLevel[]): number {
    if (levels.length === 0) {
      if (!this.permissions.canPerform(approver, node, 'publish')) {
        throw new PermissionDenied(`User ${approver.id} may not publish node ${node.id}`, {
          userId: approver.id,
          nodeId: node.id,
          capability: 'publish',
        });
      }
      return -1;
    }
    const rank = this.permissions.moderatorRank(approver, levels);
    if (rank < 0 && !approver.isSuperuser) {
      throw new PermissionDenied(`User ${approver.id} does not moderate node ${node.id}`, {
        userId: approver.id,
        nodeId: node.id,
      });
    }
    return rank;
  }

  /** Lowest level index covered by the recorded sign-offs; `levelIds.length` if none. */
  private coveredFrom(node: Node, levelIds: string[]): number {
    let covered = levelIds.length;
    for (const signOff of node.signOffs) {
      const index = signOff.levelId === null ? 0 : levelIds.indexOf(signOff.levelId);
      if (index >= 0 && index < covered) {
        covered = index;
      }
    }
    return covered;
  }

  private settle(node: Node): Node {
    node.signOffs = [];
    if (!this.publication.canMaterialize(node)) {
      this.emit('node.waiting_for_parents', { nodeId: node.id });
      return this.transition(node, 'APPROVED_WAITING_FOR_PARENTS');
    }
    this.transition(node, 'APPROVED');
    this.emit('node.approved', { nodeId: node.id });
    this.publication.materialize(node);
    this.promoteWaitingDescendants(node);
    return node;
  }

  /**
   * Top-down pass over the subtree: a waiting node is promoted once its parent
   * is public, which in pre-order is always decided before its own turn.
   */
  private promoteWaitingDescendants(root: Node): number {
    let promoted = 0;
    for (const descendant of this.tree.descendants(root)) {
      if (descendant.moderatorState !== 'APPROVED_WAITING_FOR_PARENTS') continue;
      if (!this.publication.canMaterialize(descendant)) continue;
      this.transition(descendant, 'APPROVED');
      this.publication.materialize(descendant);
      recordPromotion();
      this.emit('node.promoted', { nodeId: descendant.id, data: { by: root.id } });
      promoted++;
    }
    return promoted;
  }

  private transition(node: Node, next: ModeratorState): Node {
    const previous = node.moderatorState;
    node.moderatorState = next;
    node.version += 1;
    node.updatedAt = new Date().toISOString();
    this.store.putNode(node);
    if (previous !== next) {
      this.log.info({ nodeId: node.id, from: previous, to: next }, 'moderation transition');
    }
    return node;
  }
}
