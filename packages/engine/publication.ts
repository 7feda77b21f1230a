import type { AuditDetails, AuditEventType } from './audit.js';
import { AncestorNotPublic, InvalidStateTransition, NotFound } from './errors.js';
import type { Logger } from './logger.js';
import { recordMaterialization, recordRetraction } from './metrics.js';
import type { EngineStore } from './store/types.js';
import type { TreeNavigator } from './tree.js';
import type { Node, PublicCounterpart } from './types.js';

export type AuditSink = (type: AuditEventType, details: AuditDetails) => void;

/**
 * Owns the public projection of the tree. A node may only carry a public
 * counterpart while every ancestor carries one.
 */
export class PublicationPropagator {
  constructor(
    private readonly store: EngineStore,
    private readonly tree: TreeNavigator,
    private readonly emit: AuditSink,
    private readonly log: Logger,
  ) {}

  hasPublicCounterpart(node: Node): boolean {
    return node.publicId !== null && this.store.getPublic(node.publicId) !== undefined;
  }

  /** The root-most ancestor without a public counterpart, if any. */
  blockingAncestor(node: Node): Node | null {
    return this.tree.ancestors(node).find(ancestor => !this.hasPublicCounterpart(ancestor)) ?? null;
  }

  canMaterialize(node: Node): boolean {
    return this.blockingAncestor(node) === null;
  }

  /**
   * Writes the public counterpart of an APPROVED node. Returns the existing
   * counterpart untouched when it already reflects the node's revision; a
   * counterpart from an older revision is replaced under the same id.
   */
  materialize(node: Node): PublicCounterpart {
    if (node.moderatorState !== 'APPROVED') {
      throw new InvalidStateTransition(`Cannot materialize node ${node.id} in state ${node.moderatorState}`, {
        nodeId: node.id,
        state: node.moderatorState,
      });
    }
    const blocker = this.blockingAncestor(node);
    if (blocker) {
      throw new AncestorNotPublic(node.id, blocker.id);
    }

    const existing = this.store.getPublic(node.id);
    if (existing && existing.revision === node.revision && node.publicId === existing.id) {
      return existing;
    }

    const position = this.tree.positions().get(node.id);
    if (!position) {
      throw new NotFound('node', node.id);
    }
    const counterpart: PublicCounterpart = {
      id: node.id,
      sourceId: node.id,
      ...position,
      title: node.title,
      revision: node.revision,
      published: true,
      materializedAt: new Date().toISOString(),
    };
    this.store.putPublic(counterpart);
    if (node.publicId !== counterpart.id) {
      node.publicId = counterpart.id;
      this.store.putNode(node);
    }

    const kind = existing ? 'refreshed' : 'created';
    recordMaterialization(kind);
    this.emit('node.materialized', { nodeId: node.id, data: { kind, revision: node.revision } });
    this.log.info({ nodeId: node.id, kind }, 'public counterpart written');
    return counterpart;
  }

  /**
   * Removes the counterparts of `node` and its whole subtree, deepest first.
   * Returns the ids of nodes that lost one.
   */
  retract(node: Node): string[] {
    const subtree = [node, ...this.tree.descendants(node)].reverse();
    const retracted: string[] = [];
    for (const member of subtree) {
      if (member.publicId === null) continue;
      this.store.removePublic(member.publicId);
      member.publicId = null;
      this.store.putNode(member);
      retracted.push(member.id);
    }
    if (retracted.length) {
      recordRetraction(retracted.length);
      this.emit('node.retracted', { nodeId: node.id, data: { retracted } });
      this.log.info({ nodeId: node.id, count: retracted.length }, 'public counterparts retracted');
    }
    return retracted;
  }

  /**
   * Re-applies the draft tree's structure to every public counterpart, so node
   * and counterpart keep equal tree attributes after inserts and removals.
   */
  syncStructure(): number {
    const positions = this.tree.positions();
    let updated = 0;
    for (const counterpart of this.store.listPublic()) {
      const position = positions.get(counterpart.sourceId);
      if (!position) continue;
      if (
        counterpart.treeId === position.treeId &&
        counterpart.lft === position.lft &&
        counterpart.rght === position.rght &&
        counterpart.level === position.level &&
        counterpart.parentId === position.parentId
      ) {
        continue;
      }
      this.store.putPublic({ ...counterpart, ...position });
      updated++;
    }
    if (updated) {
      this.log.debug({ updated }, 'public structure synced');
    }
    return updated;
  }
}
