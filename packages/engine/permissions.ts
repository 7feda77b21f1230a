import type { TreeNavigator } from './tree.js';
import { CAPABILITIES, type Capability, type GrantScope, type Node, type PermissionGrant, type User } from './types.js';

/** Does a grant with `scope` reach a node `distance` levels below its anchor? */
export function scopeCovers(scope: GrantScope, distance: number): boolean {
  switch (scope) {
    case 'page':
      return distance === 0;
    case 'children':
      return distance === 1;
    case 'page_and_children':
      return distance <= 1;
    case 'descendants':
      return distance >= 1;
    case 'page_and_descendants':
      return distance >= 0;
  }
}

/** Moderator grants anchored on one node of a chain. */
export interface ModeratorLevel {
  levelId: string;
  depth: number;
  grants: PermissionGrant[];
}

/**
 * Resolves permissions against an immutable snapshot of grants. Capabilities
 * use nearest-grant-wins; moderator assignments accumulate over every
 * ancestor level.
 */
export class PermissionResolver {
  private readonly byNode = new Map<string, PermissionGrant[]>();
  private readonly global: PermissionGrant[] = [];

  constructor(
    private readonly tree: TreeNavigator,
    grants: readonly PermissionGrant[],
  ) {
    for (const grant of grants) {
      if (grant.nodeId === null) {
        this.global.push(grant);
        continue;
      }
      const list = this.byNode.get(grant.nodeId) ?? [];
      list.push(grant);
      this.byNode.set(grant.nodeId, list);
    }
  }

  canPerform(user: User, node: Node | null, capability: Capability): boolean {
    return this.effectiveCapabilities(user, node).has(capability);
  }

  /**
   * Walks from `node` to the root and takes the capabilities of the first
   * level holding a covering grant for `user`. `node = null` stands for the
   * level above every root, where only global grants apply.
   */
  effectiveCapabilities(user: User, node: Node | null): Set<Capability> {
    return this.resolve(user, node, 0);
  }

  /**
   * Adding a child is judged at the position the child will take, one level
   * below `parent`: a `descendants` grant on a node lets its holder add
   * children to it without being able to change the node itself.
   */
  canAddChild(user: User, parent: Node | null): boolean {
    return this.resolve(user, parent, 1).has('add');
  }

  private resolve(user: User, node: Node | null, offset: number): Set<Capability> {
    if (user.isSuperuser) {
      return new Set(CAPABILITIES);
    }
    if (!user.isStaff) {
      return new Set();
    }

    if (node) {
      const chain = [node, ...this.tree.ancestors(node).reverse()];
      for (let index = 0; index < chain.length; index++) {
        const distance = index + offset;
        const covering = (this.byNode.get(chain[index].id) ?? []).filter(
          grant => grant.userId === user.id && scopeCovers(grant.scope, distance),
        );
        if (covering.length) {
          return new Set(covering.flatMap(grant => grant.capabilities));
        }
      }
    }

    return new Set(this.global.filter(grant => grant.userId === user.id).flatMap(grant => grant.capabilities));
  }

  /** Root-most level first. */
  moderatorLevels(node: Node): ModeratorLevel[] {
    const chain = [...this.tree.ancestors(node), node];
    const levels: ModeratorLevel[] = [];
    chain.forEach((anchor, depth) => {
      const distance = chain.length - 1 - depth;
      const grants = (this.byNode.get(anchor.id) ?? []).filter(
        grant => grant.moderate && scopeCovers(grant.scope, distance),
      );
      if (grants.length) {
        levels.push({ levelId: anchor.id, depth, grants });
      }
    });
    return levels;
  }

  moderatorsFor(node: Node): PermissionGrant[] {
    return this.moderatorLevels(node).flatMap(level => level.grants);
  }

  moderatorCount(node: Node): number {
    return this.moderatorsFor(node).length;
  }

  /**
   * Index into `moderatorLevels(node)` of the highest level `user` moderates,
   * or -1. Non-staff users never moderate.
   */
  moderatorRank(user: User, levels: ModeratorLevel[]): number {
    if (!user.isStaff && !user.isSuperuser) {
      return -1;
    }
    return levels.findIndex(level => level.grants.some(grant => grant.userId === user.id));
  }

  isModeratorOf(user: User, node: Node): boolean {
    return this.moderatorRank(user, this.moderatorLevels(node)) >= 0;
  }
}
