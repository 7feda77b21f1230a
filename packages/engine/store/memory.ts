import type { Node, PermissionGrant, PublicCounterpart, User } from '../types.js';
import type { EngineStore } from './types.js';

interface MemoryState {
  nodes: Map<string, Node>;
  users: Map<string, User>;
  grants: Map<string, PermissionGrant>;
  publics: Map<string, PublicCounterpart>;
}

function emptyState(): MemoryState {
  return { nodes: new Map(), users: new Map(), grants: new Map(), publics: new Map() };
}

/**
 * In-process store. A transaction snapshots the whole state and puts the
 * snapshot back if the callback throws.
 */
export class MemoryStore implements EngineStore {
  private state: MemoryState = emptyState();
  private inTransaction = false;

  getNode(id: string): Node | undefined {
    const node = this.state.nodes.get(id);
    return node ? structuredClone(node) : undefined;
  }

  listNodes(): Node[] {
    return [...this.state.nodes.values()].map(node => structuredClone(node));
  }

  putNode(node: Node): void {
    this.state.nodes.set(node.id, structuredClone(node));
  }

  removeNode(id: string): void {
    this.state.nodes.delete(id);
  }

  getUser(id: string): User | undefined {
    const user = this.state.users.get(id);
    return user ? { ...user } : undefined;
  }

  putUser(user: User): void {
    this.state.users.set(user.id, { ...user });
  }

  listGrants(): PermissionGrant[] {
    return [...this.state.grants.values()].map(grant => structuredClone(grant));
  }

  putGrant(grant: PermissionGrant): void {
    this.state.grants.set(grant.id, structuredClone(grant));
  }

  removeGrant(id: string): void {
    this.state.grants.delete(id);
  }

  getPublic(id: string): PublicCounterpart | undefined {
    const counterpart = this.state.publics.get(id);
    return counterpart ? { ...counterpart } : undefined;
  }

  listPublic(): PublicCounterpart[] {
    return [...this.state.publics.values()].map(counterpart => ({ ...counterpart }));
  }

  putPublic(counterpart: PublicCounterpart): void {
    this.state.publics.set(counterpart.id, { ...counterpart });
  }

  removePublic(id: string): void {
    this.state.publics.delete(id);
  }

  transaction<T>(fn: () => T): T {
    if (this.inTransaction) {
      return fn();
    }
    const snapshot: MemoryState = {
      nodes: new Map(this.state.nodes),
      users: new Map(this.state.users),
      grants: new Map(this.state.grants),
      publics: new Map(this.state.publics),
    };
    this.inTransaction = true;
    try {
      return fn();
    } catch (err) {
      this.state = snapshot;
      throw err;
    } finally {
      this.inTransaction = false;
    }
  }
}
