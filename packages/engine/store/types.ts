import type { Node, PermissionGrant, PublicCounterpart, User } from '../types.js';

/** Read side the tree navigator needs. */
export interface NodeReader {
  getNode(id: string): Node | undefined;
  listNodes(): Node[];
}

/**
 * Storage collaborator for the engine. Reads return copies: a change only
 * lands once it is written back with a `put*` call. `transaction` must apply
 * everything `fn` writes as one unit, or nothing if it throws.
 */
export interface EngineStore extends NodeReader {
  putNode(node: Node): void;
  removeNode(id: string): void;

  getUser(id: string): User | undefined;
  putUser(user: User): void;

  listGrants(): PermissionGrant[];
  putGrant(grant: PermissionGrant): void;
  removeGrant(id: string): void;

  getPublic(id: string): PublicCounterpart | undefined;
  listPublic(): PublicCounterpart[];
  putPublic(counterpart: PublicCounterpart): void;
  removePublic(id: string): void;

  transaction<T>(fn: () => T): T;
}
