export const MODERATOR_STATES = [
  'CHANGED',
  'NEED_APPROVEMENT',
  'APPROVED',
  'APPROVED_WAITING_FOR_PARENTS',
] as const;

export type ModeratorState = (typeof MODERATOR_STATES)[number];

export const CAPABILITIES = ['add', 'change', 'delete', 'publish'] as const;

export type Capability = (typeof CAPABILITIES)[number];

/**
 * Which nodes a grant covers, relative to the node it is anchored on.
 * `page_and_descendants` is the usual subtree grant.
 */
export const GRANT_SCOPES = ['page', 'children', 'page_and_children', 'descendants', 'page_and_descendants'] as const;

export type GrantScope = (typeof GRANT_SCOPES)[number];

export type InsertPosition = 'first-child' | 'last-child';

export interface User {
  id: string;
  isSuperuser: boolean;
  isStaff: boolean;
}

/**
 * One moderator's sign-off on a pending node. `levelId` is the node whose
 * moderator grant the approver acted under; null for a superuser acting
 * without a grant.
 */
export interface SignOff {
  userId: string;
  levelId: string | null;
  signedAt: string;
}

export interface Node {
  id: string;
  parentId: string | null;
  childIds: string[];
  treeId: number;
  title: string;
  moderatorState: ModeratorState;
  publicId: string | null;
  signOffs: SignOff[];
  /** Bumped on every moderation transition. */
  version: number;
  /** Bumped on every content edit. */
  revision: number;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

export interface TreePosition {
  treeId: number;
  lft: number;
  rght: number;
  level: number;
  parentId: string | null;
}

export interface PublicCounterpart extends TreePosition {
  id: string;
  sourceId: string;
  title: string;
  revision: number;
  published: boolean;
  materializedAt: string;
}

export interface PermissionGrant {
  id: string;
  userId: string;
  /** null for a global grant */
  nodeId: string | null;
  capabilities: Capability[];
  moderate: boolean;
  scope: GrantScope;
}

export interface NodeContent {
  title: string;
}
