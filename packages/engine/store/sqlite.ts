import { z } from 'zod';
import { DatabaseConnection } from '../db/database.js';
import { CapabilitySchema, ModeratorStateSchema, SignOffSchema } from '../schemas.js';
import { GRANT_SCOPES, type Node, type PermissionGrant, type PublicCounterpart, type User } from '../types.js';
import type { EngineStore } from './types.js';

const flag = z.number().transform(value => value === 1);

const NodeRowSchema = z.object({
  id: z.string(),
  parent_id: z.string().nullable(),
  child_ids: z.string(),
  tree_id: z.number(),
  title: z.string(),
  moderator_state: ModeratorStateSchema,
  public_id: z.string().nullable(),
  sign_offs: z.string(),
  version: z.number(),
  revision: z.number(),
  created_by: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const UserRowSchema = z.object({
  id: z.string(),
  is_superuser: flag,
  is_staff: flag,
});

const GrantRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  node_id: z.string().nullable(),
  capabilities: z.string(),
  moderate: flag,
  scope: z.enum(GRANT_SCOPES),
});

const PublicRowSchema = z.object({
  id: z.string(),
  source_id: z.string(),
  parent_id: z.string().nullable(),
  tree_id: z.number(),
  lft: z.number(),
  rght: z.number(),
  level: z.number(),
  title: z.string(),
  revision: z.number(),
  published: flag,
  materialized_at: z.string(),
});

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS canopy_users (
    id TEXT PRIMARY KEY,
    is_superuser INTEGER NOT NULL DEFAULT 0,
    is_staff INTEGER NOT NULL DEFAULT 1
  );
  CREATE TABLE IF NOT EXISTS canopy_nodes (
    id TEXT PRIMARY KEY,
    parent_id TEXT,
    child_ids TEXT NOT NULL,
    tree_id INTEGER NOT NULL,
    title TEXT NOT NULL,
    moderator_state TEXT NOT NULL,
    public_id TEXT,
    sign_offs TEXT NOT NULL,
    version INTEGER NOT NULL,
    revision INTEGER NOT NULL,
    created_by TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS canopy_nodes_parent ON canopy_nodes (parent_id);
  CREATE TABLE IF NOT EXISTS canopy_grants (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    node_id TEXT,
    capabilities TEXT NOT NULL,
    moderate INTEGER NOT NULL DEFAULT 0,
    scope TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS canopy_grants_node ON canopy_grants (node_id);
  CREATE TABLE IF NOT EXISTS canopy_public_nodes (
    id TEXT PRIMARY KEY,
    source_id TEXT NOT NULL,
    parent_id TEXT,
    tree_id INTEGER NOT NULL,
    lft INTEGER NOT NULL,
    rght INTEGER NOT NULL,
    level INTEGER NOT NULL,
    title TEXT NOT NULL,
    revision INTEGER NOT NULL,
    published INTEGER NOT NULL DEFAULT 1,
    materialized_at TEXT NOT NULL
  );
`;

function toNode(row: unknown): Node {
  const r = NodeRowSchema.parse(row);
  return {
    id: r.id,
    parentId: r.parent_id,
    childIds: z.array(z.string()).parse(JSON.parse(r.child_ids)),
    treeId: r.tree_id,
    title: r.title,
    moderatorState: r.moderator_state,
    publicId: r.public_id,
    signOffs: z.array(SignOffSchema).parse(JSON.parse(r.sign_offs)),
    version: r.version,
    revision: r.revision,
    createdBy: r.created_by,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

function toUser(row: unknown): User {
  const r = UserRowSchema.parse(row);
  return { id: r.id, isSuperuser: r.is_superuser, isStaff: r.is_staff };
}

function toGrant(row: unknown): PermissionGrant {
  const r = GrantRowSchema.parse(row);
  return {
    id: r.id,
    userId: r.user_id,
    nodeId: r.node_id,
    capabilities: z.array(CapabilitySchema).parse(JSON.parse(r.capabilities)),
    moderate: r.moderate,
    scope: r.scope,
  };
}

function toPublic(row: unknown): PublicCounterpart {
  const r = PublicRowSchema.parse(row);
  return {
    id: r.id,
    sourceId: r.source_id,
    parentId: r.parent_id,
    treeId: r.tree_id,
    lft: r.lft,
    rght: r.rght,
    level: r.level,
    title: r.title,
    revision: r.revision,
    published: r.published,
    materializedAt: r.materialized_at,
  };
}

/** better-sqlite3 backed store; the schema is created on construction. */
export class SqliteStore implements EngineStore {
  readonly connection: DatabaseConnection;

  constructor(connection: DatabaseConnection = new DatabaseConnection(':memory:')) {
    this.connection = connection;
    this.connection.exec(SCHEMA_SQL);
  }

  getNode(id: string): Node | undefined {
    const res = this.connection.query('SELECT * FROM canopy_nodes WHERE id = $1', [id]);
    return res.rows.length ? toNode(res.rows[0]) : undefined;
  }

  listNodes(): Node[] {
    return this.connection.query('SELECT * FROM canopy_nodes ORDER BY rowid').rows.map(toNode);
  }

  putNode(node: Node): void {
    this.connection.query(
      `INSERT OR REPLACE INTO canopy_nodes
      (id, parent_id, child_ids, tree_id, title, moderator_state, public_id, sign_offs, version, revision, created_by, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
      [
        node.id,
        node.parentId,
        JSON.stringify(node.childIds),
        node.treeId,
        node.title,
        node.moderatorState,
        node.publicId,
        JSON.stringify(node.signOffs),
        node.version,
        node.revision,
        node.createdBy,
        node.createdAt,
        node.updatedAt,
      ],
    );
  }

  removeNode(id: string): void {
    this.connection.query('DELETE FROM canopy_nodes WHERE id = $1', [id]);
  }

  getUser(id: string): User | undefined {
    const res = this.connection.query('SELECT * FROM canopy_users WHERE id = $1', [id]);
    return res.rows.length ? toUser(res.rows[0]) : undefined;
  }

  putUser(user: User): void {
    this.connection.query('INSERT OR REPLACE INTO canopy_users (id, is_superuser, is_staff) VALUES ($1, $2, $3)', [
      user.id,
      user.isSuperuser ? 1 : 0,
      user.isStaff ? 1 : 0,
    ]);
  }

  listGrants(): PermissionGrant[] {
    return this.connection.query('SELECT * FROM canopy_grants ORDER BY rowid').rows.map(toGrant);
  }

  putGrant(grant: PermissionGrant): void {
    this.connection.query(
      `INSERT OR REPLACE INTO canopy_grants (id, user_id, node_id, capabilities, moderate, scope)
      VALUES ($1, $2, $3, $4, $5, $6)`,
      [grant.id, grant.userId, grant.nodeId, JSON.stringify(grant.capabilities), grant.moderate ? 1 : 0, grant.scope],
    );
  }

  removeGrant(id: string): void {
    this.connection.query('DELETE FROM canopy_grants WHERE id = $1', [id]);
  }

  getPublic(id: string): PublicCounterpart | undefined {
    const res = this.connection.query('SELECT * FROM canopy_public_nodes WHERE id = $1', [id]);
    return res.rows.length ? toPublic(res.rows[0]) : undefined;
  }

  listPublic(): PublicCounterpart[] {
    return this.connection.query('SELECT * FROM canopy_public_nodes ORDER BY tree_id, lft').rows.map(toPublic);
  }

  putPublic(counterpart: PublicCounterpart): void {
    this.connection.query(
      `INSERT OR REPLACE INTO canopy_public_nodes
      (id, source_id, parent_id, tree_id, lft, rght, level, title, revision, published, materialized_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        counterpart.id,
        counterpart.sourceId,
        counterpart.parentId,
        counterpart.treeId,
        counterpart.lft,
        counterpart.rght,
        counterpart.level,
        counterpart.title,
        counterpart.revision,
        counterpart.published ? 1 : 0,
        counterpart.materializedAt,
      ],
    );
  }

  removePublic(id: string): void {
    this.connection.query('DELETE FROM canopy_public_nodes WHERE id = $1', [id]);
  }

  transaction<T>(fn: () => T): T {
    return this.connection.transaction(fn);
  }
}
