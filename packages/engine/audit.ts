import { v4 as uuidv4 } from 'uuid';
import { DatabaseConnection } from './db/database.js';

export type AuditEventType =
  | 'node.created'
  | 'node.edited'
  | 'node.publish_requested'
  | 'node.signed_off'
  | 'node.approved'
  | 'node.waiting_for_parents'
  | 'node.materialized'
  | 'node.promoted'
  | 'node.retracted'
  | 'node.copied'
  | 'node.deleted'
  | 'grant.created'
  | 'grant.revoked'
  | 'permission.denied';

export interface AuditEvent {
  id: string;
  timestamp: string;
  type: AuditEventType;
  userId?: string;
  nodeId?: string;
  data?: Record<string, unknown>;
}

export type AuditDetails = Omit<AuditEvent, 'id' | 'timestamp' | 'type'>;

/**
 * Append-only audit logger. Keeps events in memory and, when given a
 * DatabaseConnection, persists them to a table whose triggers reject
 * update and delete.
 */
export class AuditLogger {
  private logs: AuditEvent[] = [];
  private initialized = false;
  private db?: DatabaseConnection;

  constructor(options?: DatabaseConnection | { db?: DatabaseConnection }) {
    if (options instanceof DatabaseConnection) {
      this.db = options;
    } else if (options) {
      this.db = options.db;
    }
  }

  private ensureTable(db: DatabaseConnection): void {
    if (this.initialized) return;
    db.exec(`
      CREATE TABLE IF NOT EXISTS canopy_audit_log (
        id TEXT PRIMARY KEY,
        timestamp TEXT NOT NULL,
        type TEXT NOT NULL,
        user_id TEXT,
        node_id TEXT,
        data TEXT
      );
      CREATE TRIGGER IF NOT EXISTS canopy_audit_log_no_update
      AFTER UPDATE ON canopy_audit_log
      BEGIN
        SELECT RAISE(ABORT, 'audit log is append-only');
      END;
      CREATE TRIGGER IF NOT EXISTS canopy_audit_log_no_delete
      AFTER DELETE ON canopy_audit_log
      BEGIN
        SELECT RAISE(ABORT, 'audit log is append-only');
      END;
    `);
    this.initialized = true;
  }

  record(type: AuditEventType, details: AuditDetails = {}): AuditEvent {
    const event: AuditEvent = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      type,
      ...details,
    };
    this.logs.push(event);

    if (this.db) {
      this.ensureTable(this.db);
      this.db.query(
        `INSERT INTO canopy_audit_log (id, timestamp, type, user_id, node_id, data)
        VALUES ($1, $2, $3, $4, $5, $6);`,
        [
          event.id,
          event.timestamp,
          event.type,
          event.userId ?? null,
          event.nodeId ?? null,
          event.data ? JSON.stringify(event.data) : null,
        ],
      );
    }
    return event;
  }

  getLogs(): AuditEvent[] {
    return this.logs;
  }

  ofType(type: AuditEventType): AuditEvent[] {
    return this.logs.filter(event => event.type === type);
  }

  clear(): void {
    this.logs = [];
  }
}
