import Database from 'better-sqlite3';

export type SqlValue = string | number | bigint | null;

export interface QueryResult {
  rows: unknown[];
  rowCount: number;
}

export class DatabaseConnection {
  private db: Database.Database;
  private depth = 0;

  constructor(filename: string = ':memory:') {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
  }

  // Accepts PostgreSQL-style $1, $2 placeholders so queries read the same across drivers
  query(text: string, params: SqlValue[] = []): QueryResult {
    const sqliteQuery = text.replace(/\$(\d+)/g, '?');
    try {
      const stmt = this.db.prepare(sqliteQuery);
      if (stmt.reader) {
        const rows = stmt.all(...params);
        return { rows, rowCount: rows.length };
      }
      const info = stmt.run(...params);
      return { rows: [], rowCount: info.changes };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Database query failed: ${message} (query: ${text.trim().split('\n')[0]})`, { cause: error });
    }
  }

  // Execute raw SQL (schema setup)
  exec(sql: string): void {
    this.db.exec(sql);
  }

  close(): void {
    this.db.close();
  }

  /**
   * Runs `fn` in an IMMEDIATE transaction so the write lock is taken up front;
   * nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    if (this.depth > 0) {
      return fn();
    }
    this.depth += 1;
    try {
      return this.db.transaction(fn).immediate();
    } finally {
      this.depth -= 1;
    }
  }
}
