/**
 * SQLite adapter using better-sqlite3
 */
import SQLite from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type {
  Database,
  DatabaseConfig,
  DatabaseHealth,
  DatabaseType,
  ExecResult,
  QueryResult,
  Transaction,
} from './types.js';

const MEMORY_PATH = ':memory:';

export class SQLiteAdapter implements Database {
  readonly type: DatabaseType = 'sqlite';
  private readonly db: SQLite.Database;
  private readonly logger?: DatabaseConfig['logger'];
  private closed = false;

  constructor(config: DatabaseConfig) {
    this.logger = config.logger;
    const target = config.path === MEMORY_PATH ? MEMORY_PATH : path.resolve(config.path);

    if (target !== MEMORY_PATH) {
      const dir = path.dirname(target);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        this.logger?.info(`Created directory: ${dir}`);
      }
    }

    try {
      this.db = new SQLite(target);
      if (target !== MEMORY_PATH) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(config.busyTimeoutMs ?? 5000))}`);
      this.logger?.info('SQLite database opened', { path: target });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to open SQLite database at ${target}: ${message}`);
    }
  }

  async query<T = unknown>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    try {
      const rows = this.db.prepare<unknown[], T>(sql).all(...params);
      return { rows, rowCount: rows.length };
    } catch (error) {
      this.logger?.error('SQLite query error', { sql, error });
      throw error;
    }
  }

  async exec(sql: string, params: unknown[] = []): Promise<ExecResult> {
    try {
      const info = this.db.prepare(sql).run(...params);
      return {
        changes: info.changes,
        lastInsertId: typeof info.lastInsertRowid === 'bigint' ? Number(info.lastInsertRowid) : info.lastInsertRowid,
      };
    } catch (error) {
      this.logger?.error('SQLite exec error', { sql, error });
      throw error;
    }
  }

  async execRaw(sql: string): Promise<void> {
    try {
      this.db.exec(sql);
    } catch (error) {
      this.logger?.error('SQLite execRaw error', { error });
      throw error;
    }
  }

  async transaction(): Promise<Transaction> {
    this.db.prepare('BEGIN').run();

    let finished = false;
    const ensureOpen = (): void => {
      if (finished) {
        throw new Error('Transaction already finished');
      }
    };

    return {
      query: async <T = unknown>(sql: string, params?: unknown[]) => {
        ensureOpen();
        return this.query<T>(sql, params);
      },
      exec: async (sql: string, params?: unknown[]) => {
        ensureOpen();
        return this.exec(sql, params);
      },
      commit: async () => {
        ensureOpen();
        this.db.prepare('COMMIT').run();
        finished = true;
      },
      rollback: async () => {
        ensureOpen();
        this.db.prepare('ROLLBACK').run();
        finished = true;
      },
    };
  }

  async withTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = await this.transaction();
    try {
      const result = await fn(tx);
      await tx.commit();
      return result;
    } catch (error) {
      await tx.rollback();
      throw error;
    }
  }

  async healthCheck(): Promise<DatabaseHealth> {
    const start = Date.now();
    if (this.closed) {
      return { healthy: false, error: 'database closed' };
    }
    try {
      this.db.prepare('SELECT 1').get();
      return { healthy: true, latency: Date.now() - start };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { healthy: false, error: message };
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    try {
      this.db.close();
      this.closed = true;
      this.logger?.info('SQLite database closed');
    } catch (error) {
      this.logger?.error('Error closing SQLite database', { error });
      throw error;
    }
  }
}
