/**
 * Storage abstraction for the gateway's durable state: the encrypted broker
 * credentials and the saved mission route library. Only SQLite is wired; the
 * async surface keeps callers independent of the driver.
 */

export type DatabaseType = 'sqlite';

export interface DatabaseConfig {
  type: DatabaseType;
  /** File path, or ":memory:" for a throwaway database */
  path: string;
  /** Milliseconds a writer waits on a locked database before failing */
  busyTimeoutMs?: number;
  logger?: DatabaseLogger;
}

export interface DatabaseLogger {
  info: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  debug?: (msg: string, meta?: Record<string, unknown>) => void;
}

export interface QueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
}

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecResult {
  changes: number;
  lastInsertId?: number | string;
}

export interface Transaction {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  exec(sql: string, params?: unknown[]): Promise<ExecResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface DatabaseHealth {
  healthy: boolean;
  latency?: number;
  error?: string;
}

export interface Database {
  readonly type: DatabaseType;

  query<T = unknown>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

  /**
   * Execute a statement (INSERT, UPDATE, DELETE) and return affected rows
   */
  exec(sql: string, params?: unknown[]): Promise<ExecResult>;

  /**
   * Execute raw SQL such as a schema file. Returns nothing.
   */
  execRaw(sql: string): Promise<void>;

  transaction(): Promise<Transaction>;

  withTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T>;

  healthCheck(): Promise<DatabaseHealth>;

  close(): Promise<void>;
}

export interface DatabaseFactoryConfig extends DatabaseConfig {
  /** Schema SQL executed right after opening */
  schema?: string;
}
