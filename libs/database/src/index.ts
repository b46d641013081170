/**
 * @fleet-link/database - async SQLite access for the gateway's durable state
 *
 * @example
 * ```typescript
 * import { createDatabase } from '@fleet-link/database';
 *
 * const db = await createDatabase({ type: 'sqlite', path: ':memory:', schema: schemaSQL });
 * await db.exec('INSERT INTO saved_routes (name, map_id, nodes_json, created_by, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)', ['dock', 'default', '[]', 'ops', now, now]);
 * const { rows } = await db.query('SELECT * FROM saved_routes');
 * await db.close();
 * ```
 */

export type {
  Database,
  DatabaseConfig,
  DatabaseFactoryConfig,
  DatabaseHealth,
  DatabaseLogger,
  DatabaseType,
  ExecResult,
  QueryResult,
  Transaction,
} from './types.js';

export { SQLiteAdapter } from './sqlite-adapter.js';
export { createDatabase } from './factory.js';
