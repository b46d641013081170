import type { Database, DatabaseFactoryConfig } from './types.js';
import { SQLiteAdapter } from './sqlite-adapter.js';

/**
 * Opens a database and applies the schema, if one is given.
 *
 * @example
 * ```typescript
 * const db = await createDatabase({
 *   type: 'sqlite',
 *   path: './var/fleet-link.db',
 *   schema: fs.readFileSync('./schema.sql', 'utf-8')
 * });
 * ```
 */
export async function createDatabase(config: DatabaseFactoryConfig): Promise<Database> {
  if (config.type !== 'sqlite') {
    throw new Error(`Unsupported database type: ${String(config.type)}`);
  }
  const db = new SQLiteAdapter(config);

  if (config.schema) {
    config.logger?.info('Executing database schema');
    try {
      await db.execRaw(config.schema);
    } catch (error) {
      config.logger?.error('Failed to execute schema', { error });
      await db.close();
      throw error;
    }
  }

  return db;
}
