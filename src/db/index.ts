import type { AppConfig } from '../config.js';
import { JsonDatabase } from './jsonDatabase.js';
import { PostgresDatabase } from './postgresDatabase.js';
import type { BoardDatabase } from './types.js';

export type { BoardDatabase, BoardTransaction, TransactionOptions } from './types.js';
export { JsonDatabase } from './jsonDatabase.js';
export { PostgresDatabase } from './postgresDatabase.js';

/** Postgres when a database URL is configured, otherwise the workspace JSON file. */
export function openDatabase(config: AppConfig): BoardDatabase {
  if (config.databaseUrl) {
    return new PostgresDatabase({
      url: config.databaseUrl,
      poolMax: config.poolMax,
      acquireTimeoutMs: config.acquireTimeoutMs,
      connectTimeoutSec: config.connectTimeoutSec
    });
  }
  return JsonDatabase.fromWorkspace(config.workspacePath, config.boardPath, {
    acquireTimeoutMs: config.acquireTimeoutMs
  });
}
