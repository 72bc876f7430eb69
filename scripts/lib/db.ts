import * as sql from 'mssql';
import { ETLConfig, getSqlConfig } from './config-loader';
import { toStorageError } from './error-handler';

/**
 * Open a connection pool for the configured SQL Server database.
 */
export async function createPool(config: ETLConfig): Promise<sql.ConnectionPool> {
  const pool = new sql.ConnectionPool({
    ...getSqlConfig(config),
    pool: {
      max: 10,
      min: 0,
      idleTimeoutMillis: 30000,
    },
  });
  try {
    return await pool.connect();
  } catch (error) {
    throw toStorageError(error, 'connect');
  }
}
