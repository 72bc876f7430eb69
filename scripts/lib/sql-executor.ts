import * as sql from 'mssql';
import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from './logger';
import { toStorageError } from './error-handler';

export interface SQLExecutionOptions {
  pool: sql.ConnectionPool;
  scriptPath: string;
  /** `$(NAME)` placeholders and their replacements */
  variables: Record<string, string>;
  logger?: Logger;
}

export interface SQLExecutionResult {
  script: string;
  batches: number;
  recordsAffected: number;
  duration: number;
}

/**
 * Substitute `$(NAME)` placeholders. Unknown placeholders are left as they are,
 * so a typo surfaces as a SQL syntax error naming it.
 */
export function substituteVariables(script: string, variables: Record<string, string>): string {
  return script.replace(/\$\(([A-Z_][A-Z0-9_]*)\)/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : placeholder
  );
}

/**
 * Split SQL by GO batch separator (SQL Server requirement)
 */
export function splitBatches(script: string): string[] {
  return script
    .split(/^\s*GO\s*$/gim)
    .map(batch => batch.trim())
    .filter(batch => batch.length > 0);
}

/**
 * Execute SQL script with schema variable substitution.
 * Failures are rethrown as StorageError naming the script.
 */
export async function executeSQLScript(options: SQLExecutionOptions): Promise<SQLExecutionResult> {
  const startTime = Date.now();
  const scriptName = path.basename(options.scriptPath);

  const scriptContent = fs.readFileSync(options.scriptPath, 'utf-8');
  const batches = splitBatches(substituteVariables(scriptContent, options.variables));

  options.logger?.debug(`${scriptName}: executing ${batches.length} SQL batch(es)`);
  let totalRowsAffected = 0;

  for (const batch of batches) {
    try {
      const result = await options.pool.request().query(batch);
      if (result.rowsAffected?.[0]) {
        totalRowsAffected += result.rowsAffected[0];
      }
    } catch (error) {
      throw toStorageError(error, `execute ${scriptName}`);
    }
  }

  return {
    script: scriptName,
    batches: batches.length,
    recordsAffected: totalRowsAffected,
    duration: (Date.now() - startTime) / 1000,
  };
}

/**
 * `.sql` files of a directory in name order
 */
export function listScripts(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter(name => name.toLowerCase().endsWith('.sql'))
    .sort()
    .map(name => path.join(dir, name));
}

/**
 * Execute multiple SQL scripts in sequence
 */
export async function executeSQLScripts(
  scripts: string[],
  pool: sql.ConnectionPool,
  variables: Record<string, string>,
  logger?: Logger
): Promise<SQLExecutionResult[]> {
  const results: SQLExecutionResult[] = [];
  for (const scriptPath of scripts) {
    results.push(await executeSQLScript({ pool, scriptPath, variables, logger }));
  }
  return results;
}
