/**
 * Error Handler for the dataset pipelines
 * Classifies SQL Server driver errors and formats failures for logging.
 * Storage writes are never retried: a failed table write fails the run.
 */

import { StorageError, StorageErrorCategory } from './errors';

export interface ErrorClassification {
  category: StorageErrorCategory;
  message: string;
  suggestion: string;
}

interface ErrorFields {
  message: string;
  code?: string | number;
  number?: number;
  lineNumber?: number;
  procName?: string;
  stack?: string;
}

function readFields(error: unknown): ErrorFields {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const fields: ErrorFields = {
    message: 'message' in error && typeof error.message === 'string' ? error.message : String(error),
  };
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    fields.code = error.code;
  }
  if ('number' in error && typeof error.number === 'number') {
    fields.number = error.number;
  }
  if ('lineNumber' in error && typeof error.lineNumber === 'number') {
    fields.lineNumber = error.lineNumber;
  }
  if ('procName' in error && typeof error.procName === 'string' && error.procName !== '') {
    fields.procName = error.procName;
  }
  if ('stack' in error && typeof error.stack === 'string') {
    fields.stack = error.stack;
  }
  return fields;
}

/**
 * Classify a storage error by driver code, SQL Server error number or message
 */
export function classifyStorageError(error: unknown): ErrorClassification {
  const { message, code, number } = readFields(error);
  const sqlNumber = number ?? (typeof code === 'number' ? code : undefined);

  // Connection errors
  if (
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ETIMEOUT' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    code === 'ECONNCLOSED' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up') ||
    message.toLowerCase().includes('failed to connect')
  ) {
    return {
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Check the SQLSERVER connection settings and that the server is reachable'
    };
  }

  // Permission errors
  if (
    code === 'ELOGIN' ||
    sqlNumber === 18456 || // Login failed
    sqlNumber === 229 || // Permission denied on object
    sqlNumber === 262 || // Permission denied in database
    sqlNumber === 2760 || // Schema does not exist or no permission
    message.toLowerCase().includes('permission')
  ) {
    return {
      category: 'permission',
      message: 'Permission denied',
      suggestion: 'Check the database user permissions for the target schema'
    };
  }

  // Object already exists
  if (
    sqlNumber === 2714 || // There is already an object named
    message.includes('There is already an object named')
  ) {
    return {
      category: 'already-exists',
      message: 'Database object already exists',
      suggestion: 'Run the drop phase first or drop the object manually'
    };
  }

  // Constraint violations
  if (
    sqlNumber === 547 || // Foreign key constraint
    sqlNumber === 2627 || // Unique constraint
    sqlNumber === 2601 || // Duplicate key
    sqlNumber === 515 || // NULL into NOT NULL column
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE constraint')
  ) {
    return {
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check data integrity and fix source data'
    };
  }

  // Syntax / schema errors
  if (
    sqlNumber === 102 || // Syntax error
    sqlNumber === 156 || // Incorrect syntax
    sqlNumber === 208 || // Invalid object name
    sqlNumber === 207 || // Invalid column name
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name') ||
    message.includes('Invalid column name')
  ) {
    return {
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Fix SQL script or verify database schema'
    };
  }

  return {
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs'
  };
}

/**
 * Wrap a driver error so callers see the category, the operation and the table.
 */
export function toStorageError(error: unknown, operation: string, table: string | null = null): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const { message } = readFields(error);
  const classification = classifyStorageError(error);
  const target = table ? ` ${table}` : '';
  return new StorageError(
    `${operation}${target} failed (${classification.category}): ${message}`,
    classification.category,
    operation,
    table,
    error
  );
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const fields = readFields(error);
  const classification = classifyStorageError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Message:     ${fields.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (error instanceof StorageError) {
    formatted += `  Operation:   ${error.operation}\n`;
    if (error.table) {
      formatted += `  Table:       ${error.table}\n`;
    }
  }

  if (fields.code !== undefined) {
    formatted += `  Error Code:  ${fields.code}\n`;
  }

  if (fields.number !== undefined) {
    formatted += `  SQL Number:  ${fields.number}\n`;
  }

  if (fields.lineNumber !== undefined) {
    formatted += `  Line:        ${fields.lineNumber}\n`;
  }

  if (fields.procName) {
    formatted += `  Procedure:   ${fields.procName}\n`;
  }

  if (fields.stack) {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${fields.stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}
