import * as fs from 'fs';
import * as path from 'path';
import type * as sql from 'mssql';
import { DATE_TOKEN_FORMATS, DateTokenFormat } from './file-resolver';

export interface ETLConfig {
  database: {
    connectionString: string;
    schemas: {
      ascor: string;  // 'ascor'
      tpi: string;    // 'tpi'
      audit: string;  // 'etl', never dropped
    };
  };
  dataDir: string;
  sources: {
    ascorDirectoryPattern: string;
    tpiDirectoryPattern: string;
    dateFormats: DateTokenFormat[];
  };
  versions: {
    cpVersion: string;
    legacyCompanyVersion: string;
  };
  debugMode: boolean;
}

type FileConfig = {
  database?: {
    connectionString?: string;
    schemas?: Partial<ETLConfig['database']['schemas']>;
  };
  dataDir?: string;
  sources?: Partial<ETLConfig['sources']>;
  versions?: Partial<ETLConfig['versions']>;
  debugMode?: boolean;
};

export type ConfigOverrides = FileConfig;

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  return {
    server: parts['server'] || parts['data source'],
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

function isDateTokenFormat(value: string): value is DateTokenFormat {
  return DATE_TOKEN_FORMATS.some(format => format === value);
}

function parseDateFormats(raw: string | undefined): DateTokenFormat[] | undefined {
  if (!raw) return undefined;
  const formats = raw.split(',').map(f => f.trim().toUpperCase()).filter(isDateTokenFormat);
  return formats.length > 0 ? formats : undefined;
}

function readFileConfig(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  try {
    const parsed: FileConfig | null = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return parsed ?? {};
  } catch (error) {
    console.warn(`⚠️  Warning: Failed to parse ${path.basename(configPath)}: ${error}`);
    return {};
  }
}

/**
 * Load ETL configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Overrides (passed as parameter)
 * 2. Environment variables
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(
  overrides?: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = path.join(process.cwd(), 'appsettings.json')
): ETLConfig {
  const fileConfig = readFileConfig(configPath);

  let connectionString = env.SQLSERVER || '';

  if (!connectionString && (env.SQLSERVER_HOST || env.SQLSERVER_DATABASE)) {
    const server = env.SQLSERVER_HOST;
    const database = env.SQLSERVER_DATABASE;
    const user = env.SQLSERVER_USER;
    const password = env.SQLSERVER_PASSWORD;

    if (server && database && user && password) {
      connectionString = `Server=${server};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
    }
  }

  const rawDateFormats = fileConfig.sources?.dateFormats;
  const fileDateFormats = Array.isArray(rawDateFormats) ? rawDateFormats.filter(isDateTokenFormat) : [];

  const config: ETLConfig = {
    database: {
      connectionString: connectionString || fileConfig.database?.connectionString || '',
      schemas: {
        ascor: env.ASCOR_SCHEMA || fileConfig.database?.schemas?.ascor || 'ascor',
        tpi: env.TPI_SCHEMA || fileConfig.database?.schemas?.tpi || 'tpi',
        audit: env.AUDIT_SCHEMA || fileConfig.database?.schemas?.audit || 'etl',
      }
    },
    dataDir: path.resolve(env.DATA_DIR || fileConfig.dataDir || 'data'),
    sources: {
      ascorDirectoryPattern: env.ASCOR_DIRECTORY_PATTERN || fileConfig.sources?.ascorDirectoryPattern || 'ascor',
      tpiDirectoryPattern: env.TPI_DIRECTORY_PATTERN || fileConfig.sources?.tpiDirectoryPattern || 'TPI_sector_data',
      dateFormats: parseDateFormats(env.SOURCE_DATE_FORMATS)
        ?? (fileDateFormats.length > 0 ? fileDateFormats : [...DATE_TOKEN_FORMATS]),
    },
    versions: {
      cpVersion: env.CP_VERSION || fileConfig.versions?.cpVersion || '5.0',
      legacyCompanyVersion: env.LEGACY_COMPANY_VERSION || fileConfig.versions?.legacyCompanyVersion || '4.0',
    },
    debugMode: env.DEBUG_MODE === 'true' || fileConfig.debugMode || false,
  };

  if (overrides) {
    if (overrides.database?.connectionString) {
      config.database.connectionString = overrides.database.connectionString;
    }
    if (overrides.database?.schemas) {
      Object.assign(config.database.schemas, overrides.database.schemas);
    }
    if (overrides.dataDir) {
      config.dataDir = path.resolve(overrides.dataDir);
    }
    if (overrides.sources) {
      Object.assign(config.sources, overrides.sources);
    }
    if (overrides.versions) {
      Object.assign(config.versions, overrides.versions);
    }
    config.debugMode = overrides.debugMode ?? config.debugMode;
  }

  return config;
}

/**
 * Convert ETL config to mssql config
 */
export function getSqlConfig(config: ETLConfig): sql.config {
  if (!config.database.connectionString) {
    throw new Error('Database connection string is required');
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new Error('Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;');
  }

  return {
    server: parsed.server,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ETLConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.database.connectionString) {
    errors.push('Database connection string is required');
  }

  const schemas = config.database.schemas;
  if (!schemas.ascor) errors.push('ASCOR schema name is required');
  if (!schemas.tpi) errors.push('TPI schema name is required');
  if (!schemas.audit) errors.push('Audit schema name is required');
  if (schemas.audit === schemas.ascor || schemas.audit === schemas.tpi) {
    errors.push('Audit schema must differ from the dataset schemas (dataset drops would remove it)');
  }

  if (!fs.existsSync(config.dataDir)) {
    errors.push(`Data directory not found: ${config.dataDir}`);
  }

  if (!/^\d+\.\d+$/.test(config.versions.cpVersion)) {
    errors.push(`CP version must look like "5.0": ${config.versions.cpVersion}`);
  }
  if (!/^\d+\.\d+$/.test(config.versions.legacyCompanyVersion)) {
    errors.push(`Legacy company version must look like "4.0": ${config.versions.legacyCompanyVersion}`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: ETLConfig, write: (line: string) => void = console.log): void {
  const masked: ETLConfig = {
    ...config,
    database: {
      ...config.database,
      connectionString: config.database.connectionString.replace(/Password=[^;]+/i, 'Password=***'),
    },
  };

  write('\n📋 ETL Configuration:');
  write('════════════════════════════════════════════════════════════════');
  write(JSON.stringify(masked, null, 2));
  write('════════════════════════════════════════════════════════════════\n');
}
