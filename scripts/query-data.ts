/**
 * Query Loaded Climate Data
 * =========================
 * Read-only lookups over the loaded ASCOR and TPI tables.
 *
 * Usage:
 *   npx tsx scripts/query-data.ts <command> [arguments] [options]
 *
 * Commands:
 *   companies              Companies with latest MQ level and 2035 CP alignment
 *                          (--sector=, --geography=, --version=)
 *   company <name>         MQ history of one company
 *   mq-latest              Latest MQ assessment per company
 *   cp-compare <name>      CP alignment, latest vs previous assessment year
 *   sectors                Sectors present in the company table
 *   countries              ASCOR countries (--region=)
 *   country <name> [year]  Assessment results of a country
 *   audit [limit]          Most recent audit log entries (default 20)
 *
 * Paging options: --page=<n> (default 1), --page-size=<n> (default 20, max 100)
 */

import * as dotenv from 'dotenv';
import { loadConfig } from './lib/config-loader';
import { ConsoleLogger } from './lib/logger';
import { createPool } from './lib/db';
import { formatError } from './lib/error-handler';
import { QueryParameterError } from './lib/errors';
import { MssqlAuditLog } from './lib/audit-log';
import { MssqlQueryExecutor } from './query/query-executor';
import { PageRequest, QueryService } from './query/query-service';
import { CompanyDataAccess } from './query/company-data-access';

dotenv.config();

function option(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find(arg => arg.startsWith(prefix))?.slice(prefix.length);
}

function numberOption(args: readonly string[], name: string, fallback: number): number {
  const raw = option(args, name);
  return raw === undefined ? fallback : Number(raw);
}

function pageRequest(args: readonly string[]): PageRequest {
  return { page: numberOption(args, 'page', 1), pageSize: numberOption(args, 'page-size', 20) };
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const positional = args.filter(arg => !arg.startsWith('--'));
  const [command, first, second] = positional;
  const config = loadConfig();
  const logger = new ConsoleLogger(config.debugMode);

  if (!command) {
    logger.error('Usage: query-data <companies|company|mq-latest|cp-compare|sectors|countries|country|audit> [arguments]');
    process.exit(1);
  }

  const pool = await createPool(config);
  try {
    const service = new QueryService(new MssqlQueryExecutor(pool), config.database.schemas);

    switch (command) {
      case 'companies':
        print(
          await service.listCompanies(pageRequest(args), {
            sector: option(args, 'sector'),
            geography: option(args, 'geography'),
            version: option(args, 'version'),
          })
        );
        break;
      case 'company': {
        const history = await service.getCompanyHistory(first ?? '');
        if (!history) logger.warn(`No MQ assessments found for ${first}`);
        else print(history);
        break;
      }
      case 'mq-latest':
        print(await service.getLatestMqAssessments(pageRequest(args)));
        break;
      case 'cp-compare': {
        const comparison = await service.getCpComparison(first ?? '');
        if (!comparison) logger.warn(`${first} has fewer than two CP assessment years`);
        else print(comparison);
        break;
      }
      case 'sectors':
        print(await new CompanyDataAccess(new MssqlQueryExecutor(pool), config.database.schemas.tpi).sectors());
        break;
      case 'countries':
        print(await service.listCountries(pageRequest(args), { region: option(args, 'region') }));
        break;
      case 'country': {
        const assessment = await service.getCountryAssessment(first ?? '', second === undefined ? undefined : Number(second));
        if (!assessment) logger.warn(`Unknown country: ${first}`);
        else print(assessment);
        break;
      }
      case 'audit':
        print(await new MssqlAuditLog(pool, config.database.schemas.audit).recent(first === undefined ? 20 : Number(first)));
        break;
      default:
        logger.error(`Unknown command: ${command}`);
        process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof QueryParameterError) {
      logger.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await pool.close();
  }
}

main().catch(error => {
  console.error(formatError(error));
  process.exit(1);
});
