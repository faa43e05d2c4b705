#!/usr/bin/env node
import { parseArgs } from 'util';
import { TokenExchanger } from '../../application/services/TokenExchanger';
import {
  CallRecordsQuery,
  DirectRoutingCallsQuery,
  PstnCallsQuery,
  MAX_DAYS,
} from '../../application/services/CallRecordsQuery';
import { CallRecordsFetcher } from '../../application/services/CallRecordsFetcher';
import { TeamsUsageError } from '../../application/errors';
import { CallRecordsQueryParams } from '../../application/types/index';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { ChainCredentialProvider } from '../../infrastructure/credentials/ChainCredentialProvider';
import { EnvCredentialProvider } from '../../infrastructure/credentials/EnvCredentialProvider';
import { ConsoleCredentialProvider } from '../../infrastructure/credentials/ConsoleCredentialProvider';
import { FileStorage } from '../../infrastructure/storage/FileStorage';
import { config } from '../../config/index';
import { isOutputFormat, OUTPUT_FORMATS } from './formatters';
import { writeRecords } from './output';

/**
 * CLI Commands
 */
const COMMANDS = {
  TOKEN: 'token',
  PSTN_CALLS: 'pstn-calls',
  DIRECT_ROUTING_CALLS: 'direct-routing-calls',
  HELP: 'help',
} as const;

const OPTIONS = {
  'tenant-id': { type: 'string' },
  token: { type: 'string' },
  'start-date': { type: 'string' },
  'end-date': { type: 'string' },
  days: { type: 'string' },
  format: { type: 'string', default: 'json' },
  output: { type: 'string' },
} as const;

type CliOptions = ReturnType<typeof parseOptions>;

function parseOptions(args: string[]) {
  return parseArgs({ args, options: OPTIONS, allowPositionals: false }).values;
}

function printHelp(): void {
  console.log(`
Teams PSTN usage - CLI

Usage: teams-pstn-usage <command> [options]

Commands:
  token                    Exchange the app credential for an access token
  pstn-calls               Fetch calling-plan usage records
  direct-routing-calls     Fetch direct routing usage records
  help                     Show this help message

Options:
  --tenant-id <guid>       Tenant ID (default: TEAMS_TENANT_ID)
  --token <token>          Access token (default: TEAMS_ACCESS_TOKEN, else exchanged)
  --start-date YYYY-MM-DD  Range start, inclusive (with --end-date)
  --end-date YYYY-MM-DD    Range end, exclusive (with --start-date)
  --days <n>               Last n days including today, 1-${MAX_DAYS}
  --format json|csv|jsonl  Output format (default: json; jsonl streams)
  --output <file>          Write to a file under EXPORT_OUTPUT_DIR instead of stdout

Examples:
  teams-pstn-usage token --tenant-id 00000000-0000-0000-0000-000000000000
  teams-pstn-usage pstn-calls --days 7
  teams-pstn-usage direct-routing-calls --start-date 2020-04-01 --end-date 2020-04-08 --format csv
`);
}

/**
 * Exit with a message on stderr
 */
function fail(message: string): never {
  console.error(`✗ ${message}`);
  process.exit(1);
}

function buildTokenExchanger(httpClient: HttpClient): TokenExchanger {
  const credentialProvider = new ChainCredentialProvider(
    new EnvCredentialProvider(),
    new ConsoleCredentialProvider()
  );
  return new TokenExchanger(httpClient, credentialProvider);
}

async function requestToken(httpClient: HttpClient, options: CliOptions): Promise<string> {
  const tenantId = options['tenant-id'] || config.auth.tenantId;
  if (!tenantId) {
    fail('Tenant ID is required. Pass --tenant-id or set TEAMS_TENANT_ID.');
  }

  const result = await buildTokenExchanger(httpClient).exchange(tenantId);
  if (!result.success) {
    fail(result.error.message);
  }

  return result.data;
}

/**
 * Handle token command
 */
async function handleToken(options: CliOptions): Promise<void> {
  const token = await requestToken(new HttpClient(), options);
  console.log(token);
}

function toQueryParams(options: CliOptions): CallRecordsQueryParams {
  return {
    startDate: options['start-date'],
    endDate: options['end-date'],
    days: options.days === undefined ? undefined : Number(options.days),
  };
}

/**
 * Handle pstn-calls / direct-routing-calls
 */
async function handleCallRecords(
  createQuery: (fetcher: CallRecordsFetcher) => CallRecordsQuery,
  options: CliOptions
): Promise<void> {
  const format = options.format ?? 'json';
  if (!isOutputFormat(format)) {
    fail(`Unknown format "${format}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  const httpClient = new HttpClient();
  const query = createQuery(new CallRecordsFetcher(httpClient));
  const params = toQueryParams(options);

  // Validate before spending a token request on bad arguments.
  query.buildUrl(params);

  const token = options.token || config.auth.accessToken || (await requestToken(httpClient, options));

  const records = query.run(token, params);
  const outputFile = options.output;

  if (!outputFile) {
    await writeRecords(records, format, chunk => {
      process.stdout.write(chunk);
    });
    return;
  }

  const storage = new FileStorage();
  const chunks: string[] = [];
  let count: number;
  try {
    count = await writeRecords(records, format, chunk => {
      chunks.push(chunk);
    });
  } catch (error) {
    if (chunks.length > 0) {
      const filePath = await storage.save(outputFile, chunks.join(''));
      console.error(`✗ Partial results written to ${filePath}`);
    }
    throw error;
  }

  const filePath = await storage.save(outputFile, chunks.join(''));
  console.error(`✓ ${count} records written to ${filePath}`);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const [commandArg, ...rest] = process.argv.slice(2);
  const command = commandArg?.toLowerCase();

  if (!command || command === COMMANDS.HELP) {
    printHelp();
    return;
  }

  let options: CliOptions;
  try {
    options = parseOptions(rest);
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
  }

  switch (command) {
    case COMMANDS.TOKEN:
      await handleToken(options);
      break;

    case COMMANDS.PSTN_CALLS:
      await handleCallRecords(fetcher => new PstnCallsQuery(fetcher), options);
      break;

    case COMMANDS.DIRECT_ROUTING_CALLS:
      await handleCallRecords(fetcher => new DirectRoutingCallsQuery(fetcher), options);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof TeamsUsageError) {
    fail(error.message);
  }
  console.error('Fatal error:', error);
  process.exit(1);
});
