/**
 * CLI argument parsing and command dispatch
 */

import { z } from 'zod';
import { InsightsLevelSchema } from '../schemas/index.js';
import type { InsightsLevel } from '../schemas/index.js';
import type { AdsReportingOperations } from './client.js';
import { ValidationError } from './errors.js';

export const CliCommandSchema = z.enum([
  'list-accounts',
  'list-campaigns',
  'list-adsets',
  'list-ads',
  'account-insights',
  'campaign-insights',
]);

export type CliCommand = z.infer<typeof CliCommandSchema>;

export interface CliArgs {
  command?: CliCommand;
  account?: string;
  status?: string;
  since?: string;
  until?: string;
  fields?: string[];
  level?: InsightsLevel;
  breakdowns?: string[];
  timeIncrement?: string;
  actionTypes?: string[];
  raw: boolean;
  coerce: boolean;
  config?: string;
  output?: string;
  help: boolean;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function requireValue(option: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`Missing value for ${option}`, { field: option.slice(2) });
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { raw: false, coerce: true, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--command': {
        const value = requireValue(arg, args[++i]);
        const parsed = CliCommandSchema.safeParse(value);
        if (!parsed.success) {
          throw new ValidationError(`Unknown command: ${value}`, { field: 'command' });
        }
        result.command = parsed.data;
        break;
      }
      case '--account':
        result.account = requireValue(arg, args[++i]);
        break;
      case '--status':
        result.status = requireValue(arg, args[++i]);
        break;
      case '--since':
        result.since = requireValue(arg, args[++i]);
        break;
      case '--until':
        result.until = requireValue(arg, args[++i]);
        break;
      case '--fields':
        result.fields = splitList(requireValue(arg, args[++i]));
        break;
      case '--level': {
        const value = requireValue(arg, args[++i]);
        const parsed = InsightsLevelSchema.safeParse(value);
        if (!parsed.success) {
          throw new ValidationError(`Unknown level: ${value}`, { field: 'level' });
        }
        result.level = parsed.data;
        break;
      }
      case '--breakdowns':
        result.breakdowns = splitList(requireValue(arg, args[++i]));
        break;
      case '--timeIncrement':
        result.timeIncrement = requireValue(arg, args[++i]);
        break;
      case '--actionTypes':
        result.actionTypes = splitList(requireValue(arg, args[++i]));
        break;
      case '--raw':
        result.raw = true;
        break;
      case '--no-coerce':
        result.coerce = false;
        break;
      case '--config':
        result.config = requireValue(arg, args[++i]);
        break;
      case '--output':
        result.output = requireValue(arg, args[++i]);
        break;
      case '--help':
        result.help = true;
        break;
      default:
        throw new ValidationError(`Unknown option: ${arg}`);
    }
  }

  if (!result.help && !result.command) {
    throw new ValidationError('--command is required', { field: 'command' });
  }

  return result;
}

export function printHelp(): void {
  console.log(`
Ads Insights Fetcher CLI

Usage:
  npx tsx src/run.ts --command <name> [options]

Commands:
  list-accounts        List every accessible ad account
  list-campaigns       List campaigns of an account
  list-adsets          List ad sets of an account
  list-ads             List ads of an account
  account-insights     Fetch insights at any level
  campaign-insights    Fetch insights broken down by campaign

Options:
  --account <id>           Ad account ID (with or without 'act_' prefix)
  --status <status>        Keep only entities with this exact status (e.g. ACTIVE)
  --since <date>           Report start date (YYYY-MM-DD)
  --until <date>           Report end date (YYYY-MM-DD)
  --fields <a,b,...>       Insights fields to retrieve
  --level <level>          account, campaign, adset or ad (default: account)
  --breakdowns <a,b,...>   Segmentation dimensions (e.g. age,gender)
  --timeIncrement <n>      Day count, 'monthly' or 'all_days'
  --actionTypes <a,b,...>  Only flatten these action types
  --raw                    Keep nested action arrays
  --no-coerce              Keep metric fields such as spend as strings
  --config <path>          Path to a JSON config file
  --output <path>          Output file path (default: stdout)
  --help                   Show this help message

Environment:
  META_ACCESS_TOKEN        Access token (required)
  META_API_VERSION         Graph API version (default: v21.0)
  META_BASE_URL            Graph API base URL
  META_MAX_RETRIES         Retries after a rate-limit response (default: 3)
  META_RETRY_BASE_DELAY_MS First backoff delay in ms (default: 1000)
  META_MAX_RETRY_DELAY_MS  Longest backoff delay in ms (default: 60000)
  META_TIMEOUT_MS          Per-request timeout in ms (default: 30000)
  META_PAGE_SIZE           Records per page (default: 500)
  META_MAX_PAGES           Maximum pages per fetch (default: unlimited)

Examples:
  npx tsx src/run.ts --command list-campaigns --account 123456 --status ACTIVE
  npx tsx src/run.ts --command campaign-insights --account 123456 \\
    --since 2024-01-01 --until 2024-01-31 --fields campaign_name,spend,actions --timeIncrement 1
`);
}

function requireAccount(args: CliArgs): string {
  if (!args.account) {
    throw new ValidationError('--account is required for this command', { field: 'account' });
  }
  return args.account;
}

/**
 * Run the parsed command against a set of reporting operations
 */
export async function runCommand(operations: AdsReportingOperations, args: CliArgs): Promise<unknown[]> {
  const insightsQuery = () => ({
    accountId: requireAccount(args),
    startDate: args.since ?? '',
    endDate: args.until ?? '',
    fields: args.fields ?? [],
    breakdowns: args.breakdowns,
    timeIncrement: args.timeIncrement,
    actionTypes: args.actionTypes,
    flattenActions: !args.raw,
    coerceNumeric: args.coerce,
  });

  switch (args.command) {
    case 'list-accounts':
      return operations.listAdAccounts();
    case 'list-campaigns':
      return operations.listCampaigns(requireAccount(args), args.status);
    case 'list-adsets':
      return operations.listAdSets(requireAccount(args), args.status);
    case 'list-ads':
      return operations.listAds(requireAccount(args), args.status);
    case 'account-insights':
      return operations.getAccountInsights({ ...insightsQuery(), level: args.level });
    case 'campaign-insights':
      return operations.getCampaignInsights(insightsQuery());
    case undefined:
      throw new ValidationError('--command is required', { field: 'command' });
  }
}
