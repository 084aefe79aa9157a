#!/usr/bin/env node
/**
 * CLI entrypoint for running reporting operations
 *
 * Usage:
 *   npx tsx src/run.ts --command list-accounts
 *   npx tsx src/run.ts --command list-campaigns --account 123456 --status ACTIVE
 *   npx tsx src/run.ts --command account-insights --account 123456 --since 2024-01-01 --until 2024-01-31 --fields spend,actions --level adset
 */

import { writeFile } from 'node:fs/promises';
import { parseArgs, printHelp, runCommand } from './cli.js';
import { AdsReportingClient } from './client.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = await loadConfig({ configPath: args.config });
  const client = new AdsReportingClient(config);

  console.error(`Ads Insights Fetcher CLI`);
  console.error(`Command: ${args.command}`);
  console.error(`Account: ${args.account ?? 'all'}`);
  console.error(`API version: ${config.apiVersion}`);
  console.error('');

  const rows = await runCommand(client, args);
  console.error(`Fetched ${rows.length} records`);

  const json = JSON.stringify(rows, null, 2);

  if (args.output) {
    await writeFile(args.output, json);
    console.error(`Output written to: ${args.output}`);
  } else {
    console.log(json);
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
