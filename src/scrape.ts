#!/usr/bin/env node
import { parseArgs } from './config.js';
import { runScrapePipeline } from './pipeline/run.js';

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));
  await runScrapePipeline(config);
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(`Scrape run failed: ${String(error)}`);
  process.exitCode = 1;
});
