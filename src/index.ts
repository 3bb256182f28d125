#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { parseRunConfig } from './cli.js';
import { resolveApiConfig } from './config.js';
import { describeError } from './errors.js';
import { GitHubClient } from './github.js';
import { formatSummary, runSync } from './run.js';

loadEnv();

const runConfig = parseRunConfig(process.argv.slice(2));

async function main() {
  // Throws before any request when the token is missing
  const apiConfig = resolveApiConfig();

  console.error('Starting GitHub follow sync...');
  console.error(`Mode: ${runConfig.mode}`);
  console.error(`Max follows: ${runConfig.maxFollows}`);
  console.error(`Max unfollows: ${runConfig.maxUnfollows}`);

  const client = GitHubClient.fromConfig(apiConfig);
  const summary = await runSync(client, runConfig);

  console.error(`\n${formatSummary(summary, runConfig)}`);
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
