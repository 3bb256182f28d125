import { Command, InvalidArgumentError, Option } from 'commander';
import type { RunConfig, SyncMode } from './types.js';

export const DEFAULT_MAX_FOLLOWS = 5;
export const DEFAULT_MAX_UNFOLLOWS = 5;

interface CliOptions {
  mode: SyncMode;
  maxFollows: number;
  maxUnfollows: number;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

export function buildProgram(): Command {
  return new Command()
    .name('github-follow-sync')
    .description('Safe GitHub follow sync: follow back followers, unfollow non-followers')
    .version('1.0.0')
    .addOption(
      new Option('--mode <mode>', 'Run mode')
        .choices(['dry-run', 'execute'])
        .default('dry-run'),
    )
    .option('--max-follows <number>', 'Maximum users to follow', parseCount, DEFAULT_MAX_FOLLOWS)
    .option('--max-unfollows <number>', 'Maximum users to unfollow', parseCount, DEFAULT_MAX_UNFOLLOWS);
}

/** Parses user arguments (without the node and script entries). */
export function parseRunConfig(args: readonly string[], program: Command = buildProgram()): RunConfig {
  program.parse([...args], { from: 'user' });
  const opts = program.opts<CliOptions>();

  return {
    mode: opts.mode,
    maxFollows: opts.maxFollows,
    maxUnfollows: opts.maxUnfollows,
  };
}
