#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { parseConfigFile } from './config/parser.js';
import { runTracker, type TrackerDependencies } from './tracker.js';
import { formatSyncSummary } from './tracking/engine.js';
import { createLogger, type Logger } from './utils/logger.js';

export interface CommandOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

export interface CommandContext {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  print?: (text: string) => void;
  dependencies?: TrackerDependencies;
}

/**
 * Run the tracker for one config file and return the process exit code
 */
export async function runCommand(
  configPath: string,
  options: CommandOptions,
  context: CommandContext = {}
): Promise<number> {
  const logger = context.logger ?? createLogger({ level: options.verbose ? 'debug' : 'info' });
  const print = context.print ?? ((text: string) => console.log(text));

  try {
    const config = parseConfigFile(configPath, context.env ?? process.env);
    if (options.dryRun) {
      logger.info('Dry run: no issues or comments will be written');
    }

    const result = await runTracker(config, {
      dryRun: options.dryRun,
      logger,
      dependencies: context.dependencies,
    });

    if (result.status === 'completed') {
      print(formatSyncSummary(result.summary));
    }
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

export function createProgram(context: CommandContext = {}): Command {
  const program = new Command();

  program
    .name('wg-tracker')
    .description('File tracking issues for working group resolutions')
    .version('0.1.0')
    .argument('<config>', 'Path to the YAML configuration file')
    .option('--dry-run', 'Show what would be filed without writing anything')
    .option('-v, --verbose', 'Print debug output')
    .action(async (configPath: string, opts: CommandOptions) => {
      process.exitCode = await runCommand(configPath, opts, context);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

const entry = process.argv[1];
if (entry && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
