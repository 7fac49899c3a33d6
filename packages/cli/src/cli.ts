#!/usr/bin/env tsx
/**
 * CLI entry point
 *
 * Usage:
 *   driftcheck --config ./driftcheck.config.json [--job nightly_orders] [--format json]
 */

import { dirname, resolve } from 'node:path';
import { ConfigError, loadConfig } from './config.js';
import { Logger, createRunId } from './logger.js';
import { EXIT_FAILED, EXIT_USAGE, USAGE, UsageError, executeConfig, parseCliArgs } from './runner.js';

async function main(): Promise<number> {
  let logger = new Logger();

  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      console.error(USAGE);
      return 0;
    }
    if (!args.configPath) {
      throw new UsageError('--config is required');
    }

    const config = await loadConfig(args.configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    }).child({ runId: createRunId() });

    const { exitCode } = await executeConfig(config, {
      args,
      logger,
      baseDir: dirname(resolve(process.cwd(), args.configPath)),
    });
    return exitCode;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_USAGE;
    }
    logger.error('Run failed', { error });
    return EXIT_FAILED;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_FAILED;
  }
);
