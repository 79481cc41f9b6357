#!/usr/bin/env node

import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { createMiningRun } from './app';
import { CliOptions, USAGE, parseArgs } from './cli/args';
import { Config, loadConfig, loadEnvFile } from './config';
import { ConfigurationError, errorMessage } from './core/errors';

async function main(): Promise<number> {
  let cli: CliOptions;
  let config: Config;
  try {
    cli = parseArgs(process.argv.slice(2));
    if (cli.help) {
      console.log(USAGE);
      return 0;
    }
    loadEnvFile();
    config = loadConfig();
  } catch (error) {
    console.error(errorMessage(error));
    return 1;
  }

  // Initialize logger first
  const logger = new ConsoleLogger(config.logging.level, config.logging.filePath, {
    rotate: config.logging.rotate,
    maxSizeBytes: config.logging.maxSizeMB * 1024 * 1024,
    maxFiles: config.logging.maxFiles,
  });

  try {
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`LLM model: ${config.llm.model}`);
    logger.info(`AnkiConnect: ${config.anki.url} (deck "${config.anki.deckName}")`);
    if (cli.tags.length) logger.info(`Batch tags: ${cli.tags.join(', ')}`);

    const run = createMiningRun(config, cli, logger);
    const summary = await run.execute();
    return summary.fetchFailed ? 1 : 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error('Mining run aborted:', error);
    }
    return 1;
  } finally {
    await logger.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  }
);
