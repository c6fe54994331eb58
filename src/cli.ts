#!/usr/bin/env node

import dotenv from 'dotenv';
import path from 'path';
import sharp from 'sharp';
import { Command } from 'commander';
import { loadSettings, resolveConfigPath, SettingsOverrides } from './config/settings';
import { BatchFramer } from './services/BatchFramer';
import { APP_NAME, configureLogging, createLogger } from './utils/logger';
import { describeError, isFramerError } from './utils/errors';
import { GlobalSettings } from './types';

dotenv.config();

const logger = createLogger('cli');

export type CliOptions = {
  config?: string;
  input?: string;
  output?: string;
  landscapeFrame?: string;
  portraitFrame?: string;
  debug?: boolean;
};

export function buildProgram(): Command {
  return new Command()
    .name(APP_NAME)
    .description('Prepare images for printing on magnets')
    .option('-c, --config <path>', 'Path to JSON configuration file')
    .option('-i, --input <dir>', 'Path to input files directory')
    .option('-o, --output <dir>', 'Path to output files directory')
    .option('-l, --landscape-frame <path>', 'Path to landscape frame file')
    .option('-p, --portrait-frame <path>', 'Path to portrait frame file')
    .option('-d, --debug', 'Run in debug mode');
}

export function parseCliOptions(argv: string[]): CliOptions {
  const program = buildProgram();
  program.parse(argv);
  return program.opts<CliOptions>();
}

export function toOverrides(options: CliOptions): SettingsOverrides {
  return {
    input: options.input,
    output: options.output,
    landscapeFrame: options.landscapeFrame,
    portraitFrame: options.portraitFrame,
    debug: options.debug,
  };
}

export function resolveLogPath(): string {
  return path.resolve(process.env.MAGNET_FRAMER_LOG || `${APP_NAME}.log`);
}

function reportFailure(error: unknown): void {
  if (isFramerError(error)) {
    logger.error(error.message, { code: error.code, ...error.context });
  } else {
    logger.fatal(`Unexpected failure: ${describeError(error)}`, { error });
  }
}

/**
 * Runs one batch and resolves to the process exit code.
 */
export async function run(argv: string[]): Promise<number> {
  const options = parseCliOptions(argv);
  const logFile = resolveLogPath();

  let settings: GlobalSettings;
  try {
    settings = await loadSettings(resolveConfigPath(options.config), toOverrides(options));
  } catch (error) {
    configureLogging({ level: 'info', logFile });
    reportFailure(error);
    return 1;
  }

  configureLogging({ level: settings.debug ? 'debug' : 'info', logFile });
  logger.info(`--- ${APP_NAME} start ---`);

  // Keep libvips from holding decoded files open across a large batch
  sharp.cache(false);

  try {
    const framer = new BatchFramer(settings);
    await framer.verifyDirectories();
    const summary = await framer.processAll();
    logger.debug(`Framed ${summary.processed.length} file(s), skipped ${summary.skipped.length}`);
  } catch (error) {
    reportFailure(error);
    return 1;
  }

  logger.info(`---  ${APP_NAME} End  ---`);
  return 0;
}

if (require.main === module) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
