// blockcat command line: argument handling, configuration and error reporting

import pkg from '../package.json' with { type: 'json' };
import {
  BlockcatConfig,
  generateEnvVarHelp,
  generateFlagHelp,
  parseCliFlags,
  resolveRenderOptions,
  type RenderEnvironment,
} from './config/mod.ts';
import { ConfigError, ensureError, ERROR_MESSAGES, exitCodeFor, printError } from './errors.ts';
import { createLogger, getLogger, setGlobalLogger } from './logging.ts';
import { renderFile } from './pipeline.ts';
import type { ConsoleSurface } from './renderers/mod.ts';
import type { OutputSink } from './types.ts';

const logger = getLogger('cli');

export const VERSION: string = pkg.version;

export interface CliIO {
  stdout: OutputSink;
  stderr: OutputSink;
  env: RenderEnvironment;
  surface?: ConsoleSurface;
  /** Config file override, mainly for tests */
  configPath?: string;
}

export function printUsage(write: (text: string) => void): void {
  const lines = [
    'blockcat - display an image in the terminal',
    '',
    'Usage:',
    '  blockcat [options] <image>',
    '',
    'Arguments:',
    '  <image>  PNG, JPEG or GIF file; the format is guessed from the extension or contents',
    '',
    'Options:',
    generateFlagHelp(),
    '      --print-config             Show the resolved configuration and exit',
    '  -h, --help                     Show this help message',
    '  -V, --version                  Show the version',
    '',
    'Environment variables:',
    generateEnvVarHelp(),
    '',
  ];
  write(lines.join('\n') + '\n');
}

/**
 * Run the CLI once and return the process exit code.
 */
export function run(args: string[], io: CliIO): number {
  const write = (text: string) => io.stderr.write(text);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage((text) => io.stdout.write(text));
    return 0;
  }
  if (args.includes('--version') || args.includes('-V')) {
    io.stdout.write(`blockcat ${VERSION}\n`);
    return 0;
  }

  try {
    const { flags, remaining } = parseCliFlags(args);

    const printConfig = remaining.includes('--print-config');
    const positional = remaining.filter((arg) => arg !== '--print-config');
    const unknown = positional.find((arg) => arg.startsWith('-') && arg !== '-');
    if (unknown !== undefined) {
      throw new ConfigError(ERROR_MESSAGES.unknownFlag(unknown));
    }

    const config = BlockcatConfig.load({ cliFlags: flags, configPath: io.configPath });
    setGlobalLogger(createLogger({ logFile: config.logFile, level: config.logLevel }));

    if (printConfig) {
      io.stdout.write(config.getConfigText() + '\n');
      return 0;
    }

    const options = resolveRenderOptions(config, positional[0], io.env);
    renderFile({ ...options, surface: io.surface }, io.stdout);
    return 0;
  } catch (error) {
    logger.error('render failed', ensureError(error));
    printError(error, write);
    return exitCodeFor(error);
  }
}
