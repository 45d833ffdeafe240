// Turns resolved configuration plus the terminal environment into render options

import { resolve } from 'node:path';
import { ConfigError, ERROR_MESSAGES } from '../errors.ts';
import type { RenderOptions } from '../pipeline.ts';
import { realPathSync, type Platform } from '../runtime/mod.ts';
import { defaultSizeFor, parseSize } from '../sizing.ts';
import type { AnsiOutputFormat, ImageFile, TerminalCells } from '../types.ts';
import type { BlockcatConfig } from './config.ts';

export interface RenderEnvironment {
  platform: Platform;
  /** Detected terminal size, null when stdout is not a terminal */
  terminal: TerminalCells | null;
  cwd: string;
}

/**
 * Resolve an image argument to an existing file.
 *
 * @throws ConfigError when the argument is missing or names no file
 */
export function resolveImageFile(name: string | undefined, cwd: string): ImageFile {
  if (name === undefined || name === '') {
    throw new ConfigError(ERROR_MESSAGES.imageRequired());
  }
  try {
    return { name, path: realPathSync(resolve(cwd, name)) };
  } catch {
    throw new ConfigError(ERROR_MESSAGES.imageNotFound(name));
  }
}

/**
 * Size to render at: the configured `NxM`, else the terminal minus one row.
 *
 * @throws ConfigError when neither is available or the size is invalid
 */
export function resolveTerminalCells(size: string | undefined, terminal: TerminalCells | null): TerminalCells {
  if (size !== undefined) {
    return parseSize(size);
  }
  if (!terminal) {
    throw new ConfigError(ERROR_MESSAGES.sizeRequired());
  }
  return parseSize(defaultSizeFor(terminal));
}

/**
 * Pick the escape format, or null for the console attribute grid.
 * The grid is only chosen on Windows with a known terminal size and no
 * explicitly requested format.
 */
export function resolveOutputFormat(
  format: AnsiOutputFormat,
  explicit: boolean,
  platform: Platform,
  terminalKnown: boolean
): AnsiOutputFormat | null {
  if (platform !== 'windows' || !terminalKnown || explicit) {
    return format;
  }
  return null;
}

export function resolveRenderOptions(
  config: BlockcatConfig,
  imageArg: string | undefined,
  env: RenderEnvironment
): RenderOptions {
  return {
    image: resolveImageFile(imageArg, env.cwd),
    terminal: resolveTerminalCells(config.size, env.terminal),
    preserveAspect: !config.force,
    format: resolveOutputFormat(config.ansi, config.ansiExplicit, env.platform, env.terminal !== null),
    platform: env.platform,
  };
}
