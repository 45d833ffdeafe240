// Output size planning for half-block rendering
// Each terminal row shows two pixel rows: the upper pixel as foreground, the lower as background

import { ConfigError, ERROR_MESSAGES } from './errors.ts';
import type { Dimensions, TerminalCells } from './types.ts';

/**
 * Get the pixel size to downscale an image to, given its size, the terminal's
 * size and whether to preserve its aspect ratio.
 *
 * The unconstrained target is twice as tall as the terminal. With aspect
 * preservation the image is scaled by whichever axis binds, so the result
 * never exceeds `columns x rows*2`.
 *
 * @example
 * planImageSize({ width: 100, height: 50 }, { columns: 40, rows: 25 }, true)  // → 40x20
 * planImageSize({ width: 100, height: 50 }, { columns: 40, rows: 25 }, false) // → 40x50
 */
export function planImageSize(
  source: Dimensions,
  terminal: TerminalCells,
  preserveAspect: boolean
): Dimensions {
  const targetWidth = terminal.columns;
  const targetHeight = terminal.rows * 2;

  if (!preserveAspect) {
    return { width: targetWidth, height: targetHeight };
  }

  // Computed in single precision
  const f = Math.fround;
  const ratio = f(f(source.width) / f(source.height));
  const targetRatio = f(f(targetWidth) / f(targetHeight));

  const scale = targetRatio > ratio
    ? f(f(targetHeight) / f(source.height))
    : f(f(targetWidth) / f(source.width));

  return {
    width: Math.trunc(f(source.width * scale)),
    height: Math.trunc(f(source.height * scale)),
  };
}

/**
 * Clamp a planned size onto the half-block grid: at least one column, and an
 * even height of at least two so every terminal row has its lower pixel.
 */
export function fitHalfBlockGrid(size: Dimensions): Dimensions {
  return {
    width: Math.max(1, size.width),
    height: Math.max(2, size.height - (size.height % 2)),
  };
}

/**
 * Fail fast when a buffer cannot be split into (upper, lower) row pairs.
 */
export function assertEvenHeight(size: Dimensions): void {
  if (size.height % 2 !== 0) {
    throw new ConfigError(ERROR_MESSAGES.oddHeight(size.height));
  }
}

/**
 * Parse a terminal size given as `NxM` (or `NXM`) into columns and rows.
 *
 * @throws ConfigError on malformed input or a zero component
 */
export function parseSize(value: string): TerminalCells {
  const match = /^(\d+)[xX](\d+)$/.exec(value.trim());
  if (!match) {
    throw new ConfigError(ERROR_MESSAGES.invalidSize(value));
  }

  const columns = parseInt(match[1], 10);
  const rows = parseInt(match[2], 10);
  if (columns === 0 || rows === 0) {
    throw new ConfigError(ERROR_MESSAGES.zeroSize());
  }
  return { columns, rows };
}

/**
 * Default size for the current terminal: full width, one row short so the
 * prompt that follows does not scroll the image.
 */
export function defaultSizeFor(terminal: TerminalCells): string {
  return `${terminal.columns}x${Math.max(1, terminal.rows - 1)}`;
}
