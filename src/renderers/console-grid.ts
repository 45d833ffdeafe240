// Console attribute grid renderer.
// Colours cells by setting console attribute nibbles instead of writing escapes.

import { HALF_BLOCK } from '../ansi-output.ts';
import { colorRefToRgb } from '../color16-palette.ts';
import { buildColourTable } from '../colour-table.ts';
import { getLogger } from '../logging.ts';
import type { Platform } from '../runtime/mod.ts';
import { assertEvenHeight } from '../sizing.ts';
import type { OutputSink, PixelBuffer } from '../types.ts';
import type { ConsoleSurface, Renderer } from './types.ts';

const logger = getLogger('console-grid');

/**
 * Draws the image by pre-filling the region with half blocks, then matching
 * every cell against the console's live 16-colour table and setting the
 * cell's foreground (low nibble) and background (high nibble) attributes.
 * The output sink is not used.
 */
export class ConsoleGridRenderer implements Renderer {
  readonly kind = 'console-grid';

  constructor(private readonly _surface: ConsoleSurface) {}

  render(image: PixelBuffer, _sink: OutputSink): void {
    assertEvenHeight(image);
    const termHeight = image.height / 2;

    this._surface.writeText(`${HALF_BLOCK.repeat(image.width)}\n`.repeat(termHeight));

    const state = this._surface.getState();
    const colours = state.colorTable.map(colorRefToRgb);
    const table = buildColourTable(image, colours, colours);
    const baseAttributes = state.attributes & 0xFF00;

    table.forEach((line, y) => {
      line.forEach(([upper, lower], x) => {
        this._surface.fillAttribute(
          baseAttributes | (lower << 4) | upper,
          x,
          state.cursorRow - (termHeight - y)
        );
      });
    });
  }
}

/**
 * Console grid for platforms without console attributes: draws nothing.
 */
export class NoopConsoleGridRenderer implements Renderer {
  readonly kind = 'console-grid';

  render(_image: PixelBuffer, _sink: OutputSink): void {
    logger.debug('console attribute output unavailable on this platform');
  }
}

/**
 * Pick the console grid variant for a platform. Only Windows consoles have
 * attribute grids, and only when a surface binding is supplied.
 */
export function createConsoleGridRenderer(platform: Platform, surface?: ConsoleSurface): Renderer {
  if (platform === 'windows' && surface) {
    return new ConsoleGridRenderer(surface);
  }
  return new NoopConsoleGridRenderer();
}
