// 16-colour ANSI renderer

import { ANSI_BG_COLOUR_ESCAPES, ANSI_COLOUR_ESCAPES, ANSI_RESET_ATTRIBUTES, HALF_BLOCK } from '../ansi-output.ts';
import { backgroundColoursFor } from '../color16-palette.ts';
import { buildColourTable } from '../colour-table.ts';
import type { OutputSink, Palette, PixelBuffer } from '../types.ts';
import type { Renderer } from './types.ts';

/**
 * Approximates the image to a terminal's 16 foreground and 8 background colours.
 * The palette describes what the terminal shows for each escape.
 */
export class AnsiRenderer implements Renderer {
  readonly kind = 'ansi';

  constructor(private readonly _palette: Palette) {}

  render(image: PixelBuffer, sink: OutputSink): void {
    const table = buildColourTable(image, this._palette, backgroundColoursFor(this._palette));

    for (const line of table) {
      let out = '';
      for (const [upper, lower] of line) {
        out += ANSI_COLOUR_ESCAPES[upper] + ANSI_BG_COLOUR_ESCAPES[lower] + HALF_BLOCK;
      }
      sink.write(out + ANSI_RESET_ATTRIBUTES + '\n');
    }
  }
}
