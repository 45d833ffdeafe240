// Renderer exports and selection by output format

import { ANSI_COLOURS_BLACK_BG, ANSI_COLOURS_WHITE_BG } from '../color16-palette.ts';
import type { Platform } from '../runtime/mod.ts';
import type { AnsiOutputFormat } from '../types.ts';
import { AnsiRenderer } from './ansi.ts';
import { AsciiRenderer } from './ascii.ts';
import { createConsoleGridRenderer } from './console-grid.ts';
import { TruecolorRenderer } from './truecolor.ts';
import type { ConsoleSurface, Renderer } from './types.ts';

export type { ConsoleState, ConsoleSurface, Renderer, RendererKind } from './types.ts';
export { AnsiRenderer } from './ansi.ts';
export { TruecolorRenderer } from './truecolor.ts';
export { AsciiRenderer, ASCII_RAMP, asciiGlyph, asciiIntensity } from './ascii.ts';
export { ConsoleGridRenderer, NoopConsoleGridRenderer, createConsoleGridRenderer } from './console-grid.ts';

/**
 * Renderer for an output format; `null` means the platform console grid.
 */
export function createRenderer(
  format: AnsiOutputFormat | null,
  platform: Platform,
  surface?: ConsoleSurface
): Renderer {
  switch (format) {
    case 'truecolor':
      return new TruecolorRenderer();
    case 'simple-black':
      return new AnsiRenderer(ANSI_COLOURS_BLACK_BG);
    case 'simple-white':
      return new AnsiRenderer(ANSI_COLOURS_WHITE_BG);
    case 'ascii':
      return new AsciiRenderer();
    case null:
      return createConsoleGridRenderer(platform, surface);
  }
}
