// 16-colour terminal palettes, in the same order as ANSI_COLOUR_ESCAPES.
// Entries 0-7 are the normal colours (SGR 30-37), 8-15 their bold variants.

import type { Palette, Rgb } from './types.ts';

/**
 * ANSI colours as shown by a white-background terminal (Solarized light).
 */
export const ANSI_COLOURS_WHITE_BG: Palette = [
  [0xEE, 0xE8, 0xD5],
  [0xDC, 0x32, 0x2F],
  [0x85, 0x99, 0x00],
  [0xB5, 0x89, 0x00],
  [0x26, 0x8B, 0xD2],
  [0xD3, 0x36, 0x82],
  [0x2A, 0xA1, 0x98],
  [0x07, 0x36, 0x42],

  [0xFD, 0xF6, 0xE3],
  [0xCB, 0x4B, 0x16],
  [0x93, 0xA1, 0xA1],
  [0x83, 0x94, 0x96],
  [0x65, 0x7B, 0x83],
  [0x6C, 0x71, 0xC4],
  [0x58, 0x6E, 0x75],
  [0x00, 0x2B, 0x36],
];

/**
 * Linux-theme ANSI colours for a black-background terminal: st's default
 * `colorname` table, decoded via the X11 colour names.
 *
 * black, red3, green3, yellow3, blue2, magenta3, cyan3, gray90,
 * gray50, red, green, yellow, #5c5cff, magenta, cyan, white
 */
export const ANSI_COLOURS_BLACK_BG: Palette = [
  [0x00, 0x00, 0x00],
  [0xCD, 0x00, 0x00],
  [0x00, 0xCD, 0x00],
  [0xCD, 0xCD, 0x00],
  [0x00, 0x00, 0xEE],
  [0xCD, 0x00, 0xCD],
  [0x00, 0xCD, 0xCD],
  [0xE6, 0xE6, 0xE6],

  [0x80, 0x80, 0x80],
  [0xFF, 0x00, 0x00],
  [0x00, 0xFF, 0x00],
  [0xFF, 0xFF, 0x00],
  [0x5C, 0x5C, 0xFF],
  [0xFF, 0x00, 0xFF],
  [0x00, 0xFF, 0xFF],
  [0xFF, 0xFF, 0xFF],
];

/** Background escapes only address the 8 normal colours. */
export const BACKGROUND_COLOUR_COUNT = 8;

/**
 * Background colour set for a foreground palette: its first 8 entries.
 */
export function backgroundColoursFor(foreground: Palette): Palette {
  return foreground.slice(0, BACKGROUND_COLOUR_COUNT);
}

/**
 * Unpack a console colour reference (0x00BBGGRR) into RGB.
 */
export function colorRefToRgb(ref: number): Rgb {
  return [ref & 0xFF, (ref >> 8) & 0xFF, (ref >> 16) & 0xFF];
}
