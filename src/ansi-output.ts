// ANSI escape sequences for half-block image output

export const ESC = '\x1b';

/** Upper half block: foreground paints the upper pixel, background the lower. */
export const HALF_BLOCK = '▀';

/** Reset all attributes */
export const ANSI_RESET_ATTRIBUTES = `${ESC}[0m`;

/**
 * Foreground escapes, indexed like the 16-colour palettes:
 * SGR 30-37 normal (`0;`) then bold (`1;`).
 */
export const ANSI_COLOUR_ESCAPES: readonly string[] = [
  ...[30, 31, 32, 33, 34, 35, 36, 37].map((code) => `${ESC}[0;${code}m`),
  ...[30, 31, 32, 33, 34, 35, 36, 37].map((code) => `${ESC}[1;${code}m`),
];

/** Background escapes, SGR 40-47 */
export const ANSI_BG_COLOUR_ESCAPES: readonly string[] =
  [40, 41, 42, 43, 44, 45, 46, 47].map((code) => `${ESC}[${code}m`);

/** 24-bit foreground colour */
export function truecolorForeground(r: number, g: number, b: number): string {
  return `${ESC}[38;2;${r};${g};${b}m`;
}

/** 24-bit background colour */
export function truecolorBackground(r: number, g: number, b: number): string {
  return `${ESC}[48;2;${r};${g};${b}m`;
}
