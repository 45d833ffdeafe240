// Core types for the blockcat rendering pipeline

/**
 * An RGB colour sample, each channel 0-255.
 */
export type Rgb = readonly [r: number, g: number, b: number];

/**
 * Ordered reference colours for nearest-colour approximation.
 * Indices are stable and key the escape tables.
 */
export type Palette = readonly Rgb[];

/**
 * Decoded pixels in row-major order.
 * Pixels without an alpha channel (bytesPerPixel 3) are opaque.
 */
export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8ClampedArray;
  bytesPerPixel: 3 | 4;
}

/**
 * Matched palette indices for one terminal cell:
 * the upper pixel's foreground and the lower pixel's background.
 */
export type ColourPair = readonly [upper: number, lower: number];

/**
 * Line-major table of colour pairs: rows are terminal lines, columns are cells.
 */
export type ColourTable = ColourPair[][];

/**
 * Size in pixels
 */
export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Size of the output area in character cells
 */
export interface TerminalCells {
  columns: number;
  rows: number;
}

/**
 * Codec identifier produced by format sniffing
 */
export type FormatTag = 'png' | 'jpeg' | 'gif' | 'webp' | 'pnm' | 'tiff' | 'tga' | 'bmp' | 'ico' | 'hdr';

/**
 * Escape-code output styles; `null` selects the console attribute grid
 */
export type AnsiOutputFormat = 'truecolor' | 'simple-black' | 'simple-white' | 'ascii';

export const ANSI_OUTPUT_FORMATS: readonly AnsiOutputFormat[] = ['truecolor', 'simple-black', 'simple-white', 'ascii'];

/**
 * An image file as named by the user, plus its resolved path
 */
export interface ImageFile {
  name: string;
  path: string;
}

/**
 * Byte-oriented output destination for escape-coded text
 */
export interface OutputSink {
  write(chunk: string): void;
}
