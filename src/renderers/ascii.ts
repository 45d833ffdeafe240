// ASCII art renderer: one luminance glyph per pixel on every other row

import type { OutputSink, PixelBuffer } from '../types.ts';
import { alphaAt, rgbAt } from '../utils/pixel-utils.ts';
import type { Renderer } from './types.ts';

/** Glyph ramp, dark to light */
export const ASCII_RAMP = [' ', '.', ',', '-', '~', '+', '=', '@'] as const;

const BUCKET_WIDTH = 32;

/**
 * Integer intensity of a pixel: each channel divided by 3, truncated, then summed.
 * Fully transparent pixels have intensity 0.
 */
export function asciiIntensity(r: number, g: number, b: number, a = 255): number {
  if (a === 0) return 0;
  return Math.floor(r / 3) + Math.floor(g / 3) + Math.floor(b / 3);
}

/**
 * Glyph for an intensity in 0-255.
 */
export function asciiGlyph(intensity: number): string {
  const index = Math.min(ASCII_RAMP.length - 1, Math.max(0, Math.floor(intensity / BUCKET_WIDTH)));
  return ASCII_RAMP[index];
}

/**
 * Odd rows are skipped rather than merged, halving vertical density.
 */
export class AsciiRenderer implements Renderer {
  readonly kind = 'ascii';

  render(image: PixelBuffer, sink: OutputSink): void {
    for (let y = 0; y < image.height; y += 2) {
      let out = '';
      for (let x = 0; x < image.width; x++) {
        const [r, g, b] = rgbAt(image, x, y);
        out += asciiGlyph(asciiIntensity(r, g, b, alphaAt(image, x, y)));
      }
      sink.write(out + '\n');
    }
  }
}
