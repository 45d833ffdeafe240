/**
 * Pixel buffer access helpers.
 *
 * Buffers are row-major with 3 (RGB) or 4 (RGBA) bytes per pixel. RGB
 * buffers have no alpha channel and read back as fully opaque.
 */

import type { PixelBuffer, Rgb } from '../types.ts';

/**
 * Create a buffer, zero-filled unless data is given.
 */
export function createPixelBuffer(
  width: number,
  height: number,
  bytesPerPixel: 3 | 4 = 4,
  data?: ArrayLike<number>
): PixelBuffer {
  const buffer = new Uint8ClampedArray(width * height * bytesPerPixel);
  if (data) {
    if (data.length !== buffer.length) {
      throw new Error(`Pixel data has ${data.length} bytes, expected ${buffer.length} for ${width}x${height}x${bytesPerPixel}`);
    }
    buffer.set(data);
  }
  return { width, height, data: buffer, bytesPerPixel };
}

/**
 * RGB of the pixel at (x, y)
 */
export function rgbAt(image: PixelBuffer, x: number, y: number): Rgb {
  const i = (y * image.width + x) * image.bytesPerPixel;
  return [image.data[i], image.data[i + 1], image.data[i + 2]];
}

/**
 * Alpha of the pixel at (x, y); 255 for RGB buffers
 */
export function alphaAt(image: PixelBuffer, x: number, y: number): number {
  if (image.bytesPerPixel === 3) return 255;
  return image.data[(y * image.width + x) * 4 + 3];
}
