// Colour approximation table: one (upper, lower) palette index pair per terminal cell

import { closestColour } from './color/redmean.ts';
import { assertEvenHeight } from './sizing.ts';
import type { ColourPair, ColourTable, Palette, PixelBuffer } from './types.ts';
import { rgbAt } from './utils/pixel-utils.ts';

/**
 * Create a line-major table of (upper, lower) colour approximation indices.
 *
 * Terminal row `y` covers pixel rows `2y` (matched against `upperColours`)
 * and `2y + 1` (matched against `lowerColours`). The whole image is scanned
 * on every call.
 *
 * @throws ConfigError when the image height is odd
 */
export function buildColourTable(
  image: PixelBuffer,
  upperColours: Palette,
  lowerColours: Palette
): ColourTable {
  assertEvenHeight(image);

  const termHeight = image.height / 2;
  const table: ColourTable = [];

  for (let y = 0; y < termHeight; y++) {
    const upperY = y * 2;
    const lowerY = upperY + 1;
    const line: ColourPair[] = [];

    for (let x = 0; x < image.width; x++) {
      line.push([
        closestColour(rgbAt(image, x, upperY), upperColours),
        closestColour(rgbAt(image, x, lowerY), lowerColours),
      ]);
    }
    table.push(line);
  }

  return table;
}
