// Nearest palette colour by "redmean" distance.
// A weighted Euclidean approximation of perceived colour difference in which
// the red and blue weights shift with the average redness of the two colours.
// See https://en.wikipedia.org/wiki/Color_difference#Euclidean

import type { Palette, Rgb } from '../types.ts';

/**
 * Squared redmean distance between two colours.
 */
export function redmeanDistance(a: Rgb, b: Rgb): number {
  const rMean = (a[0] + b[0]) / 2;
  const dr = a[0] - b[0];
  const dg = a[1] - b[1];
  const db = a[2] - b[2];
  return (2 + rMean / 256) * dr * dr +
         4 * dg * dg +
         (2 + (255 - rMean) / 256) * db * db;
}

/**
 * Index of the palette entry closest to `pixel`.
 * Ties go to the lowest index. The palette must not be empty.
 */
export function closestColour(pixel: Rgb, palette: Palette): number {
  let nearest = 0;
  let minDist = Infinity;

  for (let i = 0; i < palette.length; i++) {
    const dist = redmeanDistance(palette[i], pixel);
    // Strict comparison keeps the first minimum
    if (dist < minDist) {
      minDist = dist;
      nearest = i;
    }
  }

  return nearest;
}
