// 24-bit ANSI renderer: literal pixel colours, no palette matching

import { ANSI_RESET_ATTRIBUTES, HALF_BLOCK, truecolorBackground, truecolorForeground } from '../ansi-output.ts';
import { assertEvenHeight } from '../sizing.ts';
import type { OutputSink, PixelBuffer } from '../types.ts';
import { rgbAt } from '../utils/pixel-utils.ts';
import type { Renderer } from './types.ts';

export class TruecolorRenderer implements Renderer {
  readonly kind = 'truecolor';

  render(image: PixelBuffer, sink: OutputSink): void {
    assertEvenHeight(image);
    const termHeight = image.height / 2;

    for (let y = 0; y < termHeight; y++) {
      const upperY = y * 2;
      const lowerY = upperY + 1;
      let out = '';

      for (let x = 0; x < image.width; x++) {
        const [ur, ug, ub] = rgbAt(image, x, upperY);
        const [lr, lg, lb] = rgbAt(image, x, lowerY);
        out += truecolorForeground(ur, ug, ub) + truecolorBackground(lr, lg, lb) + HALF_BLOCK;
      }
      sink.write(out + ANSI_RESET_ATTRIBUTES + '\n');
    }
  }
}
