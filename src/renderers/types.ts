// Renderer interface shared by every output strategy

import type { OutputSink, PixelBuffer } from '../types.ts';

export type RendererKind = 'ansi' | 'truecolor' | 'ascii' | 'console-grid';

/**
 * A single stateless pass from a resized pixel buffer to terminal output.
 */
export interface Renderer {
  readonly kind: RendererKind;
  render(image: PixelBuffer, sink: OutputSink): void;
}

/**
 * Platform console that colours cells through attributes instead of escapes.
 */
export interface ConsoleSurface {
  /** Write plain text at the cursor. */
  writeText(text: string): void;
  /** Snapshot of the console after the last write. */
  getState(): ConsoleState;
  /** Set the attribute word of the cell at (x, y). */
  fillAttribute(attribute: number, x: number, y: number): void;
}

export interface ConsoleState {
  /** 16 colour references, 0x00BBGGRR */
  colorTable: readonly number[];
  /** Current attribute word; its high byte is preserved on every cell */
  attributes: number;
  cursorRow: number;
}
