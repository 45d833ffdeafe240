// Rendering pipeline: sniff, load, plan, resize, render, flush

import { sniffFormat } from './format.ts';
import { loadImage, resizeImage } from './image.ts';
import { getLogger } from './logging.ts';
import { createRenderer, type ConsoleSurface, type RendererKind } from './renderers/mod.ts';
import type { Platform } from './runtime/mod.ts';
import { assertEvenHeight, fitHalfBlockGrid, planImageSize } from './sizing.ts';
import type { AnsiOutputFormat, Dimensions, FormatTag, ImageFile, OutputSink, TerminalCells } from './types.ts';

const logger = getLogger('pipeline');

export interface RenderOptions {
  image: ImageFile;
  terminal: TerminalCells;
  preserveAspect: boolean;
  /** Escape format, or null for the console attribute grid */
  format: AnsiOutputFormat | null;
  platform: Platform;
  surface?: ConsoleSurface;
}

export interface RenderResult {
  format: FormatTag;
  source: Dimensions;
  size: Dimensions;
  renderer: RendererKind;
}

/**
 * Collects chunks so a whole frame reaches the real sink in one write.
 */
export class BufferedSink implements OutputSink {
  private _chunks: string[] = [];

  write(chunk: string): void {
    this._chunks.push(chunk);
  }

  flushTo(sink: OutputSink): void {
    if (this._chunks.length === 0) return;
    sink.write(this._chunks.join(''));
    this._chunks = [];
  }
}

/**
 * Render one image file to `sink`.
 *
 * Nothing is written when any stage fails; the error propagates unchanged.
 */
export function renderFile(options: RenderOptions, sink: OutputSink): RenderResult {
  const { image: file, terminal } = options;

  const format = sniffFormat(file);
  const image = loadImage(file, format);
  const source = { width: image.width, height: image.height };

  const planned = planImageSize(source, terminal, options.preserveAspect);
  const size = fitHalfBlockGrid(planned);
  logger.debug('planned output size', { source, terminal, planned, size });

  const resized = resizeImage(image, size);
  assertEvenHeight(resized);

  const renderer = createRenderer(options.format, options.platform, options.surface);
  const buffered = new BufferedSink();
  renderer.render(resized, buffered);
  buffered.flushTo(sink);

  logger.info('rendered image', { file: file.name, format, renderer: renderer.kind, width: size.width, height: size.height });
  return { format, source, size, renderer: renderer.kind };
}
