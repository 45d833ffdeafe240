// blockcat library entry point
// Import this for library usage: import { ... } from './mod.ts'

// Core types
export * from './src/types.ts';

// Errors and exit codes
export * from './src/errors.ts';

// Format detection, sizing and colour matching
export * from './src/format.ts';
export * from './src/sizing.ts';
export { closestColour, redmeanDistance } from './src/color/redmean.ts';
export * from './src/color16-palette.ts';
export * from './src/ansi-output.ts';
export { buildColourTable } from './src/colour-table.ts';

// Image loading and resizing
export { DECODABLE_FORMATS, decodeImage, loadImage, resizeImage } from './src/image.ts';
export { createPixelBuffer } from './src/utils/pixel-utils.ts';

// Renderers
export * from './src/renderers/mod.ts';

// Pipeline
export { BufferedSink, renderFile, type RenderOptions, type RenderResult } from './src/pipeline.ts';

// Configuration
export * from './src/config/mod.ts';

// Logging
export {
  createLogger,
  getGlobalLogger,
  getLogger,
  setGlobalLogger,
  Logger,
  type ComponentLogger,
  type LogLevel,
  type LoggerOptions,
} from './src/logging.ts';
