// Image format detection from file extension or magic bytes

import { extname } from 'node:path';
import { FormatGuessFailedError, OpenFailedError } from './errors.ts';
import { getLogger } from './logging.ts';
import { readPrefixSync } from './runtime/mod.ts';
import type { FormatTag, ImageFile } from './types.ts';

const logger = getLogger('format');

// File signatures, see https://en.wikipedia.org/wiki/List_of_file_signatures
export const PNG_MAGIC = new Uint8Array([0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A]);
export const JPEG_MAGIC = new Uint8Array([0xFF, 0xD8, 0xFF, 0xE0]);
export const GIF_MAGIC = new Uint8Array([0x47, 0x49, 0x46, 0x38]);
export const BMP_MAGIC = new Uint8Array([0x42, 0x4D]);
export const ICO_MAGIC = new Uint8Array([0x00, 0x00, 0x01, 0x00]);

// Checked in order, first match wins
const MAGIC_TABLE: ReadonlyArray<readonly [Uint8Array, FormatTag]> = [
  [PNG_MAGIC, 'png'],
  [JPEG_MAGIC, 'jpeg'],
  [GIF_MAGIC, 'gif'],
  [BMP_MAGIC, 'bmp'],
  [ICO_MAGIC, 'ico'],
];

const EXTENSION_TABLE: Readonly<Record<string, FormatTag>> = {
  png: 'png',
  jpg: 'jpeg',
  jpeg: 'jpeg',
  jpe: 'jpeg',
  jif: 'jpeg',
  jfif: 'jpeg',
  jfi: 'jpeg',
  gif: 'gif',
  webp: 'webp',
  ppm: 'pnm',
  tiff: 'tiff',
  tif: 'tiff',
  tga: 'tga',
  bmp: 'bmp',
  dib: 'bmp',
  ico: 'ico',
  hdr: 'hdr',
};

/** Number of leading bytes read when falling back to magic detection. */
export const MAGIC_PREFIX_LENGTH = 32;

/**
 * Map a path's extension (case-insensitive) to a format, or null when unknown.
 */
export function formatFromExtension(path: string): FormatTag | null {
  const ext = extname(path).slice(1).toLowerCase();
  return Object.hasOwn(EXTENSION_TABLE, ext) ? EXTENSION_TABLE[ext] : null;
}

function startsWith(bytes: Uint8Array, magic: Uint8Array): boolean {
  if (bytes.length < magic.length) return false;
  for (let i = 0; i < magic.length; i++) {
    if (bytes[i] !== magic[i]) return false;
  }
  return true;
}

/**
 * Detect image format from magic bytes
 */
export function formatFromMagic(bytes: Uint8Array): FormatTag | null {
  for (const [magic, format] of MAGIC_TABLE) {
    if (startsWith(bytes, magic)) {
      return format;
    }
  }
  return null;
}

/**
 * Guess the format of an image file.
 *
 * A known extension is authoritative: the file is not opened, even when it
 * does not exist or its contents say otherwise. Only without one are the
 * first bytes read and compared to the magic table.
 *
 * @throws OpenFailedError when the magic fallback cannot read the file
 * @throws FormatGuessFailedError when neither check matches
 */
export function sniffFormat(file: ImageFile): FormatTag {
  const byExtension = formatFromExtension(file.path);
  if (byExtension) {
    logger.debug('format from extension', { file: file.name, format: byExtension });
    return byExtension;
  }

  let prefix: Uint8Array;
  try {
    prefix = readPrefixSync(file.path, MAGIC_PREFIX_LENGTH);
  } catch (error) {
    throw new OpenFailedError(file.name, { cause: error });
  }

  const byMagic = formatFromMagic(prefix);
  if (!byMagic) {
    throw new FormatGuessFailedError(file.name);
  }
  logger.debug('format from magic bytes', { file: file.name, format: byMagic });
  return byMagic;
}
