// Image loading, decoding and resizing
// Decodes PNG, JPEG, GIF (first frame), BMP and ICO through the codec libraries in deps.ts

import { decodeBmp, decodeIco, decodeJpeg, decodePng, GifReader } from './deps.ts';
import { DecodeFailedError, OpenFailedError } from './errors.ts';
import { getLogger } from './logging.ts';
import { readFileSync } from './runtime/mod.ts';
import type { Dimensions, FormatTag, ImageFile, PixelBuffer } from './types.ts';
import { createPixelBuffer } from './utils/pixel-utils.ts';

const logger = getLogger('image');

/** Formats decodeImage() can handle; the sniffer recognises more. */
export const DECODABLE_FORMATS: readonly FormatTag[] = ['png', 'jpeg', 'gif', 'bmp', 'ico'];

/**
 * Expand sub-byte samples (1, 2 or 4 bits) into one byte per sample.
 * Rows are padded to a whole byte.
 */
function unpackSamples(packed: ArrayLike<number>, width: number, height: number, channels: number, depth: number): Uint8Array {
  const samplesPerRow = width * channels;
  const bytesPerRow = Math.ceil((samplesPerRow * depth) / 8);
  const mask = (1 << depth) - 1;
  const out = new Uint8Array(samplesPerRow * height);

  for (let y = 0; y < height; y++) {
    for (let s = 0; s < samplesPerRow; s++) {
      const bit = s * depth;
      const byte = packed[y * bytesPerRow + (bit >> 3)];
      const shift = 8 - depth - (bit & 7);
      out[y * samplesPerRow + s] = (byte >> shift) & mask;
    }
  }
  return out;
}

/**
 * Decode PNG image bytes to a PixelBuffer
 */
function decodePngImage(imageBytes: Uint8Array): PixelBuffer {
  const decoded = decodePng(imageBytes);
  const { width, height, channels, depth } = decoded;
  const palette = decoded.palette;

  // Sample values as stored; tRNS keys are compared against these
  const raw: ArrayLike<number> = depth < 8
    ? unpackSamples(decoded.data, width, height, channels, depth)
    : decoded.data;

  let samples: ArrayLike<number> = raw;
  if (decoded.data instanceof Uint16Array) {
    // 16-bit: take the high byte
    const data16 = decoded.data;
    const data8 = new Uint8Array(data16.length);
    for (let i = 0; i < data16.length; i++) {
      data8[i] = data16[i] >> 8;
    }
    samples = data8;
  }

  const pixelCount = width * height;

  if (palette && channels === 1) {
    // Indexed: expand palette entries, keeping their alpha where present
    const rgba = new Uint8Array(pixelCount * 4);
    for (let i = 0; i < pixelCount; i++) {
      const color = palette[samples[i]] ?? [0, 0, 0];
      rgba[i * 4] = color[0];
      rgba[i * 4 + 1] = color[1];
      rgba[i * 4 + 2] = color[2];
      rgba[i * 4 + 3] = color.length > 3 ? color[3] : 255;
    }
    return createPixelBuffer(width, height, 4, rgba);
  }

  // Grey and RGB images may name one colour as fully transparent
  const key = decoded.transparency;
  const isKeyed = (i: number): boolean => {
    if (!key) return false;
    for (let c = 0; c < key.length; c++) {
      if (raw[i * channels + c] !== key[c]) return false;
    }
    return true;
  };

  if (channels === 1 || channels === 2) {
    // Grayscale (+ alpha) -> RGBA, scaling low bit depths up to 0-255
    const scale = depth < 8 ? 255 / ((1 << depth) - 1) : 1;
    const rgba = new Uint8Array(pixelCount * 4);
    for (let i = 0; i < pixelCount; i++) {
      const gray = Math.round(samples[i * channels] * scale);
      rgba[i * 4] = gray;
      rgba[i * 4 + 1] = gray;
      rgba[i * 4 + 2] = gray;
      if (channels === 2) {
        rgba[i * 4 + 3] = samples[i * 2 + 1];
      } else {
        rgba[i * 4 + 3] = isKeyed(i) ? 0 : 255;
      }
    }
    return createPixelBuffer(width, height, 4, rgba);
  }

  if (channels === 3 && key) {
    const rgba = new Uint8Array(pixelCount * 4);
    for (let i = 0; i < pixelCount; i++) {
      rgba[i * 4] = samples[i * 3];
      rgba[i * 4 + 1] = samples[i * 3 + 1];
      rgba[i * 4 + 2] = samples[i * 3 + 2];
      rgba[i * 4 + 3] = isKeyed(i) ? 0 : 255;
    }
    return createPixelBuffer(width, height, 4, rgba);
  }

  if (channels === 3 || channels === 4) {
    return createPixelBuffer(width, height, channels, samples);
  }

  throw new Error(`Unsupported PNG channel count: ${channels}`);
}

/**
 * Decode JPEG image bytes to a PixelBuffer
 */
function decodeJpegImage(imageBytes: Uint8Array): PixelBuffer {
  const decoded = decodeJpeg(imageBytes, { useTArray: true, formatAsRGBA: true });
  return createPixelBuffer(decoded.width, decoded.height, 4, decoded.data);
}

/**
 * Decode GIF image bytes to a PixelBuffer (first frame only)
 */
function decodeGifImage(imageBytes: Uint8Array): PixelBuffer {
  // omggif works on Buffers; wrap without copying
  const gifReader = new GifReader(Buffer.from(imageBytes.buffer, imageBytes.byteOffset, imageBytes.byteLength));
  const pixelData = Buffer.alloc(gifReader.width * gifReader.height * 4);
  gifReader.decodeAndBlitFrameRGBA(0, pixelData);
  return createPixelBuffer(gifReader.width, gifReader.height, 4, pixelData);
}

/**
 * Decode a BMP file to RGBA
 */
function decodeBmpImage(imageBytes: Uint8Array): PixelBuffer {
  const decoded = decodeBmp(imageBytes);
  return createPixelBuffer(decoded.width, decoded.height, 4, decoded.data);
}

/**
 * Decode the largest image in an ICO file. Entries hold either a PNG or
 * bitmap data that the codec has already expanded to RGBA.
 */
function decodeIcoImage(imageBytes: Uint8Array): PixelBuffer {
  const entries = decodeIco(imageBytes);
  if (entries.length === 0) {
    throw new Error('Icon file has no images');
  }
  const largest = entries.reduce((best, entry) =>
    entry.width * entry.height > best.width * best.height ? entry : best
  );
  if (largest.type === 'png') {
    return decodePngImage(new Uint8Array(largest.data));
  }
  return createPixelBuffer(largest.width, largest.height, 4, largest.data);
}

/**
 * Decode image bytes of a known format.
 *
 * @param name - display name used in the error when decoding fails
 * @throws DecodeFailedError when the codec rejects the bytes or the format has no decoder
 */
export function decodeImage(imageBytes: Uint8Array, format: FormatTag, name: string): PixelBuffer {
  let image: PixelBuffer;
  try {
    switch (format) {
      case 'png':
        image = decodePngImage(imageBytes);
        break;
      case 'jpeg':
        image = decodeJpegImage(imageBytes);
        break;
      case 'gif':
        image = decodeGifImage(imageBytes);
        break;
      case 'bmp':
        image = decodeBmpImage(imageBytes);
        break;
      case 'ico':
        image = decodeIcoImage(imageBytes);
        break;
      default:
        throw new Error(`No decoder for ${format}. Supported: ${DECODABLE_FORMATS.join(', ')}`);
    }
  } catch (error) {
    throw new DecodeFailedError(name, { cause: error });
  }

  if (image.width === 0 || image.height === 0) {
    throw new DecodeFailedError(name, { cause: new Error(`Empty image: ${image.width}x${image.height}`) });
  }

  logger.debug('decoded image', { name, format, width: image.width, height: image.height });
  return image;
}

/**
 * Load an image from a file as the given format.
 * Get the format with sniffFormat().
 *
 * @throws OpenFailedError when the file cannot be read
 * @throws DecodeFailedError when its contents cannot be decoded
 */
export function loadImage(file: ImageFile, format: FormatTag): PixelBuffer {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(file.path);
  } catch (error) {
    throw new OpenFailedError(file.name, { cause: error });
  }
  return decodeImage(bytes, format, file.name);
}

/**
 * Resize to exactly `size` with nearest-neighbour sampling.
 * Samples the source pixel under each target pixel's centre; the result is RGBA.
 */
export function resizeImage(image: PixelBuffer, size: Dimensions): PixelBuffer {
  const { width: dstW, height: dstH } = size;
  const out = createPixelBuffer(dstW, dstH, 4);
  const bpp = image.bytesPerPixel;

  for (let y = 0; y < dstH; y++) {
    const srcY = Math.min(image.height - 1, Math.floor(((y + 0.5) * image.height) / dstH));
    for (let x = 0; x < dstW; x++) {
      const srcX = Math.min(image.width - 1, Math.floor(((x + 0.5) * image.width) / dstW));

      const srcIdx = (srcY * image.width + srcX) * bpp;
      const dstIdx = (y * dstW + x) * 4;

      out.data[dstIdx] = image.data[srcIdx];
      out.data[dstIdx + 1] = image.data[srcIdx + 1];
      out.data[dstIdx + 2] = image.data[srcIdx + 2];
      out.data[dstIdx + 3] = bpp === 4 ? image.data[srcIdx + 3] : 255;
    }
  }

  return out;
}
