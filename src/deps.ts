// Centralized external dependencies for blockcat
// All npm imports go here so the rest of the tree only sees local modules

// Image codecs; the encoders build test fixtures
export { decode as decodePng, encode as encodePng } from 'fast-png';
export { decode as decodeJpeg, encode as encodeJpeg } from 'jpeg-js';
export { GifReader, GifWriter } from 'omggif';
export { default as decodeBmp } from 'decode-bmp';
export { default as decodeIco } from 'decode-ico';

// .env loading for the CLI
export { config as loadDotenv } from 'dotenv';
