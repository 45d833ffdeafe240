/**
 * Runtime-agnostic filesystem operations.
 * Wraps the node:fs calls the pipeline, config and logger need.
 */

import * as fs from 'node:fs';

export interface WriteOptions {
  append?: boolean;
}

export interface MkdirOptions {
  recursive?: boolean;
}

export function readFileSync(path: string): Uint8Array {
  return new Uint8Array(fs.readFileSync(path));
}

export function readTextFileSync(path: string): string {
  return fs.readFileSync(path, 'utf8');
}

export function writeTextFileSync(path: string, data: string, options?: WriteOptions): void {
  if (options?.append) {
    fs.appendFileSync(path, data, 'utf8');
  } else {
    fs.writeFileSync(path, data, 'utf8');
  }
}

export function mkdirSync(path: string, options?: MkdirOptions): void {
  fs.mkdirSync(path, options);
}

export function existsSync(path: string): boolean {
  return fs.existsSync(path);
}

export function realPathSync(path: string): string {
  return fs.realpathSync(path);
}

/**
 * Read at most `length` bytes from the start of a file.
 * Returns only the bytes actually read, which may be fewer for short files.
 */
export function readPrefixSync(path: string, length: number): Uint8Array {
  const fd = fs.openSync(path, 'r');
  try {
    const buf = new Uint8Array(length);
    const read = fs.readSync(fd, buf, 0, length, 0);
    return buf.subarray(0, read);
  } finally {
    fs.closeSync(fd);
  }
}
