/**
 * Runtime-agnostic terminal I/O.
 * Wraps process.stdout, process.stderr and the terminal size.
 */

import process from 'node:process';

export const stdout = {
  write(data: string | Uint8Array): void {
    process.stdout.write(data);
  },
};

export const stderr = {
  write(data: string | Uint8Array): void {
    process.stderr.write(data);
  },
};

export function consoleSize(): { columns: number; rows: number } | null {
  const { columns, rows } = process.stdout;
  if (!process.stdout.isTTY || !columns || !rows) {
    return null;
  }
  return { columns, rows };
}
