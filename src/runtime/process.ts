/**
 * Runtime-agnostic process utilities.
 * Wraps process.cwd, process.argv, process.exitCode, process.platform and process.env.
 */

import process from 'node:process';

export type Platform = 'darwin' | 'linux' | 'windows' | 'other';

export function cwd(): string {
  return process.cwd();
}

export function args(): string[] {
  return process.argv.slice(2);
}

/**
 * Set the code the process exits with once pending output has drained.
 */
export function setExitCode(code: number): void {
  process.exitCode = code;
}

export function platform(): Platform {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'darwin';
    case 'linux':
      return 'linux';
    default:
      return 'other';
  }
}

export function getEnv(name: string): string | undefined {
  return process.env[name];
}
