/**
 * Environment variable access.
 *
 * Use Env.get() instead of process.env throughout the codebase so every read
 * goes through one place.
 */

import { getEnv } from './runtime/mod.ts';

export class Env {
  /**
   * Get env var value (fresh value each call).
   * Empty strings are returned as-is; callers decide what an empty value means.
   */
  static get(name: string): string | undefined {
    return getEnv(name);
  }
}
