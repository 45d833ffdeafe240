#!/usr/bin/env -S node --import tsx
/**
 * # blockcat
 *
 * Display raster images in the terminal.
 *
 * Each character cell shows two pixels: the upper one as the foreground
 * colour of an upper-half-block glyph, the lower one as its background.
 * Output is 24-bit ANSI by default; `--ansi simple-black` and
 * `--ansi simple-white` approximate the 16 standard terminal colours for
 * dark and light themes, and `--ansi ascii` prints plain characters.
 *
 * ```bash
 * blockcat photo.png
 * blockcat --size 80x24 --force logo.gif
 * BLOCKCAT_ANSI=ascii blockcat photo.jpg > photo.txt
 * ```
 *
 * @module
 */

import { join } from 'node:path';
import { loadDotenv } from './src/deps.ts';
import { run } from './src/cli-main.ts';
import { getGlobalLogger } from './src/logging.ts';
import { args, consoleSize, cwd, platform, setExitCode, stderr, stdout } from './src/runtime/mod.ts';

// .env then .env.local; values already set are kept
for (const envFile of ['.env', '.env.local']) {
  loadDotenv({ path: join(cwd(), envFile), override: false });
}

const code = run(args(), {
  stdout,
  stderr,
  env: {
    platform: platform(),
    terminal: consoleSize(),
    cwd: cwd(),
  },
});

getGlobalLogger().close();
setExitCode(code);
