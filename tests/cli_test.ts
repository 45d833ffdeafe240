// Tests for the command line runner (src/cli-main.ts)

import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, beforeEach, mock, test } from 'node:test';
import { run, VERSION, type CliIO } from '../src/cli-main.ts';
import { encodePng } from '../src/deps.ts';
import { createLogger, getGlobalLogger, setGlobalLogger } from '../src/logging.ts';
import { encodeBmp24 } from './test_helpers.ts';
import type { OutputSink } from '../src/types.ts';

class StringSink implements OutputSink {
  text = '';

  write(chunk: string): void {
    this.text += chunk;
  }
}

const dir = mkdtempSync(join(tmpdir(), 'blockcat-cli-'));
after(() => rmSync(dir, { recursive: true, force: true }));

// 2x2: white over black on the left, black over white on the right
const image = join(dir, 'checker.png');
writeFileSync(image, encodePng({
  width: 2,
  height: 2,
  channels: 3,
  depth: 8,
  data: new Uint8Array([255, 255, 255, 0, 0, 0, 0, 0, 0, 255, 255, 255]),
}));

let stdout: StringSink;
let stderr: StringSink;

function runCli(args: string[]): number {
  const io: CliIO = {
    stdout,
    stderr,
    env: { platform: 'linux', terminal: null, cwd: dir },
    configPath: join(dir, 'no-config.json'),
  };
  return run(args, io);
}

beforeEach(() => {
  for (const name of ['BLOCKCAT_SIZE', 'BLOCKCAT_FORCE', 'BLOCKCAT_ANSI', 'BLOCKCAT_LOG_LEVEL', 'BLOCKCAT_LOG_FILE']) {
    delete process.env[name];
  }
  stdout = new StringSink();
  stderr = new StringSink();
});

test('--help prints usage', () => {
  assert.equal(runCli(['--help']), 0);
  assert.ok(stdout.text.startsWith('blockcat - display an image in the terminal\n\nUsage:\n  blockcat [options] <image>\n'));
  assert.ok(stdout.text.includes('BLOCKCAT_ANSI'));
  assert.equal(stderr.text, '');
});

test('--version prints the package version', () => {
  assert.equal(runCli(['-V']), 0);
  assert.equal(stdout.text, `blockcat ${VERSION}\n`);
  assert.equal(VERSION, '0.1.0');
});

test('renders an image with explicit size and style', () => {
  assert.equal(runCli(['-s', '2x1', '-a', 'ascii', 'checker.png']), 0);
  assert.equal(stdout.text, '@ \n');
  assert.equal(stderr.text, '');
});

test('runs more than once in the same process', () => {
  assert.equal(runCli(['-s', '2x1', '-a', 'ascii', 'checker.png']), 0);
  assert.equal(runCli(['-s', '2x1', '-a', 'simple-black', 'checker.png']), 0);
  assert.equal(stderr.text, '');
  assert.ok(stdout.text.startsWith('@ \n'));
});

test('an unwritable log file does not stop rendering', () => {
  const consoleError = mock.method(console, 'error', () => {});
  try {
    process.env.BLOCKCAT_LOG_FILE = dir;
    assert.equal(runCli(['-s', '2x1', '-a', 'ascii', 'checker.png']), 0);
    assert.equal(stdout.text, '@ \n');
    assert.doesNotThrow(() => getGlobalLogger().close());
    assert.equal(consoleError.mock.callCount(), 1);
  } finally {
    consoleError.mock.restore();
    setGlobalLogger(createLogger({ logFile: '' }));
  }
});

test('renders a BMP found by its magic bytes', () => {
  // 1x2: white over black, no extension
  writeFileSync(join(dir, 'pic'), encodeBmp24(1, 2, [255, 255, 255, 0, 0, 0]));
  assert.equal(runCli(['-s', '1x1', '-a', 'ascii', 'pic']), 0);
  assert.equal(stdout.text, '@\n');
  assert.equal(stderr.text, '');
});

test('renders truecolor by default', () => {
  assert.equal(runCli(['--size=2x1', image]), 0);
  assert.equal(
    stdout.text,
    '\x1b[38;2;255;255;255m\x1b[48;2;0;0;0m▀\x1b[38;2;0;0;0m\x1b[48;2;255;255;255m▀\x1b[0m\n'
  );
});

test('size comes from the environment when no flag is given', () => {
  process.env.BLOCKCAT_SIZE = '2x1';
  process.env.BLOCKCAT_ANSI = 'ascii';
  assert.equal(runCli(['checker.png']), 0);
  assert.equal(stdout.text, '@ \n');
});

test('missing image argument exits with the config code', () => {
  assert.equal(runCli(['-s', '2x1']), 4);
  assert.equal(stderr.text, 'No image file given\n');
  assert.equal(stdout.text, '');
});

test('missing terminal size and no --size exits with the config code', () => {
  assert.equal(runCli(['checker.png']), 4);
  assert.equal(stderr.text, 'Terminal size could not be detected; pass --size NxM\n');
});

test('unknown options are rejected', () => {
  assert.equal(runCli(['--frobnicate', 'checker.png']), 4);
  assert.equal(stderr.text, 'Unknown option --frobnicate\n');
});

test('invalid sizes are rejected', () => {
  assert.equal(runCli(['-s', '0x3', 'checker.png']), 4);
  assert.equal(stderr.text, "Can't resize image to size 0\n");
});

test('nonexistent files are rejected before rendering', () => {
  assert.equal(runCli(['-s', '2x1', 'absent.png']), 4);
  assert.equal(stderr.text, 'Image file "absent.png" not found\n');
});

test('unguessable files exit with 1', () => {
  writeFileSync(join(dir, 'notes'), 'hello');
  assert.equal(runCli(['-s', '2x1', 'notes']), 1);
  assert.equal(stderr.text, 'Failed to guess format of "notes".\n');
  assert.equal(stdout.text, '');
});

test('undecodable files exit with 3', () => {
  writeFileSync(join(dir, 'broken.gif'), 'GIF8 but not really');
  assert.equal(runCli(['-s', '2x1', 'broken.gif']), 3);
  assert.equal(stderr.text, 'Failed to decode image file "broken.gif".\n');
});

test('--print-config shows resolved values', () => {
  assert.equal(runCli(['--print-config', '-s', '2x1']), 0);
  assert.ok(stdout.text.includes('  size = "2x1" <- --size\n'));
});
