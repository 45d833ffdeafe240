// Tests for error kinds, exit codes and reporting (src/errors.ts)

import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  BlockcatError,
  ConfigError,
  DecodeFailedError,
  ensureError,
  EXIT_CODES,
  exitCodeFor,
  FormatGuessFailedError,
  OpenFailedError,
  printError,
} from '../src/errors.ts';

test('each error kind carries its own exit code', () => {
  assert.equal(new FormatGuessFailedError('a').exitCode, 1);
  assert.equal(new OpenFailedError('a').exitCode, 2);
  assert.equal(new DecodeFailedError('a').exitCode, 3);
  assert.equal(new ConfigError('bad').exitCode, 4);
  assert.deepEqual(EXIT_CODES, { formatGuessFailed: 1, openFailed: 2, decodeFailed: 3, config: 4 });
});

test('error messages name the file as given', () => {
  assert.equal(new FormatGuessFailedError('cat picture').message, 'Failed to guess format of "cat picture".');
  assert.equal(new OpenFailedError('../x.png').message, 'Failed to open image file "../x.png".');
  assert.equal(new DecodeFailedError('x.gif').message, 'Failed to decode image file "x.gif".');
});

test('error kinds are BlockcatErrors with their own names', () => {
  const error = new OpenFailedError('x', { cause: new Error('EACCES') });
  assert.ok(error instanceof BlockcatError);
  assert.ok(error instanceof Error);
  assert.equal(error.name, 'OpenFailedError');
  assert.equal(error.fileName, 'x');
  assert.ok(error.cause instanceof Error);
  assert.equal(error.cause.message, 'EACCES');
});

test('exitCodeFor falls back to 1 for unexpected errors', () => {
  assert.equal(exitCodeFor(new DecodeFailedError('x')), 3);
  assert.equal(exitCodeFor(new TypeError('boom')), 1);
  assert.equal(exitCodeFor('thrown string'), 1);
});

test('ensureError wraps non-Error values', () => {
  const original = new RangeError('r');
  assert.equal(ensureError(original), original);
  assert.equal(ensureError(42).message, '42');
  assert.ok(ensureError(undefined) instanceof Error);
});

test('printError writes one line', () => {
  const written: string[] = [];
  printError(new FormatGuessFailedError('blob'), (text) => written.push(text));
  printError('plain', (text) => written.push(text));
  assert.deepEqual(written, ['Failed to guess format of "blob".\n', 'plain\n']);
});
