// Tests for configuration: CLI flags, layered resolution and render options
// (src/config/).

import assert from 'node:assert/strict';
import { mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, beforeEach, test } from 'node:test';
import {
  BlockcatConfig,
  generateEnvVarHelp,
  generateFlagHelp,
  parseCliFlags,
  resolveImageFile,
  resolveOutputFormat,
  resolveRenderOptions,
  resolveTerminalCells,
} from '../src/config/mod.ts';
import { ConfigError } from '../src/errors.ts';

const dir = mkdtempSync(join(tmpdir(), 'blockcat-config-'));
const noConfigFile = join(dir, 'absent.json');
after(() => rmSync(dir, { recursive: true, force: true }));

const ENV_VARS = ['BLOCKCAT_SIZE', 'BLOCKCAT_FORCE', 'BLOCKCAT_ANSI', 'BLOCKCAT_LOG_LEVEL', 'BLOCKCAT_LOG_FILE'];

beforeEach(() => {
  for (const name of ENV_VARS) {
    delete process.env[name];
  }
});

function writeConfig(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

// ============================================================================
// CLI flags
// ============================================================================

test('parseCliFlags reads long flags and keeps positionals', () => {
  assert.deepEqual(parseCliFlags(['--size', '80x24', 'img.png']), {
    flags: { size: '80x24' },
    remaining: ['img.png'],
  });
});

test('parseCliFlags reads short flags', () => {
  assert.deepEqual(parseCliFlags(['-s', '10x5', '-f', '-a', 'ascii', 'x.png']), {
    flags: { size: '10x5', force: true, ansi: 'ascii' },
    remaining: ['x.png'],
  });
});

test('parseCliFlags accepts --flag=value', () => {
  assert.deepEqual(parseCliFlags(['--ansi=simple-white', '--force=false']).flags, {
    ansi: 'simple-white',
    force: false,
  });
});

test('parseCliFlags normalises enum case', () => {
  assert.deepEqual(parseCliFlags(['--ansi', 'ASCII']).flags, { ansi: 'ascii' });
  assert.deepEqual(parseCliFlags(['--log-level', 'debug']).flags, { 'log.level': 'DEBUG' });
});

test('parseCliFlags rejects values outside the enum', () => {
  assert.throws(() => parseCliFlags(['--ansi', 'sepia']), {
    name: 'ConfigError',
    message: 'Invalid value "sepia" for ansi [truecolor|simple-black|simple-white|ascii]',
  });
});

test('parseCliFlags requires a value for non-boolean flags', () => {
  assert.throws(() => parseCliFlags(['--size']), { name: 'ConfigError', message: '--size requires a value' });
  assert.throws(() => parseCliFlags(['-a', '-f']), {
    name: 'ConfigError',
    message: '-a requires a value [truecolor|simple-black|simple-white|ascii]',
  });
});

test('parseCliFlags passes unknown flags through', () => {
  assert.deepEqual(parseCliFlags(['--bogus', 'x.png']), { flags: {}, remaining: ['--bogus', 'x.png'] });
});

test('help lists every flag and env var', () => {
  const flagHelp = generateFlagHelp();
  for (const flag of ['-s, --size <value>', '-f, --force', '-a, --ansi <truecolor|simple-black|simple-white|ascii>', '--log-level', '--log-file']) {
    assert.ok(flagHelp.includes(flag), flag);
  }
  const envHelp = generateEnvVarHelp();
  for (const name of ENV_VARS) {
    assert.ok(envHelp.includes(`  ${name}\n`), name);
  }
});

// ============================================================================
// Layered resolution
// ============================================================================

test('defaults apply when nothing is set', () => {
  const config = BlockcatConfig.load({ configPath: noConfigFile });
  assert.equal(config.size, undefined);
  assert.equal(config.force, false);
  assert.equal(config.ansi, 'truecolor');
  assert.equal(config.ansiExplicit, false);
  assert.equal(config.logLevel, 'INFO');
  assert.equal(config.logFile, '');
  assert.equal(config.getSource('ansi'), 'default');
});

test('cli beats env beats file', () => {
  process.env.BLOCKCAT_SIZE = '30x10';
  const configPath = writeConfig('layers.json', JSON.stringify({
    size: '20x5',
    ansi: 'ascii',
    log: { level: 'DEBUG' },
  }));

  const config = BlockcatConfig.load({ configPath, cliFlags: { size: '40x12' } });
  assert.equal(config.size, '40x12');
  assert.equal(config.getSource('size'), 'cli');
  assert.equal(config.ansi, 'ascii');
  assert.equal(config.getSource('ansi'), 'file');
  assert.equal(config.ansiExplicit, true);
  assert.equal(config.logLevel, 'DEBUG');
  assert.equal(config.getSource('force'), 'default');
});

test('env values are parsed by type', () => {
  process.env.BLOCKCAT_SIZE = '30x10';
  process.env.BLOCKCAT_FORCE = '1';
  process.env.BLOCKCAT_ANSI = 'Simple-Black';

  const config = BlockcatConfig.load({ configPath: noConfigFile });
  assert.equal(config.size, '30x10');
  assert.equal(config.getSource('size'), 'env');
  assert.equal(config.force, true);
  assert.equal(config.ansi, 'simple-black');
});

test('invalid env or file values fail configuration', () => {
  process.env.BLOCKCAT_ANSI = 'nope';
  assert.throws(() => BlockcatConfig.load({ configPath: noConfigFile }), ConfigError);

  delete process.env.BLOCKCAT_ANSI;
  const configPath = writeConfig('bad-enum.json', '{"ansi": "sepia"}');
  assert.throws(() => BlockcatConfig.load({ configPath }), {
    name: 'ConfigError',
    message: 'Invalid value "sepia" for ansi [truecolor|simple-black|simple-white|ascii]',
  });
});

test('unreadable config files fail configuration', () => {
  const broken = writeConfig('broken.json', '{ size: ');
  assert.throws(() => BlockcatConfig.load({ configPath: broken }), (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.ok(error.message.startsWith(`Invalid config file "${broken}": `));
    return true;
  });

  const notObject = writeConfig('array.json', '[1, 2]');
  assert.throws(() => BlockcatConfig.load({ configPath: notObject }), {
    message: `Invalid config file "${notObject}": expected a JSON object`,
  });
});

test('each load resolves afresh', () => {
  const first = BlockcatConfig.load({ configPath: noConfigFile });
  process.env.BLOCKCAT_FORCE = 'true';
  const second = BlockcatConfig.load({ configPath: noConfigFile });

  assert.equal(first.force, false);
  assert.equal(second.force, true);
  assert.equal(second.getSource('force'), 'env');
});

test('getConfigText shows values and their sources', () => {
  const config = BlockcatConfig.load({ configPath: noConfigFile, cliFlags: { size: '40x12' } });
  const lines = config.getConfigText().split('\n');
  assert.equal(lines[0], `Config file: ${noConfigFile} (not found)`);
  assert.equal(lines[1], 'Priority: default < file < env < cli');
  assert.ok(lines.includes('  size = "40x12" <- --size'));
  assert.ok(lines.includes('  force = false'));
  assert.ok(lines.includes('  ansi = "truecolor"'));
});

// ============================================================================
// Render options
// ============================================================================

test('resolveOutputFormat only uses the console grid on Windows terminals', () => {
  assert.equal(resolveOutputFormat('truecolor', false, 'linux', true), 'truecolor');
  assert.equal(resolveOutputFormat('truecolor', false, 'windows', true), null);
  assert.equal(resolveOutputFormat('ascii', true, 'windows', true), 'ascii');
  assert.equal(resolveOutputFormat('truecolor', false, 'windows', false), 'truecolor');
});

test('resolveTerminalCells prefers the configured size', () => {
  assert.deepEqual(resolveTerminalCells('10x4', null), { columns: 10, rows: 4 });
  assert.deepEqual(resolveTerminalCells('10x4', { columns: 80, rows: 24 }), { columns: 10, rows: 4 });
  assert.deepEqual(resolveTerminalCells(undefined, { columns: 80, rows: 24 }), { columns: 80, rows: 23 });
  assert.throws(() => resolveTerminalCells(undefined, null), {
    name: 'ConfigError',
    message: 'Terminal size could not be detected; pass --size NxM',
  });
  assert.throws(() => resolveTerminalCells('0x4', null), ConfigError);
});

test('resolveImageFile requires an existing file', () => {
  writeFileSync(join(dir, 'pic.png'), 'x');
  assert.deepEqual(resolveImageFile('pic.png', dir), { name: 'pic.png', path: realpathSync(join(dir, 'pic.png')) });
  assert.throws(() => resolveImageFile(undefined, dir), { name: 'ConfigError', message: 'No image file given' });
  assert.throws(() => resolveImageFile('nope.png', dir), { name: 'ConfigError', message: 'Image file "nope.png" not found' });
});

test('resolveRenderOptions combines config and environment', () => {
  writeFileSync(join(dir, 'scene.png'), 'x');
  const config = BlockcatConfig.load({ configPath: noConfigFile, cliFlags: { force: true, ansi: 'ascii' } });
  const options = resolveRenderOptions(config, 'scene.png', {
    platform: 'windows',
    terminal: { columns: 100, rows: 30 },
    cwd: dir,
  });
  assert.deepEqual(options, {
    image: { name: 'scene.png', path: realpathSync(join(dir, 'scene.png')) },
    terminal: { columns: 100, rows: 29 },
    preserveAspect: false,
    format: 'ascii',
    platform: 'windows',
  });
});
