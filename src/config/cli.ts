// Command line flags, derived from schema.json

import { ConfigError, ERROR_MESSAGES } from '../errors.ts';
import { BlockcatConfig, parseValue, type ConfigProperty } from './config.ts';

export interface ParsedCliFlags {
  flags: Record<string, unknown>;
  remaining: string[];
}

interface FlagTarget {
  path: string;
  prop: ConfigProperty;
}

const HELP_COLUMN = 30;

function schemaEntries(): Array<[string, ConfigProperty]> {
  return Object.entries(BlockcatConfig.getSchema().properties);
}

/** Long and short spellings of every schema flag, mapped to the option they set */
function flagTargets(): Map<string, FlagTarget> {
  const targets = new Map<string, FlagTarget>();
  for (const [path, prop] of schemaEntries()) {
    for (const spelling of [prop.flag, prop.short]) {
      if (spelling) targets.set(spelling, { path, prop });
    }
  }
  return targets;
}

/** Split `--name=value`; other arguments come back whole */
function splitInlineValue(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq <= 0) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Parse CLI arguments based on schema flag definitions.
 * Accepts `--flag value`, `--flag=value` and the short form `-f value`.
 * Arguments that are not schema flags are returned in `remaining`, in order.
 *
 * @throws ConfigError when a flag is missing its value or the value is not allowed
 */
export function parseCliFlags(args: string[]): ParsedCliFlags {
  const targets = flagTargets();
  const flags: Record<string, unknown> = {};
  const remaining: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const [name, inline] = splitInlineValue(args[i]);
    const target = targets.get(name);
    if (!target) {
      remaining.push(args[i]);
      continue;
    }

    const { path, prop } = target;
    if (prop.type === 'boolean') {
      // Presence means true; --flag=false is honoured
      flags[path] = inline === undefined ? true : parseValue(path, inline, prop);
      continue;
    }

    let value = inline;
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new ConfigError(ERROR_MESSAGES.missingFlagValue(name, prop.enum));
      }
      value = next;
      i++;
    }
    flags[path] = parseValue(path, value, prop);
  }

  return { flags, remaining };
}

/**
 * Flag reference for --help, one option per line with descriptions aligned.
 */
export function generateFlagHelp(): string {
  const lines: string[] = [];

  for (const [, prop] of schemaEntries()) {
    if (!prop.flag) continue;

    let usage = prop.short ? `${prop.short}, ${prop.flag}` : `    ${prop.flag}`;
    if (prop.type !== 'boolean') {
      usage += prop.enum ? ` <${prop.enum.join('|')}>` : ' <value>';
    }

    const hasDefault = prop.type !== 'boolean' && prop.default !== undefined && prop.default !== '';
    const text = `${prop.description ?? ''}${hasDefault ? ` (default: ${String(prop.default)})` : ''}`;

    if (usage.length > HELP_COLUMN) {
      lines.push(`  ${usage}`, `  ${' '.repeat(HELP_COLUMN)} ${text}`);
    } else {
      lines.push(`  ${usage.padEnd(HELP_COLUMN)} ${text}`);
    }
  }

  return lines.join('\n');
}

/**
 * Environment variable reference, sorted by name
 */
export function generateEnvVarHelp(): string {
  return schemaEntries()
    .flatMap(([, prop]) => (prop.env ? [{ env: prop.env, prop }] : []))
    .sort((a, b) => a.env.localeCompare(b.env))
    .map(({ env, prop }) => {
      let accepts = '';
      if (prop.enum) {
        accepts = ` [${prop.enum.join('|')}]`;
      } else if (prop.type === 'boolean') {
        accepts = ' [true|false|1|0]';
      }
      return `  ${env}\n    ${prop.description ?? ''}${accepts}`;
    })
    .join('\n');
}
