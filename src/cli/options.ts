/**
 * Command line options.
 *
 * Every option resolves from, in order: the flag, its environment
 * variables, the project configuration, the default.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import minimist from 'minimist';
import {
  CONFIG_FILES,
  EMPTY_CONFIG,
  normalizeOptionName,
  type OptionValue,
  parseConfig,
  type ReleaseConfig,
} from '../domain/config.ts';
import { ReleaseError } from '../lib/error.ts';
import type { Env } from '../workflows/context.ts';

export type OptionKind = 'string' | 'boolean' | 'number' | 'list';

export interface OptionSpec {
  /** Flag name without dashes */
  name: string;
  kind: OptionKind;
  description: string;
  /** Environment variables, first set wins */
  env?: string[];
  default?: OptionValue;
}

export interface PositionalSpec {
  name: string;
  description: string;
  env?: string[];
  default?: string;
}

const TRUTHY = ['true', '1', 'yes'];

/**
 * Load the project configuration from the first candidate file that has
 * a release-helper section.
 */
export async function loadConfig(cwd: string): Promise<ReleaseConfig> {
  for (const { file, format } of CONFIG_FILES) {
    const path = join(cwd, file);
    if (!(await pathExists(path))) continue;

    const config = parseConfig(await readFile(path, 'utf8'), format, file);
    if (config) return config;
  }
  return EMPTY_CONFIG;
}

function flagGiven(args: string[], name: string): boolean {
  return args.some((arg) => arg === `--${name}` || arg.startsWith(`--${name}=`));
}

function parseNumber(value: string, source: string): number {
  const number = Number(value);
  if (value.trim() === '' || Number.isNaN(number)) {
    throw new ReleaseError(
      `Invalid number for ${source}: ${value}`,
      'INVALID_OPTION',
      { source, value },
    );
  }
  return number;
}

/**
 * Coerce a config or default value to the option's kind.
 */
function coerce(spec: OptionSpec, value: OptionValue, source: string): OptionValue {
  switch (spec.kind) {
    case 'boolean':
      return typeof value === 'string' ? TRUTHY.includes(value.toLowerCase()) : Boolean(value);
    case 'number':
      return typeof value === 'number' ? value : parseNumber(String(value), source);
    case 'list':
      return Array.isArray(value) ? value : [String(value)];
    case 'string':
      return Array.isArray(value) ? value.join(',') : String(value);
  }
}

function fromEnv(spec: OptionSpec, value: string, name: string): OptionValue {
  switch (spec.kind) {
    case 'boolean':
      return TRUTHY.includes(value.trim().toLowerCase());
    case 'number':
      return parseNumber(value, name);
    case 'list':
      return value.split(/[\s,]+/).filter(Boolean);
    case 'string':
      return value;
  }
}

/**
 * Resolved options of a single command invocation.
 */
export class Options {
  private readonly values = new Map<string, OptionValue>();
  readonly positional: string | null;

  constructor(
    args: string[],
    specs: OptionSpec[],
    env: Env,
    config: ReleaseConfig,
    positional?: PositionalSpec,
  ) {
    const known = new Set(specs.map((s) => s.name));
    const parsed = minimist(args, {
      string: specs.filter((s) => s.kind !== 'boolean').map((s) => s.name),
      boolean: [...specs.filter((s) => s.kind === 'boolean').map((s) => s.name), 'help'],
      unknown: (arg) => {
        const flag = /^--?([^=]+)/.exec(arg);
        if (flag && !known.has(flag[1])) {
          throw new ReleaseError(`Unknown option: ${arg}`, 'INVALID_OPTION', { option: arg });
        }
        return true;
      },
    });

    for (const spec of specs) {
      const value = this.resolve(spec, args, parsed, env, config);
      if (value !== undefined) {
        this.values.set(spec.name, value);
      }
    }

    const rest = parsed._.map(String);
    if (rest.length > (positional ? 1 : 0)) {
      throw new ReleaseError(
        `Unexpected argument: ${rest[positional ? 1 : 0]}`,
        'INVALID_OPTION',
        { args: rest },
      );
    }

    this.positional = rest[0] ??
      positional?.env?.map((name) => env[name]).find((v) => v) ??
      positional?.default ??
      null;
  }

  private resolve(
    spec: OptionSpec,
    args: string[],
    parsed: minimist.ParsedArgs,
    env: Env,
    config: ReleaseConfig,
  ): OptionValue | undefined {
    const flag: unknown = parsed[spec.name];

    if (spec.kind === 'boolean') {
      if (flagGiven(args, spec.name)) {
        // minimist reads --no-<x> as x=false
        const negated = spec.name.startsWith('no-') && parsed[spec.name.slice(3)] === false;
        return flag === true || negated;
      }
    } else if (spec.kind === 'list') {
      if (typeof flag === 'string') return [flag];
      if (Array.isArray(flag)) return flag.map(String);
    } else if (typeof flag === 'string') {
      return spec.kind === 'number' ? parseNumber(flag, `--${spec.name}`) : flag;
    } else if (Array.isArray(flag)) {
      throw new ReleaseError(`Option --${spec.name} given more than once`, 'INVALID_OPTION', {
        option: spec.name,
      });
    }

    for (const name of spec.env ?? []) {
      const value = env[name];
      if (value) return fromEnv(spec, value, name);
    }

    const configured = config.options[normalizeOptionName(spec.name)];
    if (configured !== undefined) {
      return coerce(spec, configured, `${config.source}: ${spec.name}`);
    }

    return spec.default;
  }

  string(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === 'string' && value !== '' ? value : undefined;
  }

  /**
   * A string option that must be set.
   */
  required(name: string): string {
    const value = this.string(name);
    if (value === undefined) {
      throw new ReleaseError(`Missing required option --${name}`, 'MISSING_OPTION', { option: name });
    }
    return value;
  }

  boolean(name: string): boolean {
    return this.values.get(name) === true;
  }

  number(name: string): number | undefined {
    const value = this.values.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  list(name: string): string[] {
    const value = this.values.get(name);
    return Array.isArray(value) ? value : [];
  }

  /**
   * The positional argument, which must be set.
   */
  requiredPositional(spec: PositionalSpec): string {
    if (!this.positional) {
      throw new ReleaseError(`Missing required argument <${spec.name}>`, 'MISSING_OPTION', {
        argument: spec.name,
      });
    }
    return this.positional;
  }
}

/**
 * `--help` for a command, built from its options.
 */
export function formatHelp(
  usage: string,
  summary: string,
  specs: OptionSpec[],
  bold: (text: string) => string,
  positional?: PositionalSpec,
): string {
  const rows: Array<[string, string]> = [];
  if (positional) {
    rows.push([`<${positional.name}>`, describe(positional.description, positional.env, positional.default)]);
  }
  for (const spec of specs) {
    const flag = spec.kind === 'boolean' ? `--${spec.name}` : `--${spec.name} <${spec.kind === 'number' ? 'n' : 'value'}>`;
    const fallback = spec.default === undefined ? undefined : String(spec.default);
    rows.push([flag, describe(spec.description, spec.env, fallback)]);
  }
  rows.push(['--help', 'Show this help']);

  const width = Math.max(...rows.map(([flag]) => flag.length)) + 2;
  const lines = rows.map(([flag, text]) => `  ${flag.padEnd(width)}${text}`);

  return `
${bold(usage)} - ${summary}

${bold('OPTIONS:')}
${lines.join('\n')}
`;
}

function describe(text: string, env?: string[], fallback?: string): string {
  const notes: string[] = [];
  if (env && env.length > 0) notes.push(`env: ${env.join(', ')}`);
  if (fallback !== undefined && fallback !== '') notes.push(`default: ${fallback}`);
  return notes.length > 0 ? `${text} (${notes.join('; ')})` : text;
}
