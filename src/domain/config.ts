/**
 * Configuration for release-helper.
 *
 * Read from the first of `.release-helper.toml`, `pyproject.toml`
 * (`[tool.release-helper]`) or `package.json` (`"release-helper"`) found in
 * the project. Everything is optional - the command line and environment
 * cover all options.
 */

import { parse } from 'smol-toml';
import { ReleaseError } from '../lib/error.ts';

export type OptionValue = string | number | boolean | string[];

export interface ReleaseConfig {
  /** File the configuration was read from, null when none was found */
  source: string | null;
  /** Option defaults keyed by option name (dashed, lower case) */
  options: Record<string, OptionValue>;
}

export type ConfigFormat = 'release-helper' | 'pyproject' | 'package-json';

/** Candidate files, in lookup order */
export const CONFIG_FILES: ReadonlyArray<{ file: string; format: ConfigFormat }> = [
  { file: '.release-helper.toml', format: 'release-helper' },
  { file: 'pyproject.toml', format: 'pyproject' },
  { file: 'package.json', format: 'package-json' },
];

export const EMPTY_CONFIG: ReleaseConfig = { source: null, options: {} };

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionValue(value: unknown): value is OptionValue {
  if (Array.isArray(value)) {
    return value.every((item) => typeof item === 'string');
  }
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * `dry_run`, `Dry-Run` and `dry-run` all name the same option.
 */
export function normalizeOptionName(name: string): string {
  return name.trim().toLowerCase().replace(/_/g, '-');
}

function parseDocument(content: string, format: ConfigFormat, source: string): unknown {
  try {
    return format === 'package-json' ? JSON.parse(content) : parse(content);
  } catch (error) {
    throw new ReleaseError(
      `Invalid ${source}: ${error instanceof Error ? error.message : String(error)}`,
      'CONFIG_PARSE_ERROR',
      { source },
    );
  }
}

function selectSection(document: unknown, format: ConfigFormat): unknown {
  if (!isTable(document)) return undefined;

  switch (format) {
    case 'release-helper':
      return document;
    case 'pyproject': {
      const tool = document.tool;
      return isTable(tool) ? tool['release-helper'] : undefined;
    }
    case 'package-json':
      return document['release-helper'];
  }
}

/**
 * Parse a candidate file. Returns null when the file has no
 * release-helper section (e.g. a pyproject.toml without the tool table).
 */
export function parseConfig(
  content: string,
  format: ConfigFormat,
  source: string,
): ReleaseConfig | null {
  const section = selectSection(parseDocument(content, format, source), format);
  if (section === undefined) {
    return null;
  }

  if (!isTable(section)) {
    throw new ReleaseError(
      `Invalid config in ${source}: expected a table`,
      'CONFIG_VALIDATION_ERROR',
      { source },
    );
  }

  const options: Record<string, OptionValue> = {};
  const raw = section.options ?? {};

  if (!isTable(raw)) {
    throw new ReleaseError(
      `Invalid config in ${source}: options must be a table`,
      'CONFIG_VALIDATION_ERROR',
      { source, field: 'options' },
    );
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isOptionValue(value)) {
      throw new ReleaseError(
        `Invalid config in ${source}: option ${key} must be a string, number, boolean or list of strings`,
        'CONFIG_VALIDATION_ERROR',
        { source, field: key, value },
      );
    }
    options[normalizeOptionName(key)] = value;
  }

  return { source, options };
}
