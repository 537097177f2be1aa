/**
 * CLI output formatting.
 *
 * Consistent, scannable output with prefixes.
 */

import { appendFile } from 'node:fs/promises';
import chalk from 'chalk';

export const bold = (text: string): string => chalk.bold(text);
export const cyan = (text: string): string => chalk.cyan(text);
export const dim = (text: string): string => chalk.dim(text);
export const green = (text: string): string => chalk.green(text);
export const red = (text: string): string => chalk.red(text);
export const yellow = (text: string): string => chalk.yellow(text);

/**
 * Print section header.
 */
export function header(text: string): void {
  console.log(bold(text));
  console.log();
}

/**
 * Print info line.
 */
export function info(label: string, value: string): void {
  console.log(`${label}: ${cyan(value)}`);
}

/**
 * Print success message.
 */
export function success(message: string): void {
  console.log(green(`✅ ${message}`));
}

/**
 * Print warning message.
 */
export function warn(message: string): void {
  console.log(yellow(`⚠️  ${message}`));
}

/**
 * Print a skipped step.
 */
export function skip(message: string): void {
  console.log(yellow(`⏭  ${message}`));
}

/**
 * Print error message.
 */
export function error(message: string, details?: string): void {
  console.error(red(`❌ ${message}`));
  if (details) {
    console.error(red(`   ${details}`));
  }
}

/**
 * Echo an external command before it runs.
 */
export function command(cmd: string): void {
  console.log(dim(`+ ${cmd}`));
}

/**
 * Print dry run notice.
 */
export function dryRun(): void {
  console.log();
  console.log(yellow('DRY RUN: nothing was pushed or published'));
  console.log();
}

/**
 * Print `key=value` lines the way the release scripts expect them.
 */
export function variables(values: Record<string, string>): void {
  for (const [key, value] of Object.entries(values)) {
    console.log(`${key}=${value}`);
  }
}

/**
 * Print PR info.
 */
export function pr(url: string): void {
  console.log();
  success(`Changelog PR: ${url}`);
}

/**
 * Print release info.
 */
export function release(tag: string, url?: string | null): void {
  console.log();
  success(`Release ${tag}`);
  if (url) {
    console.log(`   ${url}`);
  }
}

/**
 * Print help text.
 */
export function help(text: string): void {
  console.log(text);
}

/**
 * Set a GitHub Actions step output.
 *
 * Appends to $GITHUB_OUTPUT when running in Actions, prints otherwise.
 */
export async function actionsOutput(
  name: string,
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const file = env.GITHUB_OUTPUT;
  if (file) {
    await appendFile(file, `${name}=${value}\n`, 'utf-8');
  }
  console.log(`${name}=${value}`);
}

/**
 * Append `KEY=value` lines to an env file ($GITHUB_ENV).
 */
export async function writeEnvFile(
  path: string,
  values: Record<string, string>,
): Promise<void> {
  const lines = Object.entries(values).map(([key, value]) => `${key}=${value}`);
  await appendFile(path, lines.join('\n') + '\n', 'utf-8');
}
