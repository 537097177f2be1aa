/**
 * Shell runner - executes external tools (npm, twine, tbump, ...).
 *
 * Commands are shell strings because most of them come from user
 * configuration (`--version-cmd`, `--npm-cmd`, `--test-cmd`).
 */

import { exec } from 'node:child_process';
import { ReleaseError } from '../lib/error.ts';
import * as output from '../cli/output.ts';

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Do not echo the command */
  quiet?: boolean;
}

/**
 * Run a command and resolve with its trimmed stdout.
 */
export type Runner = (command: string, options?: RunOptions) => Promise<string>;

/**
 * Create a runner that echoes each command before running it.
 */
export function createRunner(baseEnv: NodeJS.ProcessEnv = process.env): Runner {
  return (command, options = {}) => {
    if (!options.quiet) {
      output.command(command);
    }

    return new Promise((resolve, reject) => {
      exec(
        command,
        {
          cwd: options.cwd,
          encoding: 'utf8',
          env: { ...baseEnv, ...options.env },
          maxBuffer: 64 * 1024 * 1024,
        },
        (error, stdout, stderr) => {
          if (error) {
            const out = `${stdout}${stderr}`.trim();
            if (out) console.error(out);
            reject(
              new ReleaseError(
                `Command failed: ${command}`,
                'COMMAND_FAILED',
                { command, exitCode: error.code, output: out },
              ),
            );
            return;
          }
          resolve(stdout.trim());
        },
      );
    });
  };
}
