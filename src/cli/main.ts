/**
 * release-helper - Release mechanics for Python and npm packages on GitHub
 *
 * Commands:
 *   prep-git, bump-version, prep-env
 *   build-changelog, check-changelog, draft-changelog, forwardport-changelog
 *   build-npm, check-npm, build-python, check-python, check-manifest, check-links
 *   tag-release, draft-release, extract-release, publish-release, delete-release
 */

import { LocalGit } from '../clients/git/local.ts';
import { GitHub } from '../clients/github.ts';
import { createRunner } from '../clients/shell.ts';
import { ReleaseError } from '../lib/error.ts';
import { VERSION } from '../version_info.ts';
import type { Env } from '../workflows/context.ts';
import { buildCommands } from './build.ts';
import { changelogCommands } from './changelog.ts';
import type { CliContext, Command } from './command.ts';
import { gitCommands } from './git.ts';
import { formatHelp, loadConfig, Options } from './options.ts';
import * as output from './output.ts';
import { releaseCommands } from './release.ts';

export const COMMANDS: Command[] = [
  ...gitCommands,
  ...changelogCommands,
  ...buildCommands,
  ...releaseCommands,
];

function usage(): string {
  const width = Math.max(...COMMANDS.map((c) => c.name.length)) + 2;
  const commands = COMMANDS.map((c) => `  ${c.name.padEnd(width)}${c.summary}`).join('\n');

  return `
${output.bold('release-helper')} - Release mechanics for Python and npm packages

${output.bold('USAGE:')}
  release-helper <command> [OPTIONS]

${output.bold('COMMANDS:')}
${commands}

${output.bold('OPTIONS:')}
  --help             Show this help, or a command's help
  --version          Show version

Options also come from the environment and from the options table of
.release-helper.toml, [tool.release-helper] in pyproject.toml, or
"release-helper" in package.json.
`;
}

/**
 * Context for running against the real world from `cwd`.
 */
export function createContext(cwd: string = process.cwd(), env: Env = process.env): CliContext {
  return {
    cwd,
    env,
    git: new LocalGit(cwd),
    run: createRunner(),
    github(repo, token) {
      const [owner, name] = repo.split('/');
      return new GitHub({ owner, repo: name, token });
    },
  };
}

export async function main(args: string[], ctx: CliContext): Promise<void> {
  const [name, ...rest] = args;

  if (!name || name === '--help' || name === '-h') {
    output.help(usage());
    return;
  }

  if (name === '--version') {
    console.log(`release-helper v${VERSION}`);
    return;
  }

  const command = COMMANDS.find((c) => c.name === name);
  if (!command) {
    throw new ReleaseError(
      `Unknown command: ${name}. Run release-helper --help for the list of commands`,
      'UNKNOWN_COMMAND',
      { command: name },
    );
  }

  if (rest.includes('--help') || rest.includes('-h')) {
    output.help(
      formatHelp(`release-helper ${command.name}`, command.summary, command.options, output.bold, command.positional),
    );
    return;
  }

  const config = await loadConfig(ctx.cwd);
  const options = new Options(rest, command.options, ctx.env, config, command.positional);
  await command.run(options, ctx);
}

/**
 * Run a command, reporting failures. Resolves with the exit code.
 */
export async function runCli(args: string[], ctx: CliContext = createContext()): Promise<number> {
  try {
    await main(args, ctx);
    return 0;
  } catch (error) {
    if (error instanceof ReleaseError) {
      output.error(error.message);
      if (error.details) {
        console.error(output.red('Details:'), error.details);
      }
    } else {
      output.error('Unexpected error', String(error));
    }
    return 1;
  }
}
