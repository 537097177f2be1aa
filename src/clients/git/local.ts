/**
 * Local git client - wraps git CLI commands.
 */

import { execFile } from 'node:child_process';
import { readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { ensureDir } from 'fs-extra/esm';
import type { GitClient, PushOptions } from '../types.ts';
import { ReleaseError } from '../../lib/error.ts';
import * as output from '../../cli/output.ts';

interface ExecOptions {
  /** Echo the command before running it (for commands that change state) */
  echo?: boolean;
}

/**
 * Replace the credentials of urls in a git argument or message with `***`.
 */
export function redactCredentials(text: string): string {
  return text.replace(/(\/\/)[^/@\s]+@/g, '$1***@');
}

export class LocalGit implements GitClient {
  readonly cwd: string;

  constructor(cwd: string = process.cwd()) {
    this.cwd = resolve(cwd);
  }

  /**
   * Execute a git command and return stdout.
   */
  private exec(args: string[], options: ExecOptions = {}): Promise<string> {
    const shown = args.map(redactCredentials);
    if (options.echo) {
      output.command(`git ${shown.join(' ')}`);
    }

    return new Promise((resolvePromise, reject) => {
      execFile(
        'git',
        args,
        { cwd: this.cwd, encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 },
        (error, stdout, stderr) => {
          if (error) {
            const message = redactCredentials(stderr.trim());
            reject(
              new ReleaseError(
                `Git command failed: git ${shown.join(' ')}\n${message}`,
                'GIT_ERROR',
                { args: shown, error: message },
              ),
            );
            return;
          }
          resolvePromise(stdout.trim());
        },
      );
    });
  }

  /**
   * Execute git command, returning null on failure instead of throwing.
   */
  private async execSafe(args: string[]): Promise<string | null> {
    try {
      return await this.exec(args);
    } catch {
      return null;
    }
  }

  private lines(text: string): string[] {
    return text.split('\n').map((l) => l.trim()).filter((l) => l.length > 0);
  }

  // --- Files ---

  async readFile(path: string): Promise<string | null> {
    try {
      return await readFile(join(this.cwd, path), 'utf8');
    } catch {
      return null;
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    const fullPath = join(this.cwd, path);
    await ensureDir(dirname(fullPath));
    await writeFile(fullPath, content, 'utf8');
  }

  // --- Configuration and remotes ---

  async setGlobalConfig(key: string, value: string): Promise<void> {
    await this.exec(['config', '--global', key, value], { echo: true });
  }

  async listRemotes(): Promise<string[]> {
    return this.lines(await this.exec(['remote']));
  }

  async getRemoteUrl(remote: string): Promise<string> {
    return await this.exec(['remote', 'get-url', remote]);
  }

  async addRemote(name: string, url: string): Promise<void> {
    // The url may carry a token, keep it out of the log
    output.command(`git remote add ${name} <url>`);
    await this.exec(['remote', 'add', name, url]);
  }

  async getDefaultBranch(remote: string): Promise<string> {
    const shown = await this.exec(['remote', 'show', remote], { echo: true });
    for (const line of shown.split('\n')) {
      if (line.includes('HEAD branch')) {
        const branch = line.trim().split(/\s+/).pop() ?? '';
        return branch.split('/').pop() ?? branch;
      }
    }
    throw new ReleaseError(
      `Could not determine the default branch of ${remote}`,
      'GIT_ERROR',
      { remote },
    );
  }

  // --- Branches ---

  async getCurrentBranch(): Promise<string> {
    return await this.exec(['branch', '--show-current']);
  }

  async listBranches(): Promise<string[]> {
    return this.lines(await this.exec(['branch', '--format=%(refname:short)']));
  }

  async fetch(remote: string, ref?: string): Promise<void> {
    const args = ref ? ['fetch', remote, ref, '--tags'] : ['fetch', remote, '--tags'];
    await this.exec(args, { echo: true });
  }

  async checkout(ref: string): Promise<void> {
    await this.exec(['checkout', ref], { echo: true });
  }

  async checkoutBranch(branch: string, startPoint: string): Promise<void> {
    await this.exec(['checkout', '-B', branch, startPoint], { echo: true });
  }

  // --- History ---

  async getHeadRevision(): Promise<string> {
    return await this.exec(['rev-parse', 'HEAD']);
  }

  async getFirstRevision(): Promise<string> {
    const roots = this.lines(await this.exec(['rev-list', '--max-parents=0', 'HEAD']));
    const first = roots[roots.length - 1];
    if (!first) {
      throw new ReleaseError('Repository has no commits', 'GIT_ERROR');
    }
    return first;
  }

  async getCommitDate(rev: string): Promise<string> {
    return await this.exec(['log', '-1', '--format=%cI', rev]);
  }

  async getCommitMessage(rev: string): Promise<string> {
    return await this.exec(['log', '-1', '--format=%B', rev]);
  }

  // --- Tags ---

  async listTags(merged?: string): Promise<string[]> {
    const args = merged ? ['tag', '--merged', merged] : ['tag'];
    return this.lines(await this.exec(args));
  }

  async latestTag(ref: string): Promise<string | null> {
    const tags = await this.execSafe(['tag', '--merged', ref, '--sort=-creatordate']);
    if (!tags) return null;
    return this.lines(tags)[0] ?? null;
  }

  async tagExists(tag: string): Promise<boolean> {
    const result = await this.execSafe(['tag', '-l', tag]);
    return result === tag;
  }

  async createTag(name: string, message?: string): Promise<void> {
    const args = message ? ['tag', name, '-a', '-m', message] : ['tag', name];
    await this.exec(args, { echo: true });
  }

  // --- Changes ---

  async diff(): Promise<string> {
    return await this.exec(['--no-pager', 'diff'], { echo: true });
  }

  async discardChanges(): Promise<void> {
    await this.exec(['checkout', '--', '.'], { echo: true });
  }

  async stash(): Promise<void> {
    await this.exec(['stash'], { echo: true });
  }

  async stashApply(): Promise<void> {
    await this.exec(['stash', 'apply'], { echo: true });
  }

  async commitAll(messages: string[]): Promise<void> {
    const args = ['commit', '-a', ...messages.flatMap((m) => ['-m', m])];
    await this.exec(args, { echo: true });
  }

  async push(remote: string, refspec: string, options: PushOptions = {}): Promise<void> {
    const args = ['push', remote, refspec];
    if (options.followTags) args.push('--follow-tags');
    if (options.tags) args.push('--tags');
    await this.exec(args, { echo: true });
  }

  async clone(url: string, dir: string): Promise<GitClient> {
    const target = resolve(this.cwd, dir);
    // The url may carry a token
    output.command(`git clone <url> ${target}`);
    await this.exec(['clone', url, target]);
    return new LocalGit(target);
  }
}
