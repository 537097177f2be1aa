/**
 * GitHub API client - repository, pulls, search, releases and tags.
 *
 * Responses are read as `unknown` and mapped to domain types field by
 * field; a payload missing a field we rely on is a GITHUB_API_ERROR.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type {
  CreatePROptions,
  CreateReleaseOptions,
  PullRequest,
  Release,
  ReleaseAsset,
  Repository,
  TagRef,
  UpdateReleaseOptions,
  User,
} from '../domain/types.ts';
import type { GitHubClient, SearchPullsOptions } from './types.ts';
import { ReleaseError } from '../lib/error.ts';

export type Fetch = (url: string, init: RequestInit) => Promise<Response>;

export interface GitHubClientOptions {
  owner: string;
  repo: string;
  /** Anonymous requests when omitted (rate limited, read-only) */
  token?: string;
  fetch?: Fetch;
  baseUrl?: string;
}

const PAGE_SIZE = 100;

// --- Response mapping ---

type Json = Record<string, unknown>;

function invalid(what: string, value: unknown): ReleaseError {
  return new ReleaseError(
    `Unexpected GitHub API response: ${what}`,
    'GITHUB_API_ERROR',
    { value },
  );
}

function asObject(value: unknown, what: string): Json {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid(`${what} is not an object`, value);
  }
  // Narrowed above; index signature access is all we need
  return Object.fromEntries(Object.entries(value));
}

function asArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw invalid(`${what} is not a list`, value);
  }
  return value;
}

function str(json: Json, key: string): string {
  const value = json[key];
  if (typeof value !== 'string') throw invalid(`${key} is not a string`, value);
  return value;
}

function optStr(json: Json, key: string): string | null {
  const value = json[key];
  return typeof value === 'string' ? value : null;
}

function num(json: Json, key: string): number {
  const value = json[key];
  if (typeof value !== 'number') throw invalid(`${key} is not a number`, value);
  return value;
}

function bool(json: Json, key: string): boolean {
  return json[key] === true;
}

function toUser(value: unknown): User | null {
  if (value === null || value === undefined) return null;
  const json = asObject(value, 'user');
  return { login: str(json, 'login'), url: str(json, 'html_url') };
}

function toLabels(value: unknown): string[] {
  if (value === undefined) return [];
  return asArray(value, 'labels').map((label) => str(asObject(label, 'label'), 'name'));
}

function toPullRequest(value: unknown): PullRequest {
  const json = asObject(value, 'pull request');
  // Search results are issues; the merge date sits under pull_request
  const pull = json.pull_request === undefined ? json : asObject(json.pull_request, 'pull_request');

  return {
    number: num(json, 'number'),
    title: str(json, 'title'),
    body: optStr(json, 'body') ?? '',
    url: str(json, 'html_url'),
    author: toUser(json.user),
    labels: toLabels(json.labels),
    mergedAt: optStr(pull, 'merged_at'),
  };
}

function toAsset(value: unknown): ReleaseAsset {
  const json = asObject(value, 'asset');
  return { id: num(json, 'id'), name: str(json, 'name'), url: str(json, 'url') };
}

function toRelease(value: unknown): Release {
  const json = asObject(value, 'release');
  return {
    id: num(json, 'id'),
    tagName: str(json, 'tag_name'),
    targetCommitish: str(json, 'target_commitish'),
    name: optStr(json, 'name') ?? '',
    body: optStr(json, 'body') ?? '',
    draft: bool(json, 'draft'),
    prerelease: bool(json, 'prerelease'),
    url: str(json, 'url'),
    htmlUrl: str(json, 'html_url'),
    uploadUrl: str(json, 'upload_url'),
    createdAt: str(json, 'created_at'),
    assets: json.assets === undefined ? [] : asArray(json.assets, 'assets').map(toAsset),
  };
}

function toRepository(value: unknown): Repository {
  const json = asObject(value, 'repository');
  return {
    fullName: str(json, 'full_name'),
    htmlUrl: str(json, 'html_url'),
    cloneUrl: str(json, 'clone_url'),
    defaultBranch: str(json, 'default_branch'),
  };
}

function toTagRef(value: unknown): TagRef {
  const json = asObject(value, 'ref');
  return { ref: str(json, 'ref'), sha: str(asObject(json.object, 'ref object'), 'sha') };
}

// --- Client ---

export class GitHub implements GitHubClient {
  private owner: string;
  private repo: string;
  private token: string | undefined;
  private fetch: Fetch;
  private baseUrl: string;

  constructor(options: GitHubClientOptions) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.token = options.token || undefined;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.baseUrl = options.baseUrl ?? 'https://api.github.com';
  }

  /** `owner/repo` */
  get fullName(): string {
    return `${this.owner}/${this.repo}`;
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      ...extra,
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }

  /**
   * Make a GitHub API request and return the raw response.
   */
  private async send(
    path: string,
    init: { method?: string; body?: string | Buffer; headers?: Record<string, string> } = {},
  ): Promise<Response> {
    const url = path.startsWith('http') ? path : `${this.baseUrl}${path}`;

    const response = await this.fetch(url, {
      method: init.method ?? 'GET',
      body: init.body,
      headers: this.headers(init.headers),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new ReleaseError(
        `GitHub API error: ${response.status} ${response.statusText}\n${body}`,
        'GITHUB_API_ERROR',
        { status: response.status, body },
      );
    }

    return response;
  }

  /**
   * Make a JSON request and return the parsed body.
   */
  private async request(path: string, method = 'GET', payload?: object): Promise<unknown> {
    const response = await this.send(path, {
      method,
      body: payload === undefined ? undefined : JSON.stringify(payload),
      headers: payload === undefined ? {} : { 'Content-Type': 'application/json' },
    });
    const json: unknown = await response.json();
    return json;
  }

  /**
   * Collect every page of a list endpoint.
   */
  private async paginate(path: string, select: (page: unknown) => unknown[]): Promise<unknown[]> {
    const items: unknown[] = [];
    const separator = path.includes('?') ? '&' : '?';

    for (let page = 1;; page++) {
      const batch = select(
        await this.request(`${path}${separator}per_page=${PAGE_SIZE}&page=${page}`),
      );
      items.push(...batch);
      if (batch.length < PAGE_SIZE) break;
    }

    return items;
  }

  private get repoPath(): string {
    return `/repos/${this.owner}/${this.repo}`;
  }

  // --- Repository ---

  async getRepository(): Promise<Repository> {
    return toRepository(await this.request(this.repoPath));
  }

  // --- PR Operations ---

  async getPR(number: number): Promise<PullRequest> {
    return toPullRequest(await this.request(`${this.repoPath}/pulls/${number}`));
  }

  async createPR(options: CreatePROptions): Promise<PullRequest> {
    return toPullRequest(
      await this.request(`${this.repoPath}/pulls`, 'POST', {
        title: options.title,
        body: options.body,
        head: options.head,
        base: options.base,
        maintainer_can_modify: options.maintainerCanModify ?? true,
      }),
    );
  }

  async searchMergedPRs(options: SearchPullsOptions): Promise<PullRequest[]> {
    const query = [
      `repo:${this.fullName}`,
      'is:pr',
      'is:merged',
      `base:${options.branch}`,
      `merged:>=${options.since}`,
    ].join(' ');

    const items = await this.paginate(
      `/search/issues?q=${encodeURIComponent(query)}`,
      (page) => asArray(asObject(page, 'search result').items, 'items'),
    );
    return items.map(toPullRequest);
  }

  // --- Releases ---

  async listReleases(): Promise<Release[]> {
    const items = await this.paginate(
      `${this.repoPath}/releases`,
      (page) => asArray(page, 'releases'),
    );
    return items.map(toRelease);
  }

  async createRelease(options: CreateReleaseOptions): Promise<Release> {
    return toRelease(
      await this.request(`${this.repoPath}/releases`, 'POST', {
        tag_name: options.tag,
        target_commitish: options.target,
        name: options.name,
        body: options.body,
        draft: options.draft,
        prerelease: options.prerelease,
      }),
    );
  }

  async updateRelease(id: number, options: UpdateReleaseOptions): Promise<Release> {
    return toRelease(
      await this.request(`${this.repoPath}/releases/${id}`, 'PATCH', {
        tag_name: options.tag,
        target_commitish: options.target,
        name: options.name,
        body: options.body,
        draft: options.draft,
        prerelease: options.prerelease,
      }),
    );
  }

  async deleteRelease(id: number): Promise<void> {
    await this.send(`${this.repoPath}/releases/${id}`, { method: 'DELETE' });
  }

  // --- Release assets ---

  async uploadReleaseAsset(release: Release, path: string): Promise<ReleaseAsset> {
    // upload_url is a URI template: .../assets{?name,label}
    const base = release.uploadUrl.replace(/\{.*\}$/, '');
    const name = basename(path);

    const response = await this.send(`${base}?name=${encodeURIComponent(name)}`, {
      method: 'POST',
      body: await readFile(path),
      headers: { 'Content-Type': 'application/octet-stream' },
    });
    const json: unknown = await response.json();
    return toAsset(json);
  }

  async downloadReleaseAsset(asset: ReleaseAsset, dest: string): Promise<void> {
    const response = await this.send(asset.url, {
      headers: { 'Accept': 'application/octet-stream' },
    });
    await writeFile(dest, Buffer.from(await response.arrayBuffer()));
  }

  async deleteReleaseAsset(id: number): Promise<void> {
    await this.send(`${this.repoPath}/releases/assets/${id}`, { method: 'DELETE' });
  }

  // --- Tags ---

  async listTags(): Promise<TagRef[]> {
    const refs = asArray(await this.request(`${this.repoPath}/git/matching-refs/tags`), 'refs');
    return refs.map(toTagRef);
  }
}
