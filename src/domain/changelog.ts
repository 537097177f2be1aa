/**
 * Changelog document handling - render, splice, merge and check entries.
 *
 * Pure functions, no I/O.
 *
 * The entry under construction lives between START_MARKER and END_MARKER.
 * Everything outside the markers is finalized history and is never
 * rewritten; everything inside may have been edited by hand and is only
 * ever added to.
 */

import type { Activity, PullRequest } from './types.ts';
import { ReleaseError } from '../lib/error.ts';

export const START_MARKER = '<!-- <START NEW CHANGELOG ENTRY> -->';
export const END_MARKER = '<!-- <END NEW CHANGELOG ENTRY> -->';

/** Title prefix of the PRs that carry changelog entries */
export const PR_PREFIX = 'Automated Changelog Entry';

/** Section titles keyed by the labels that select them, in display order */
const LABEL_GROUPS: Array<{ title: string; labels: string[] }> = [
  { title: 'API and Breaking Changes', labels: ['api-change', 'apichange', 'breaking'] },
  { title: 'New features added', labels: ['feature', 'new'] },
  { title: 'Enhancements made', labels: ['enhancement', 'enhancements'] },
  { title: 'Bugs fixed', labels: ['bug', 'bugfix', 'bugs'] },
  { title: 'Maintenance and upkeep improvements', labels: ['maintenance', 'maint'] },
  { title: 'Documentation improvements', labels: ['documentation', 'docs', 'doc'] },
  { title: 'Deprecated features', labels: ['deprecation', 'deprecate'] },
];

const OTHER_GROUP = 'Other merged PRs';
const CONTRIBUTORS_HEADING = '### Contributors to this release';

const PR_REF = /\[#(\d+)\]/g;
const CONTRIBUTOR_LINK = /\[@([^\]]+)\]\([^)]*\)/g;
const HEADING = /^#{1,6} /;
const COMPARE_LINK = /https:\/\/github\.com\/([^/\s]+\/[^/\s]+)\/compare\//;
const BULLET = /^\s*[-*] /;

export interface MarkerPositions {
  start: number;
  end: number;
}

/**
 * Locate the entry markers, validating that each appears exactly once
 * and in order.
 */
export function findMarkers(text: string): MarkerPositions {
  const start = text.indexOf(START_MARKER);
  const end = text.indexOf(END_MARKER);

  if (start === -1 || end === -1) {
    throw new ReleaseError(
      'Missing new changelog entry delimiter(s)',
      'MISSING_CHANGELOG_MARKERS',
      { start: START_MARKER, end: END_MARKER },
    );
  }

  if (start !== text.lastIndexOf(START_MARKER)) {
    throw new ReleaseError(
      'Insert marker appears more than once in changelog',
      'DUPLICATE_CHANGELOG_MARKER',
      { marker: START_MARKER },
    );
  }

  if (end !== text.lastIndexOf(END_MARKER)) {
    throw new ReleaseError(
      'End marker appears more than once in changelog',
      'DUPLICATE_CHANGELOG_MARKER',
      { marker: END_MARKER },
    );
  }

  if (start > end) {
    throw new ReleaseError(
      'Insert markers are out of order in changelog',
      'CHANGELOG_MARKERS_OUT_OF_ORDER',
    );
  }

  return { start, end };
}

/**
 * Get the entry between the markers, or empty string when there are none.
 */
export function extractCurrentEntry(text: string): string {
  if (!text.includes(START_MARKER)) {
    return '';
  }
  const { start, end } = findMarkers(text);
  return text.slice(start + START_MARKER.length, end).trim();
}

/**
 * PR numbers referenced as `[#123]`, in order of first appearance.
 */
export function pullRequestNumbers(entry: string): number[] {
  const seen = new Set<number>();
  for (const match of entry.matchAll(PR_REF)) {
    seen.add(Number(match[1]));
  }
  return [...seen];
}

/**
 * Identity of an entry: the repository and the set of PRs it covers.
 * Hand edits to titles or prose do not change it.
 */
export function entryFingerprint(repo: string, entry: string): string {
  const numbers = pullRequestNumbers(entry).sort((a, b) => a - b);
  return `${repo}#${numbers.join(',')}`;
}

/**
 * `owner/repo` of an entry, read from its Full Changelog link.
 */
export function entryRepository(entry: string): string {
  return COMPARE_LINK.exec(entry)?.[1] ?? '';
}

/**
 * Whether an entry has a heading for the given version.
 */
export function hasVersionHeading(entry: string, version: string): boolean {
  const escaped = version.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^#{1,6} ${escaped}\\s*$`, 'm').test(entry);
}

// --- Rendering ---

function groupTitle(pull: PullRequest): string {
  const labels = pull.labels.map((l) => l.toLowerCase());
  for (const group of LABEL_GROUPS) {
    if (group.labels.some((l) => labels.includes(l))) {
      return group.title;
    }
  }
  return OTHER_GROUP;
}

/**
 * Format a single PR bullet.
 */
export function formatPullRequest(pull: PullRequest): string {
  const author = pull.author ? ` ([@${pull.author.login}](${pull.author.url}))` : '';
  return `- ${pull.title.trim()} [#${pull.number}](${pull.url})${author}`;
}

function formatContributors(activity: Activity): string | null {
  const logins = new Map<string, string>();
  for (const pull of activity.pulls) {
    const login = pull.author?.login;
    if (!login || login.endsWith('[bot]')) continue;
    logins.set(login.toLowerCase(), login);
  }

  if (logins.size === 0) return null;

  const from = activity.sinceDate.slice(0, 10);
  const to = activity.untilDate.slice(0, 10);
  const repo = encodeURIComponent(activity.repo);

  const links = [...logins.keys()]
    .sort()
    .map((key) => {
      const login = logins.get(key) ?? key;
      return `[@${login}](https://github.com/search?q=repo%3A${repo}+involves%3A${
        encodeURIComponent(login)
      }+updated%3A${from}..${to}&type=Issues)`;
    })
    .join(' | ');

  const page = `([GitHub contributors page for this release](https://github.com/${activity.repo}` +
    `/graphs/contributors?from=${from}&to=${to}&type=c))`;

  return `${CONTRIBUTORS_HEADING}\n\n${page}\n\n${links}`;
}

/**
 * Render a full changelog entry for a version.
 */
export function renderEntry(activity: Activity): string {
  const sections = [
    `## ${activity.version}`,
    `([Full Changelog](https://github.com/${activity.repo}/compare/${activity.since}...${activity.until}))`,
  ];

  const groups = new Map<string, PullRequest[]>();
  for (const pull of activity.pulls) {
    const title = groupTitle(pull);
    const pulls = groups.get(title) ?? [];
    pulls.push(pull);
    groups.set(title, pulls);
  }

  for (const title of [...LABEL_GROUPS.map((g) => g.title), OTHER_GROUP]) {
    const pulls = groups.get(title);
    if (!pulls) continue;
    const items = [...pulls]
      .sort((a, b) => b.number - a.number)
      .map(formatPullRequest)
      .join('\n');
    sections.push(`### ${title}\n\n${items}`);
  }

  const contributors = formatContributors(activity);
  if (contributors) {
    sections.push(contributors);
  }

  return sections.join('\n\n');
}

// --- Merging ---

function insertBullet(lines: string[], heading: string | null, bullet: string): void {
  const headingIndex = heading ? lines.findIndex((l) => l.trim() === heading) : -1;

  if (headingIndex !== -1) {
    let last = headingIndex;
    for (let i = headingIndex + 1; i < lines.length; i++) {
      if (HEADING.test(lines[i].trim())) break;
      if (BULLET.test(lines[i])) last = i;
    }

    if (last === headingIndex) {
      lines.splice(headingIndex + 1, 0, '', bullet);
    } else {
      lines.splice(last + 1, 0, bullet);
    }
    return;
  }

  // Section missing from the previous entry: add it ahead of the contributors
  const section = [heading ?? `### ${OTHER_GROUP}`, '', bullet];
  const contributorsIndex = lines.findIndex((l) => l.trim() === CONTRIBUTORS_HEADING);
  if (contributorsIndex !== -1) {
    lines.splice(contributorsIndex, 0, ...section, '');
    return;
  }

  if (lines.length > 0 && lines[lines.length - 1].trim() !== '') {
    lines.push('');
  }
  lines.push(...section);
}

function contributorLineIndex(lines: string[]): number {
  const headingIndex = lines.findIndex((l) => l.trim() === CONTRIBUTORS_HEADING);
  if (headingIndex === -1) return -1;

  for (let i = headingIndex + 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (HEADING.test(line)) break;
    if (line.startsWith('[@')) return i;
  }
  return -1;
}

function contributorsSection(lines: string[]): string[] {
  const start = lines.findIndex((l) => l.trim() === CONTRIBUTORS_HEADING);
  if (start === -1) return [];

  let end = start + 1;
  while (end < lines.length && !HEADING.test(lines[end].trim())) end++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end);
}

function mergeContributors(lines: string[], generated: string[]): void {
  if (!lines.some((l) => l.trim() === CONTRIBUTORS_HEADING)) {
    const section = contributorsSection(generated);
    if (section.length === 0) return;
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
    lines.push('', ...section);
    return;
  }

  const generatedIndex = contributorLineIndex(generated);
  const previousIndex = contributorLineIndex(lines);
  if (generatedIndex === -1 || previousIndex === -1) return;

  const known = new Set(
    [...lines[previousIndex].matchAll(CONTRIBUTOR_LINK)].map((m) => m[1].toLowerCase()),
  );
  const added = [...generated[generatedIndex].matchAll(CONTRIBUTOR_LINK)]
    .filter((m) => !known.has(m[1].toLowerCase()))
    .map((m) => m[0]);

  if (added.length > 0) {
    lines[previousIndex] = [lines[previousIndex].trimEnd(), ...added].join(' | ');
  }
}

/**
 * Merge a freshly generated entry into a previously written one.
 *
 * The previous entry is kept verbatim; only bullets for PRs it does not
 * mention yet, and their authors, are added. When nothing is new the
 * previous entry is returned unchanged.
 */
export function mergeEntries(previous: string, generated: string): string {
  const sameEntry = entryFingerprint(entryRepository(previous), previous) ===
    entryFingerprint(entryRepository(generated), generated);
  if (sameEntry) {
    return previous;
  }

  const known = new Set(pullRequestNumbers(previous));
  const generatedLines = generated.split('\n');
  const additions: Array<{ heading: string | null; bullet: string }> = [];

  let heading: string | null = null;
  for (const line of generatedLines) {
    if (HEADING.test(line.trim())) {
      heading = line.trim();
      continue;
    }
    if (!BULLET.test(line)) continue;

    const numbers = pullRequestNumbers(line);
    if (numbers.length === 0 || numbers.some((n) => known.has(n))) continue;
    additions.push({ heading, bullet: line });
  }

  if (additions.length === 0) {
    return previous;
  }

  const lines = previous.split('\n');
  for (const { heading, bullet } of additions) {
    insertBullet(lines, heading, bullet);
  }
  mergeContributors(lines, generatedLines);

  return lines.join('\n');
}

function wrap(entry: string): string {
  return `${START_MARKER}\n\n${entry}\n\n${END_MARKER}`;
}

/**
 * Insert an entry between the markers.
 *
 * - Empty region: the entry fills it.
 * - Region holds an entry for `version`: the two are merged.
 * - Otherwise the region holds a finalized entry: the markers move to
 *   wrap the new entry and the old one stays right below them.
 */
export function insertEntry(text: string, entry: string, version?: string): string {
  const { start, end } = findMarkers(text);
  const before = text.slice(0, start);
  const current = text.slice(start + START_MARKER.length, end).trim();
  const after = text.slice(end + END_MARKER.length);
  const generated = entry.trim();

  if (!current) {
    return before + wrap(generated) + after;
  }

  if (version && hasVersionHeading(current, version)) {
    const merged = mergeEntries(current, generated);
    if (merged === current) {
      return text;
    }
    return before + wrap(merged) + after;
  }

  const rest = after.trimStart();
  return before + wrap(generated) + '\n\n' + current + (rest ? `\n\n${rest}` : '\n');
}

// --- Checking ---

/**
 * Validate the entry between the markers against a freshly generated one.
 * Returns the entry as written in the changelog.
 */
export function checkEntry(text: string, version: string, generated: string): string {
  const { start, end } = findMarkers(text);
  const entry = text.slice(start + START_MARKER.length, end).trim();

  if (!hasVersionHeading(entry, version)) {
    throw new ReleaseError(
      `Did not find entry for ${version}`,
      'MISSING_VERSION_ENTRY',
      { version, entry },
    );
  }

  const written = new Set(pullRequestNumbers(entry));
  const expected = new Set(pullRequestNumbers(generated));
  const generatedLines = generated.split('\n');

  for (const number of expected) {
    if (written.has(number)) continue;

    // The changelog PR itself is never listed in its own entry
    const isChangelogPR = generatedLines.some(
      (line) => line.includes(`[#${number}]`) && line.includes(PR_PREFIX),
    );
    if (isChangelogPR) continue;

    throw new ReleaseError(
      `Missing PR #${number} in changelog`,
      'MISSING_PR',
      { number, version },
    );
  }

  for (const number of written) {
    if (!expected.has(number)) {
      throw new ReleaseError(
        `PR #${number} does not belong in changelog for ${version}`,
        'UNEXPECTED_PR',
        { number, version },
      );
    }
  }

  return entry;
}

// --- Forward porting ---

function lineOffset(text: string, line: string): number {
  const target = line.trimEnd();
  let offset = 0;
  for (const current of text.split('\n')) {
    if (current.trimEnd() === target) return offset;
    offset += current.length + 1;
  }
  return -1;
}

/**
 * First Markdown heading after the end marker, i.e. the newest finalized entry.
 */
export function findPreviousHeader(text: string): string | null {
  const { end } = findMarkers(text);
  for (const line of text.slice(end + END_MARKER.length).split('\n')) {
    if (line.trim().startsWith('#')) {
      return line;
    }
  }
  return null;
}

/**
 * Carry an entry released from another branch into this changelog,
 * placing it right above the entry it followed on that branch.
 */
export function forwardPortEntry(
  text: string,
  entry: string,
  previousHeader: string,
): string {
  const index = lineOffset(text, previousHeader);
  if (index === -1) {
    throw new ReleaseError(
      `Could not find previous header "${previousHeader}" in changelog`,
      'MISSING_PREVIOUS_HEADER',
      { header: previousHeader },
    );
  }

  // The previous entry is still the current one here: move the markers
  if (lineOffset(extractCurrentEntry(text), previousHeader) !== -1) {
    return insertEntry(text, entry);
  }

  return text.slice(0, index) + entry.trim() + '\n\n' + text.slice(index);
}
