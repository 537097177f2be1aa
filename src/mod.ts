// Main module exports for programmatic usage

export * from './domain/types.ts';
export * from './domain/changelog.ts';
export * from './domain/config.ts';
export * from './domain/release-commit.ts';
export * from './domain/release-url.ts';
export * from './domain/repository.ts';
export * from './manifest/mod.ts';
export * from './lib/version.ts';
export { ReleaseError } from './lib/error.ts';
export type { GitClient, GitHubClient, PushOptions, SearchPullsOptions } from './clients/types.ts';
export { LocalGit } from './clients/git/local.ts';
export { GitHub, type GitHubClientOptions } from './clients/github.ts';
export { createRunner, type Runner, type RunOptions } from './clients/shell.ts';
export { createContext, main, runCli } from './cli/main.ts';
export { VERSION } from './version_info.ts';

export { prepGitWorkflow } from './workflows/prep-git.ts';
export { bumpVersionWorkflow } from './workflows/bump-version.ts';
export { prepEnvWorkflow } from './workflows/prep-env.ts';
export { buildChangelogWorkflow, checkChangelogWorkflow, generateEntry } from './workflows/build-changelog.ts';
export { draftChangelogWorkflow } from './workflows/draft-changelog.ts';
export { forwardportChangelogWorkflow } from './workflows/forwardport-changelog.ts';
export { tagReleaseWorkflow } from './workflows/tag-release.ts';
export { draftReleaseWorkflow } from './workflows/draft-release.ts';
export { extractReleaseWorkflow } from './workflows/extract-release.ts';
export { publishReleaseWorkflow } from './workflows/publish-release.ts';
export { deleteReleaseWorkflow } from './workflows/delete-release.ts';
