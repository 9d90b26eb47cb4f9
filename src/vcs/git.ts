import fs from 'fs/promises';
import { run, runOrThrow } from '../shared/exec.js';
import { DiscoverErrorCode, wrapError } from '../shared/errors.js';

export const REFERENCE_REMOTE = 'reference';

export type RepoRootLookup =
  | { found: true; root: string }
  | { found: false; reason: string };

// Looks up the repository root containing dirPath. A directory outside any
// repository is an expected outcome, not a failure.
export async function findRepoRoot(dirPath: string): Promise<RepoRootLookup> {
  try {
    const stat = await fs.stat(dirPath);
    if (!stat.isDirectory()) return { found: false, reason: `Not a directory: ${dirPath}` };
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { found: false, reason: `Directory does not exist: ${dirPath}` };
    }
    throw err;
  }
  const result = await run('git', ['rev-parse', '--show-toplevel'], { cwd: dirPath });
  if (result.exitCode !== 0) {
    return { found: false, reason: result.stderr.trim() || `Not a git repository: ${dirPath}` };
  }
  return { found: true, root: result.stdout.trim() };
}

export async function cloneRepository(url: string, destination: string): Promise<void> {
  try {
    await runOrThrow('git', ['clone', url, destination]);
  } catch (err) {
    throw wrapError(DiscoverErrorCode.CLONE_FAILED, `Failed to clone '${url}' to '${destination}'`, err);
  }
}

export async function checkoutRevision(repoPath: string, ref: string): Promise<void> {
  try {
    await runOrThrow('git', ['checkout', '-f', ref], { cwd: repoPath });
  } catch (err) {
    throw wrapError(DiscoverErrorCode.CHECKOUT_FAILED, `Failed to checkout ref '${ref}' in: ${repoPath}`, err);
  }
}

export async function addRemote(repoPath: string, name: string, url: string): Promise<void> {
  try {
    await runOrThrow('git', ['remote', 'add', name, url], { cwd: repoPath });
  } catch (err) {
    throw wrapError(DiscoverErrorCode.REFERENCE_FETCH_FAILED, `Failed to add remote '${name}' (${url})`, err);
  }
}

export async function fetchRemote(repoPath: string, name: string): Promise<void> {
  try {
    await runOrThrow('git', ['fetch', name], { cwd: repoPath });
  } catch (err) {
    throw wrapError(DiscoverErrorCode.REFERENCE_FETCH_FAILED, `Failed to fetch remote '${name}'`, err);
  }
}

// File paths touched by commits in <since>..HEAD, one entry per commit and file.
export async function listChangedFiles(repoPath: string, since: string): Promise<string[]> {
  let stdout: string;
  try {
    const result = await runOrThrow(
      'git',
      ['log', '--format=', '--stat', '--name-only', `${since}..HEAD`],
      { cwd: repoPath }
    );
    stdout = result.stdout;
  } catch (err) {
    throw wrapError(DiscoverErrorCode.MODIFIED_DIFF_FAILED, `Failed to list files changed since '${since}'`, err);
  }
  return stdout.split('\n').map(line => line.trim()).filter(line => line.length > 0);
}
