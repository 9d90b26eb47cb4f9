import path from 'path';
import { logger as rootLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import { REFERENCE_REMOTE, addRemote, fetchRemote, listChangedFiles } from '../vcs/git.js';

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function anchoredPattern(directory: string): string {
  return `^/${escapeRegExp(directory)}$`;
}

// Maps changed file paths onto exact-match patterns for their top-level
// directories. Files at the tree root have no directory and select nothing.
export function modifiedPatterns(changedFiles: readonly string[]): Set<string> {
  const patterns = new Set<string>();
  for (const file of changedFiles) {
    const directory = path.posix.dirname(file.trim());
    if (directory === '.' || directory === '/' || directory === '') continue;
    const topLevel = directory.replace(/^\/+/, '').split('/')[0];
    if (topLevel) patterns.add(anchoredPattern(topLevel));
  }
  return patterns;
}

export interface ModifiedOptions {
  referenceUrl?: string;
  referenceRef: string;
  logger?: Logger;
}

export async function fetchReference(workingDir: string, referenceUrl: string, logger?: Logger): Promise<void> {
  const log = logger ?? rootLogger;
  log.info({ reference_url: referenceUrl }, 'reference_url');
  log.debug(`Fetch also '${referenceUrl}' as '${REFERENCE_REMOTE}'.`);
  await addRemote(workingDir, REFERENCE_REMOTE, referenceUrl);
  await fetchRemote(workingDir, REFERENCE_REMOTE);
}

export async function computeModified(workingDir: string, options: ModifiedOptions): Promise<Set<string>> {
  const log = options.logger ?? rootLogger;
  if (options.referenceUrl) {
    await fetchReference(workingDir, options.referenceUrl, log);
  }
  log.info({ reference_ref: options.referenceRef }, 'reference_ref');
  const changed = await listChangedFiles(workingDir, options.referenceRef);
  const patterns = modifiedPatterns(changed);
  log.debug({ modified: [...patterns] }, 'Limit to modified test dirs');
  return patterns;
}

// Explicit names first, then modified patterns not already named, in sorted order.
export function mergeNames(explicit: readonly string[], modified: Iterable<string>): string[] {
  const names = [...explicit];
  for (const pattern of [...modified].sort()) {
    if (!names.includes(pattern)) names.push(pattern);
  }
  return names;
}
