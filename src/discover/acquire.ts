import fs from 'fs/promises';
import path from 'path';
import { DiscoverError, DiscoverErrorCode, wrapError } from '../shared/errors.js';
import { logger as rootLogger } from '../shared/logger.js';
import { checkoutRevision, cloneRepository, findRepoRoot } from '../vcs/git.js';
import type { DiscoverConfig } from '../config/types.js';
import type { AcquiredBy, AcquiredSource, DiscoverContext } from './types.js';

export const TESTS_DIR = 'tests';
export const EXECUTION_ROOT = '/tests';

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw err;
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw err;
  }
}

// '' and '.' both mean "the acquired root itself".
export function normalizeRelativePath(relativePath: string | undefined): string {
  if (!relativePath) return '';
  const stripped = relativePath.replace(/^\/+/, '');
  return stripped === '.' ? '' : stripped;
}

export function buildPathPrefix(relativePath: string): string {
  return path.posix.join(EXECUTION_ROOT, normalizeRelativePath(relativePath));
}

// The destination must not exist yet; leftovers of an earlier run are never merged in.
export async function copyTree(source: string, destination: string): Promise<void> {
  if (await pathExists(destination)) {
    throw new DiscoverError(
      DiscoverErrorCode.COPY_FAILED,
      `Failed to copy '${source}' to '${destination}': destination already exists`
    );
  }
  try {
    await fs.cp(source, destination, { recursive: true, verbatimSymlinks: true });
  } catch (err) {
    throw wrapError(DiscoverErrorCode.COPY_FAILED, `Failed to copy '${source}' to '${destination}'`, err);
  }
}

export async function acquireSource(config: DiscoverConfig, context: DiscoverContext): Promise<AcquiredSource> {
  const log = context.logger ?? rootLogger;
  const dryRun = context.dryRun ?? false;
  const testDir = path.join(context.workdir, TESTS_DIR);
  let relativePath: string;
  let acquiredBy: AcquiredBy = 'none';

  if (config.url) {
    log.info({ url: config.url }, 'url');
    log.debug(`Clone '${config.url}' to '${testDir}'.`);
    if (!dryRun) {
      await cloneRepository(config.url, testDir);
      acquiredBy = 'clone';
    }
    relativePath = normalizeRelativePath(config.path);
  } else {
    if (config.path && !(await isDirectory(config.path))) {
      throw new DiscoverError(
        DiscoverErrorCode.PATH_NOT_DIRECTORY,
        `Provided path '${config.path}' is not a directory.`
      );
    }
    const metadataRoot = config.path ?? context.treeRoot;
    const lookup = await findRepoRoot(metadataRoot);
    let sourceRoot: string;
    let fromRoot: string;
    if (lookup.found) {
      sourceRoot = lookup.root;
      // git reports the resolved top level; compare against the resolved metadata root
      fromRoot = await fs.realpath(metadataRoot);
    } else {
      log.debug({ reason: lookup.reason }, `Git root not found, using '${metadataRoot}'.`);
      sourceRoot = metadataRoot;
      fromRoot = metadataRoot;
    }
    relativePath = normalizeRelativePath(path.relative(sourceRoot, fromRoot));
    log.info({ directory: sourceRoot }, 'directory');
    log.debug(`Copy '${sourceRoot}' to '${testDir}'.`);
    if (!dryRun) {
      await copyTree(sourceRoot, testDir);
      acquiredBy = 'copy';
    }
  }

  if (config.ref) {
    log.info({ ref: config.ref }, 'ref');
    log.debug(`Checkout ref '${config.ref}'.`);
    if (!dryRun) await checkoutRevision(testDir, config.ref);
  }

  if (relativePath) log.info({ path: relativePath }, 'path');
  const treePath = path.join(testDir, relativePath);

  // A path inside a cloned repository can only be checked once the clone exists.
  if (config.url && config.path && !dryRun && !(await isDirectory(treePath))) {
    throw new DiscoverError(
      DiscoverErrorCode.PATH_NOT_DIRECTORY,
      `Provided path '${config.path}' is not a directory in '${config.url}'.`
    );
  }

  return {
    testDir,
    treePath,
    relativePath,
    pathPrefix: buildPathPrefix(relativePath),
    acquiredBy,
  };
}
