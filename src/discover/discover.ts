import { describeConfig } from '../config/loader.js';
import type { DiscoverConfig } from '../config/types.js';
import { logger as rootLogger } from '../shared/logger.js';
import type { TreeLoader } from '../tree/types.js';
import { acquireSource } from './acquire.js';
import { expandDependencies } from './dependencies.js';
import type { DependencyResolver } from './dependencies.js';
import { computeModified, fetchReference, mergeNames } from './modified.js';
import { applyPathPrefix } from './rewrite.js';
import { selectTests } from './select.js';
import type { DiscoverContext, DiscoverResult } from './types.js';

export interface DiscoverCollaborators {
  loadTree: TreeLoader;
  // Without a resolver, declared dependencies are kept as they are.
  resolveDependencies?: DependencyResolver;
  // Passed through to the resolver as its caller context.
  caller?: unknown;
}

export async function discoverTests(
  config: DiscoverConfig,
  context: DiscoverContext,
  collaborators: DiscoverCollaborators
): Promise<DiscoverResult> {
  const log = (context.logger ?? rootLogger).child({ step: 'discover', how: 'fmf' });
  const dryRun = context.dryRun ?? false;
  log.debug({ config: Object.fromEntries(describeConfig(config)) }, 'discover configuration');

  const source = await acquireSource(config, { ...context, logger: log });

  for (const filter of config.filter) log.info({ filter }, 'filter');
  if (config.test.length) log.info({ names: config.test }, 'names');

  let modified: string[] = [];
  if (dryRun) {
    if (config.referenceUrl || config.onlyModified) log.debug('Dry run, reference and modified tests skipped.');
  } else if (config.onlyModified) {
    const patterns = await computeModified(source.testDir, {
      referenceUrl: config.referenceUrl,
      referenceRef: config.referenceRef,
      logger: log,
    });
    modified = [...patterns].sort();
  } else if (config.referenceUrl) {
    await fetchReference(source.testDir, config.referenceUrl, log);
  }

  log.debug(`Check metadata tree in '${source.treePath}'.`);
  if (dryRun) {
    return { tests: [], source, modified };
  }

  const names = mergeNames(config.test, modified);
  const tests = await selectTests(
    source.treePath,
    collaborators.loadTree,
    { names, filters: config.filter },
    context.treeContext
  );

  for (const test of tests) applyPathPrefix(test, source.pathPrefix);
  if (collaborators.resolveDependencies) {
    await expandDependencies(tests, collaborators.resolveDependencies, collaborators.caller);
  }

  log.info({ count: tests.length }, `${tests.length} test${tests.length === 1 ? '' : 's'} selected`);
  return { tests, source, modified };
}
