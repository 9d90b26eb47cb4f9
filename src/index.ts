export { discoverTests } from './discover/discover.js';
export type { DiscoverCollaborators } from './discover/discover.js';
export { acquireSource, buildPathPrefix, normalizeRelativePath, TESTS_DIR, EXECUTION_ROOT } from './discover/acquire.js';
export { computeModified, modifiedPatterns, anchoredPattern, mergeNames } from './discover/modified.js';
export { selectTests } from './discover/select.js';
export { rewritePath, applyPathPrefix } from './discover/rewrite.js';
export { expandDependencies } from './discover/dependencies.js';
export type { DependencyResolver, DependencyResolution } from './discover/dependencies.js';
export type { AcquiredSource, DiscoverContext, DiscoverResult, TestCase } from './discover/types.js';
export { resolveConfig, parsePlanDiscoverConfigs, loadPlanDiscoverConfigs, describeConfig } from './config/loader.js';
export type { DiscoverConfig, DiscoverOverrides } from './config/types.js';
export { DEFAULT_BRANCH } from './config/types.js';
export { findRepoRoot } from './vcs/git.js';
export type { RepoRootLookup } from './vcs/git.js';
export { StaticTree, staticTreeLoader } from './tree/static-tree.js';
export { matchesFilter } from './tree/filter.js';
export type { MetadataTree, TreeLoader, TreeNode, TreeQuery } from './tree/types.js';
export { DiscoverError, DiscoverErrorCode, kindOf } from './shared/errors.js';
export type { DiscoverErrorKind } from './shared/errors.js';
