import type { Logger } from '../shared/logger.js';

export interface DiscoverContext {
  // Working area owned by this run; the tree is acquired into <workdir>/tests.
  workdir: string;
  // Root of the plan's own metadata tree, used when no url or path is configured.
  treeRoot: string;
  dryRun?: boolean;
  // Context dimensions handed to the metadata tree loader (distro, arch, ...).
  treeContext?: Record<string, string[]>;
  logger?: Logger;
}

export type AcquiredBy = 'clone' | 'copy' | 'none';

export interface AcquiredSource {
  // <workdir>/tests
  testDir: string;
  // Metadata root inside testDir.
  treePath: string;
  // Path from the acquired root to the metadata root; '' when they coincide.
  relativePath: string;
  pathPrefix: string;
  acquiredBy: AcquiredBy;
}

export interface TestCase {
  name: string;
  path: string;
  require: string[];
  recommend: string[];
  // Remaining metadata attributes as returned by the tree.
  attributes: Record<string, unknown>;
  // Prefix already applied to path, set by the path rewriter.
  pathPrefix?: string;
}

export interface DiscoverResult {
  tests: TestCase[];
  source: AcquiredSource;
  modified: string[];
}
