import type { TestCase } from '../discover/types.js';

export interface TreeQuery {
  // Regular expressions searched in the test name; empty selects every name.
  names: readonly string[];
  // Filter expressions that must all match; empty selects everything.
  filters: readonly string[];
}

// Query contract of a metadata tree engine. Results come back in the tree's
// own stable order, as fresh TestCase objects the caller may mutate.
export interface MetadataTree {
  tests(query: TreeQuery): Promise<TestCase[]> | TestCase[];
}

export type TreeLoader = (
  treePath: string,
  context: Record<string, string[]>
) => Promise<MetadataTree> | MetadataTree;

export interface TreeNode {
  name: string;
  // Directory of the node relative to the tree root; defaults to the name.
  path?: string;
  data: Record<string, unknown>;
}
