import { DiscoverError, DiscoverErrorCode, wrapError } from '../shared/errors.js';
import type { TreeLoader, TreeQuery } from '../tree/types.js';
import { isDirectory } from './acquire.js';
import type { TestCase } from './types.js';

export async function selectTests(
  treePath: string,
  loadTree: TreeLoader,
  query: TreeQuery,
  treeContext: Record<string, string[]> = {}
): Promise<TestCase[]> {
  if (!(await isDirectory(treePath))) {
    throw new DiscoverError(DiscoverErrorCode.TREE_NOT_FOUND, `Metadata tree path '${treePath}' not found.`);
  }
  try {
    const tree = await loadTree(treePath, treeContext);
    return await tree.tests(query);
  } catch (err) {
    if (err instanceof DiscoverError) throw err;
    throw wrapError(DiscoverErrorCode.TREE_QUERY_FAILED, `Failed to query metadata tree in '${treePath}'`, err);
  }
}
