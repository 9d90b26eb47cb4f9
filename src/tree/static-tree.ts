import { DiscoverError, DiscoverErrorCode } from '../shared/errors.js';
import type { TestCase } from '../discover/types.js';
import { matchesFilter } from './filter.js';
import type { MetadataTree, TreeLoader, TreeNode, TreeQuery } from './types.js';

function toList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map(item => String(item));
  return [String(value)];
}

function compileNames(names: readonly string[]): RegExp[] {
  return names.map(name => {
    try {
      return new RegExp(name);
    } catch (err) {
      throw new DiscoverError(DiscoverErrorCode.TREE_QUERY_FAILED, `Invalid test name pattern '${name}'`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  });
}

// In-process tree over nodes that were already loaded by the host. Only
// nodes carrying a 'test' attribute are tests.
export class StaticTree implements MetadataTree {
  private readonly nodes: TreeNode[];

  constructor(nodes: TreeNode[]) {
    this.nodes = [...nodes];
  }

  tests(query: TreeQuery): TestCase[] {
    const patterns = compileNames(query.names);
    return this.nodes
      .filter(node => node.data['test'] !== undefined)
      .filter(node => patterns.length === 0 || patterns.some(p => p.test(node.name)))
      .filter(node => query.filters.every(f => matchesFilter(f, node.data)))
      .map(node => toTestCase(node));
  }
}

function toTestCase(node: TreeNode): TestCase {
  const { require: required, recommend: recommended, ...attributes } = node.data;
  return {
    name: node.name,
    path: node.path ?? node.name,
    require: toList(required),
    recommend: toList(recommended),
    attributes: { ...attributes },
  };
}

export function staticTreeLoader(nodes: TreeNode[]): TreeLoader {
  return () => new StaticTree(nodes);
}
