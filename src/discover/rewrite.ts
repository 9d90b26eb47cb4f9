import path from 'path';
import { DiscoverError, DiscoverErrorCode } from '../shared/errors.js';
import type { TestCase } from './types.js';

export function rewritePath(prefix: string, testPath: string): string {
  return path.posix.normalize(`${prefix}/${testPath.replace(/^\/+/, '')}`);
}

// Moves a test into the execution namespace. Each test is rewritten once:
// the same prefix again is a no-op, a different one is refused.
export function applyPathPrefix(test: TestCase, prefix: string): TestCase {
  if (test.pathPrefix !== undefined) {
    if (test.pathPrefix === prefix) return test;
    throw new DiscoverError(
      DiscoverErrorCode.PATH_ALREADY_REWRITTEN,
      `Test '${test.name}' already rewritten with prefix '${test.pathPrefix}'`,
      { prefix }
    );
  }
  test.path = rewritePath(prefix, test.path);
  test.pathPrefix = prefix;
  return test;
}
