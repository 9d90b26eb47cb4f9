import { DiscoverError, wrapError, DiscoverErrorCode } from '../shared/errors.js';
import type { TestCase } from './types.js';

export interface DependencyResolution {
  require: string[];
  recommend: string[];
  // Library metadata the resolver may report; not used by discovery.
  libraries?: unknown[];
}

export type DependencyResolver = (
  require: string[],
  recommend: string[],
  caller: unknown
) => Promise<DependencyResolution> | DependencyResolution;

// Calls the resolver once for each test that declares dependencies, in
// order, and replaces the test's lists with what it returns.
export async function expandDependencies(
  tests: TestCase[],
  resolve: DependencyResolver,
  caller: unknown
): Promise<void> {
  for (const test of tests) {
    if (test.require.length === 0 && test.recommend.length === 0) continue;
    let resolution: DependencyResolution;
    try {
      resolution = await resolve(test.require, test.recommend, caller);
    } catch (err) {
      if (err instanceof DiscoverError) throw err;
      throw wrapError(
        DiscoverErrorCode.DEPENDENCY_RESOLUTION_FAILED,
        `Failed to resolve dependencies of '${test.name}'`,
        err
      );
    }
    test.require = resolution.require;
    test.recommend = resolution.recommend;
  }
}
