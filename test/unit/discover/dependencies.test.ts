import { expandDependencies } from '../../../src/discover/dependencies.js';
import type { DependencyResolution } from '../../../src/discover/dependencies.js';
import { DiscoverErrorCode } from '../../../src/shared/errors.js';
import type { TestCase } from '../../../src/discover/types.js';

function makeTest(name: string, required: string[] = [], recommended: string[] = []): TestCase {
  return { name, path: name, require: required, recommend: recommended, attributes: {} };
}

describe('expandDependencies', () => {
  it('calls the resolver once per test with dependencies, in order', async () => {
    const tests = [
      makeTest('/a', ['library(db/setup)']),
      makeTest('/b'),
      makeTest('/c', [], ['curl']),
    ];
    const seen: string[][] = [];
    const resolver = jest.fn(async (required: string[], recommended: string[], _caller: unknown): Promise<DependencyResolution> => {
      seen.push([...required, ...recommended]);
      return { require: [...required, 'make'], recommend: recommended, libraries: [{ name: 'db' }] };
    });

    await expandDependencies(tests, resolver, 'discover');

    expect(resolver).toHaveBeenCalledTimes(2);
    expect(resolver.mock.calls[0]?.[2]).toBe('discover');
    expect(seen).toEqual([['library(db/setup)'], ['curl']]);
    expect(tests.map(t => t.require)).toEqual([['library(db/setup)', 'make'], [], ['make']]);
    expect(tests[2]?.recommend).toEqual(['curl']);
  });

  it('wraps resolver failures', async () => {
    const resolver = jest.fn(async (): Promise<DependencyResolution> => {
      throw new Error('library repository unreachable');
    });
    await expect(expandDependencies([makeTest('/a', ['library(x/y)'])], resolver, null)).rejects.toMatchObject({
      code: DiscoverErrorCode.DEPENDENCY_RESOLUTION_FAILED,
      context: { cause: 'library repository unreachable' },
    });
  });

  it('accepts a synchronous resolver', async () => {
    const tests = [makeTest('/a', ['bash'])];
    await expandDependencies(tests, (required, recommended) => ({ require: required.map(r => r.toUpperCase()), recommend: recommended }), {});
    expect(tests[0]?.require).toEqual(['BASH']);
  });
});
