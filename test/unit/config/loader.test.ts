import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  describeConfig,
  loadPlanDiscoverConfigs,
  parsePlanDiscoverConfigs,
  resolveConfig,
} from '../../../src/config/loader.js';
import { DiscoverError, DiscoverErrorCode } from '../../../src/shared/errors.js';

describe('resolveConfig', () => {
  it('applies defaults to empty data', () => {
    expect(resolveConfig({})).toEqual({
      url: undefined,
      ref: undefined,
      path: undefined,
      test: [],
      filter: [],
      onlyModified: false,
      referenceUrl: undefined,
      referenceRef: 'master',
    });
  });

  it('defaults ref to master only when a url is given', () => {
    expect(resolveConfig({ url: 'https://git.example.com/tests.git' }).ref).toBe('master');
    expect(resolveConfig({ path: '/plan' }).ref).toBeUndefined();
  });

  it('normalizes scalar test and filter values to lists', () => {
    const config = resolveConfig({ test: '/smoke', filter: 'tier: 1' });
    expect(config.test).toEqual(['/smoke']);
    expect(config.filter).toEqual(['tier: 1']);
  });

  it('maps legacy repository and revision keys onto url and ref', () => {
    const config = resolveConfig({ repository: 'https://git.example.com/legacy.git', revision: 'v1.2' });
    expect(config.url).toBe('https://git.example.com/legacy.git');
    expect(config.ref).toBe('v1.2');
  });

  it('accepts dashed option spellings', () => {
    const config = resolveConfig({
      'only-modified': true,
      'reference-url': 'https://git.example.com/upstream.git',
      'reference-ref': 'reference/main',
    });
    expect(config.onlyModified).toBe(true);
    expect(config.referenceUrl).toBe('https://git.example.com/upstream.git');
    expect(config.referenceRef).toBe('reference/main');
  });

  it('lets truthy overrides replace plan data', () => {
    const config = resolveConfig(
      { ref: 'main', test: ['/a'], filter: ['tier: 1'] },
      { ref: 'feature', test: [], filter: ['tier: 2'], onlyModified: true }
    );
    expect(config.ref).toBe('feature');
    expect(config.test).toEqual(['/a']);
    expect(config.filter).toEqual(['tier: 2']);
    expect(config.onlyModified).toBe(true);
  });

  it('returns a frozen value', () => {
    const config = resolveConfig({ test: ['/a'] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.test)).toBe(true);
  });

  it('rejects values of the wrong type', () => {
    try {
      resolveConfig({ only_modified: 'yes' });
      throw new Error('expected resolveConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(DiscoverError);
      expect((err as DiscoverError).code).toBe(DiscoverErrorCode.INVALID_CONFIG);
      expect((err as DiscoverError).context?.['issues']).toEqual(['only_modified: Expected boolean, received string']);
    }
  });

  it('rejects data that is not a mapping', () => {
    expect(() => resolveConfig(['url'])).toThrow(DiscoverError);
  });
});

describe('parsePlanDiscoverConfigs', () => {
  it('reads a single discover mapping', () => {
    const configs = parsePlanDiscoverConfigs(`
summary: Smoke plan
discover:
  how: fmf
  url: https://git.example.com/tests.git
  path: /fmf/root
  test: /tests/basic
  filter: 'tier: 1'
`);
    expect(configs).toHaveLength(1);
    expect(configs[0]).toMatchObject({
      url: 'https://git.example.com/tests.git',
      ref: 'master',
      path: '/fmf/root',
      test: ['/tests/basic'],
      filter: ['tier: 1'],
    });
  });

  it('keeps only fmf phases from a list and defaults a missing how to fmf', () => {
    const configs = parsePlanDiscoverConfigs(`
discover:
  - how: shell
    tests: []
  - name: upstream
    how: fmf
    only-modified: true
  - test: /local
`);
    expect(configs).toHaveLength(2);
    expect(configs[0]?.onlyModified).toBe(true);
    expect(configs[1]?.test).toEqual(['/local']);
  });

  it('gives a plan without discover section a default phase', () => {
    expect(parsePlanDiscoverConfigs('summary: nothing here\n')).toHaveLength(1);
  });

  it('throws INVALID_CONFIG on malformed YAML', () => {
    expect(() => parsePlanDiscoverConfigs('discover: [unclosed')).toThrow(DiscoverError);
  });
});

describe('loadPlanDiscoverConfigs', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'discover-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads a plan file and applies overrides', async () => {
    const planFile = path.join(tmpDir, 'plan.fmf');
    await fs.writeFile(planFile, 'discover:\n  how: fmf\n  revision: main\n', 'utf-8');
    const [config] = await loadPlanDiscoverConfigs(planFile, { filter: ['tier: 1'] });
    expect(config?.ref).toBe('main');
    expect(config?.filter).toEqual(['tier: 1']);
  });

  it('throws INVALID_CONFIG for a missing plan file', async () => {
    await expect(loadPlanDiscoverConfigs(path.join(tmpDir, 'missing.fmf'))).rejects.toMatchObject({
      code: DiscoverErrorCode.INVALID_CONFIG,
    });
  });
});

describe('describeConfig', () => {
  it('lists the configured keys in display order', () => {
    const config = resolveConfig({ url: 'https://git.example.com/tests.git', test: ['/a', '/b'], filter: 'tier: 1' });
    expect(describeConfig(config)).toEqual([
      ['url', 'https://git.example.com/tests.git'],
      ['ref', 'master'],
      ['test', '/a, /b'],
      ['filter', 'tier: 1'],
    ]);
  });

  it('is empty for a default configuration', () => {
    expect(describeConfig(resolveConfig({}))).toEqual([]);
  });
});
