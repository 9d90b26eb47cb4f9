// Discover configuration: validates raw plan data, applies overrides and
// defaults, and freezes the result so each phase works from one immutable value.
import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { DiscoverError, DiscoverErrorCode } from '../shared/errors.js';
import { RawDiscoverSchema, normalizeKeys } from './schema.js';
import { DEFAULT_BRANCH } from './types.js';
import type { DiscoverConfig, DiscoverOverrides } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveConfig(raw: unknown, overrides: DiscoverOverrides = {}): DiscoverConfig {
  let input: Record<string, unknown> = {};
  if (isRecord(raw)) {
    input = raw;
  } else if (raw !== undefined && raw !== null) {
    throw new DiscoverError(DiscoverErrorCode.INVALID_CONFIG, 'Discover configuration must be a mapping');
  }
  const parsed = RawDiscoverSchema.safeParse(normalizeKeys(input));
  if (!parsed.success) {
    throw new DiscoverError(DiscoverErrorCode.INVALID_CONFIG, 'Invalid discover configuration', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  const data = parsed.data;

  const url = pick(overrides.url, data.url);
  const test = overrides.test?.length ? overrides.test : data.test ?? [];
  const filter = overrides.filter?.length ? overrides.filter : data.filter ?? [];

  return Object.freeze({
    url,
    // Cloned repositories are checked out at the default branch unless told otherwise.
    ref: pick(overrides.ref, data.ref) ?? (url ? DEFAULT_BRANCH : undefined),
    path: pick(overrides.path, data.path),
    test: Object.freeze([...test]),
    filter: Object.freeze([...filter]),
    onlyModified: overrides.onlyModified || data.only_modified || false,
    referenceUrl: pick(overrides.referenceUrl, data.reference_url),
    referenceRef: pick(overrides.referenceRef, data.reference_ref) ?? DEFAULT_BRANCH,
  });
}

function pick(override: string | undefined, value: string | undefined): string | undefined {
  return override ? override : value;
}

function discoverPhases(plan: unknown): unknown[] {
  if (!isRecord(plan)) {
    throw new DiscoverError(DiscoverErrorCode.INVALID_CONFIG, 'Plan must be a mapping');
  }
  const discover = plan['discover'];
  if (discover === undefined || discover === null) return [{}];
  return Array.isArray(discover) ? discover : [discover];
}

// Resolves every fmf discover phase of a plan document. A plan without a
// discover section gets a single phase with default settings.
export function parsePlanDiscoverConfigs(yamlText: string, overrides?: DiscoverOverrides): DiscoverConfig[] {
  let plan: unknown;
  try {
    plan = parseYaml(yamlText);
  } catch (e) {
    throw new DiscoverError(DiscoverErrorCode.INVALID_CONFIG, `Invalid YAML: ${(e as Error).message}`);
  }
  return discoverPhases(plan ?? {})
    .filter(phase => !isRecord(phase) || phase['how'] === undefined || phase['how'] === 'fmf')
    .map(phase => resolveConfig(phase, overrides));
}

export async function loadPlanDiscoverConfigs(planFile: string, overrides?: DiscoverOverrides): Promise<DiscoverConfig[]> {
  let raw: string;
  try {
    raw = await fs.readFile(planFile, 'utf-8');
  } catch (err) {
    throw new DiscoverError(DiscoverErrorCode.INVALID_CONFIG, `Cannot read plan file: ${planFile}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return parsePlanDiscoverConfigs(raw, overrides);
}

// Key/value pairs shown for a discover phase, in display order.
export function describeConfig(config: DiscoverConfig): Array<[string, string]> {
  const lines: Array<[string, string]> = [];
  if (config.url) lines.push(['url', config.url]);
  if (config.ref) lines.push(['ref', config.ref]);
  if (config.path) lines.push(['path', config.path]);
  if (config.test.length) lines.push(['test', config.test.join(', ')]);
  if (config.filter.length) lines.push(['filter', config.filter.join(', ')]);
  return lines;
}
