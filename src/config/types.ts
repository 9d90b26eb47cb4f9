export const DEFAULT_BRANCH = 'master';

// Resolved once per discover phase and frozen; nothing downstream mutates it.
export interface DiscoverConfig {
  readonly url?: string;
  readonly ref?: string;
  readonly path?: string;
  readonly test: readonly string[];
  readonly filter: readonly string[];
  readonly onlyModified: boolean;
  readonly referenceUrl?: string;
  readonly referenceRef: string;
}

// Command-line style overrides. Only truthy values replace plan data.
export interface DiscoverOverrides {
  url?: string;
  ref?: string;
  path?: string;
  test?: string[];
  filter?: string[];
  onlyModified?: boolean;
  referenceUrl?: string;
  referenceRef?: string;
}
