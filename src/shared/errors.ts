export enum DiscoverErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  PATH_NOT_DIRECTORY = 'PATH_NOT_DIRECTORY',
  CLONE_FAILED = 'CLONE_FAILED',
  COPY_FAILED = 'COPY_FAILED',
  CHECKOUT_FAILED = 'CHECKOUT_FAILED',
  TREE_NOT_FOUND = 'TREE_NOT_FOUND',
  REFERENCE_FETCH_FAILED = 'REFERENCE_FETCH_FAILED',
  MODIFIED_DIFF_FAILED = 'MODIFIED_DIFF_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  COMMAND_SPAWN_FAILED = 'COMMAND_SPAWN_FAILED',
  TREE_QUERY_FAILED = 'TREE_QUERY_FAILED',
  PATH_ALREADY_REWRITTEN = 'PATH_ALREADY_REWRITTEN',
  DEPENDENCY_RESOLUTION_FAILED = 'DEPENDENCY_RESOLUTION_FAILED',
}

export type DiscoverErrorKind =
  | 'configuration'
  | 'acquisition'
  | 'tree-not-found'
  | 'modified-set'
  | 'collaborator';

const KINDS: Record<DiscoverErrorCode, DiscoverErrorKind> = {
  [DiscoverErrorCode.INVALID_CONFIG]: 'configuration',
  [DiscoverErrorCode.PATH_NOT_DIRECTORY]: 'configuration',
  [DiscoverErrorCode.CLONE_FAILED]: 'acquisition',
  [DiscoverErrorCode.COPY_FAILED]: 'acquisition',
  [DiscoverErrorCode.CHECKOUT_FAILED]: 'acquisition',
  [DiscoverErrorCode.TREE_NOT_FOUND]: 'tree-not-found',
  [DiscoverErrorCode.REFERENCE_FETCH_FAILED]: 'modified-set',
  [DiscoverErrorCode.MODIFIED_DIFF_FAILED]: 'modified-set',
  [DiscoverErrorCode.COMMAND_FAILED]: 'collaborator',
  [DiscoverErrorCode.COMMAND_SPAWN_FAILED]: 'collaborator',
  [DiscoverErrorCode.TREE_QUERY_FAILED]: 'collaborator',
  [DiscoverErrorCode.PATH_ALREADY_REWRITTEN]: 'collaborator',
  [DiscoverErrorCode.DEPENDENCY_RESOLUTION_FAILED]: 'collaborator',
};

export function kindOf(code: DiscoverErrorCode): DiscoverErrorKind {
  return KINDS[code];
}

export class DiscoverError extends Error {
  readonly code: DiscoverErrorCode;
  readonly kind: DiscoverErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(code: DiscoverErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DiscoverError';
    this.code = code;
    this.kind = kindOf(code);
    this.context = context;
  }
}

// Wraps a lower-level failure under a discover-specific code, keeping the original detail.
export function wrapError(
  code: DiscoverErrorCode,
  message: string,
  err: unknown,
  context?: Record<string, unknown>
): DiscoverError {
  const detail: Record<string, unknown> = { ...context };
  if (err instanceof DiscoverError) {
    detail['cause'] = err.message;
    if (err.context) Object.assign(detail, err.context);
  } else {
    detail['cause'] = err instanceof Error ? err.message : String(err);
  }
  return new DiscoverError(code, message, detail);
}
