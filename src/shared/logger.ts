import pino from 'pino';

export type { Logger } from 'pino';

function defaultLevel(): string {
  const configured = process.env['FMF_DISCOVER_LOG_LEVEL'] ?? process.env['LOG_LEVEL'];
  if (configured) return configured;
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

// stderr keeps stdout free for hosts that print the discovered test list.
export const logger = pino(
  {
    name: 'fmf-discover',
    level: defaultLevel(),
  },
  pino.destination(2)
);
