import execa from 'execa';
import { DiscoverError, DiscoverErrorCode } from './errors.js';
import { logger } from './logger.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  logger.debug({ command, args, cwd: options?.cwd }, 'run');
  let result;
  try {
    result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      reject: false,
    });
  } catch (err) {
    throw new DiscoverError(DiscoverErrorCode.COMMAND_SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
      cwd: options?.cwd,
    });
  }
  // With reject: false a spawn failure (missing binary or cwd) resolves without an exit code.
  if (result.failed && typeof result.exitCode !== 'number') {
    throw new DiscoverError(DiscoverErrorCode.COMMAND_SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: 'shortMessage' in result ? String(result.shortMessage) : result.command,
      cwd: options?.cwd,
    });
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: result.exitCode,
    signal: result.signal ?? undefined,
  };
}

export async function runOrThrow(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.exitCode !== 0) {
    throw new DiscoverError(
      DiscoverErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${command} ${args.join(' ')}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
      }
    );
  }
  return result;
}
