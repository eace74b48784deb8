// Process execution boundary: the one place the launcher starts a child.
// Spawner is the seam; ExecaSpawner is the only production implementation.
import { constants } from 'os';
import execa from 'execa';
import { LauncherError, LauncherErrorCode } from '../shared/errors.js';

export interface SpawnOutcome {
  exitCode: number;
  signal?: string;
}

export interface Spawner {
  /** Run file with args to completion, streams inherited. */
  run(file: string, args: readonly string[]): Promise<SpawnOutcome>;
}

export class ExecaSpawner implements Spawner {
  async run(file: string, args: readonly string[]): Promise<SpawnOutcome> {
    // Synchronous spawn errors still reject, whatever `reject` says.
    const result = await execa(file, args, {
      stdio: 'inherit',
      reject: false,
      buffer: false,
    }).catch((err: unknown) => {
      throw invocationFailed(file, err);
    });

    // With reject: false a spawn failure comes back as the errno error itself.
    if (spawnErrorCode(result) !== undefined) {
      throw invocationFailed(file, result);
    }

    if (result.signal) {
      return { exitCode: signalExitCode(result.signal), signal: result.signal };
    }
    return { exitCode: result.exitCode };
  }
}

/** Shell convention: 128 + signal number. */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry === undefined ? 1 : 128 + entry[1];
}

// Errors are matched by shape: child_process errors need not share this realm's Error.
function spawnErrorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

function errorDetail(err: unknown): string {
  if (typeof err === 'object' && err !== null) {
    if ('originalMessage' in err && typeof err.originalMessage === 'string') return err.originalMessage;
    if ('message' in err && typeof err.message === 'string') return err.message;
  }
  return String(err);
}

function invocationFailed(file: string, err: unknown): LauncherError {
  const errno = spawnErrorCode(err);
  return new LauncherError(
    LauncherErrorCode.INVOCATION_FAILED,
    `Failed to start interpreter ${file}: ${errorDetail(err)}`,
    { file, errno }
  );
}
