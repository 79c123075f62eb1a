import { SpawnSyncReturns } from 'child_process';

/**
 * errno-style code of a spawn failure, e.g. ENOENT or ETIMEDOUT
 */
export function getErrorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Trimmed stderr of a finished process, falling back to stdout
 */
export function processOutput(result: SpawnSyncReturns<string>): string {
  const stderr = (result.stderr ?? '').trim();
  return stderr.length > 0 ? stderr : (result.stdout ?? '').trim();
}
