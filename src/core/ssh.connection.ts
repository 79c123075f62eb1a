import { spawnSync } from 'child_process';
import { DEFAULT_SSH_HOST, SSH_TIMEOUT_MS, SshTestResult } from '../types/profile.types';
import { getErrorCode, processOutput } from '../utils/process.utils';

const HOST_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.-]*$/;

/**
 * Checks that the active key authenticates against a git host over SSH
 */
export class SshConnectionTester {
  private readonly timeoutMs: number;

  constructor(timeoutMs: number = SSH_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  /**
   * Run `ssh -T git@<host>`. Hosts that refuse shell access still print an
   * authentication greeting on stderr and exit 1, which counts as success.
   */
  public test(host: string = DEFAULT_SSH_HOST): SshTestResult {
    if (!HOST_PATTERN.test(host)) {
      return { host, status: 'error', message: `Invalid host name: ${host}` };
    }

    const result = spawnSync('ssh', ['-T', `git@${host}`], {
      encoding: 'utf8',
      timeout: this.timeoutMs,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (result.error) {
      if (getErrorCode(result.error) === 'ETIMEDOUT') {
        return { host, status: 'timeout', message: 'SSH connection timed out' };
      }
      return { host, status: 'error', message: result.error.message };
    }

    const output = processOutput(result);
    if (result.status === 0 || /successfully authenticated/i.test(output)) {
      return { host, status: 'success', message: output };
    }

    return {
      host,
      status: 'failed',
      message: output.length > 0 ? output : `ssh exited with status ${result.status ?? 'unknown'}`,
    };
  }
}
