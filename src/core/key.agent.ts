import { spawnSync } from 'child_process';
import { SSH_TIMEOUT_MS } from '../types/profile.types';
import { AgentUnavailableError } from '../errors/activation.error';
import { getErrorCode, processOutput } from '../utils/process.utils';
import { logger } from '../utils/logger.service';

/**
 * Registration of private keys with the ambient SSH agent
 */
export interface KeyAgent {
  addKey(keyPath: string): Promise<void>;
}

/**
 * KeyAgent that runs `ssh-add <key>`, bounded by a timeout.
 * Any failure, including an unreachable agent, surfaces as AgentUnavailableError.
 */
export class SshKeyAgent implements KeyAgent {
  private readonly timeoutMs: number;

  constructor(timeoutMs: number = SSH_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  public async addKey(keyPath: string): Promise<void> {
    const result = spawnSync('ssh-add', [keyPath], {
      encoding: 'utf8',
      timeout: this.timeoutMs,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (result.error) {
      const code = getErrorCode(result.error);
      if (code === 'ETIMEDOUT') {
        throw new AgentUnavailableError(`ssh-add timed out after ${this.timeoutMs / 1000}s`);
      }
      if (code === 'ENOENT') {
        throw new AgentUnavailableError('ssh-add is not installed');
      }
      throw new AgentUnavailableError('Failed to run ssh-add', result.error.message);
    }

    if (result.status !== 0) {
      const output = processOutput(result);
      throw new AgentUnavailableError(
        `ssh-add exited with status ${result.status ?? 'unknown'}`,
        output.length > 0 ? output : undefined,
      );
    }

    logger.debug(`Added ${keyPath} to the SSH agent`);
  }
}
