import os from 'os';
import { simpleGit, SimpleGit } from 'simple-git';
import { IdentityKey } from '../types/profile.types';
import { IdentityWriteError } from '../errors/activation.error';
import { describeError } from '../errors/base.error';
import { logger } from '../utils/logger.service';

/**
 * Access to the user's global git identity settings
 */
export interface IdentityWriter {
  set(key: IdentityKey, value: string): Promise<void>;
  get(key: IdentityKey): Promise<string | null>;
}

/**
 * IdentityWriter backed by `git config --global`
 */
export class GitIdentityWriter implements IdentityWriter {
  private readonly git: SimpleGit;

  constructor(git?: SimpleGit) {
    this.git = git ?? simpleGit({ baseDir: os.homedir() });
  }

  public async set(key: IdentityKey, value: string): Promise<void> {
    try {
      await this.git.addConfig(key, value, false, 'global');
      logger.debug(`git config --global ${key} ${value}`);
    } catch (error) {
      throw new IdentityWriteError(key, describeError(error));
    }
  }

  /**
   * Current global value, or null when unset or unreadable
   */
  public async get(key: IdentityKey): Promise<string | null> {
    try {
      const result = await this.git.getConfig(key, 'global');
      return result.value;
    } catch (error) {
      logger.debug(`Failed to read global ${key}: ${describeError(error)}`);
      return null;
    }
  }
}
