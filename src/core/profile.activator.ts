import { FileSystemService } from './filesystem.service';
import { IdentityWriter } from './identity.writer';
import { KeyAgent } from './key.agent';
import {
  ActivationReport,
  ActivationStepOutcome,
  IdentityKey,
  Profile,
} from '../types/profile.types';
import { BaseError, describeError } from '../errors/base.error';
import { expandHome } from '../utils/config.resolver';
import { logger } from '../utils/logger.service';

/**
 * Applies a profile to the global git identity and the SSH agent.
 *
 * Steps run in a fixed order and each one is attempted regardless of how the
 * previous ones went. Nothing already applied is undone on failure.
 */
export class ProfileActivator {
  private readonly identityWriter: IdentityWriter;
  private readonly keyAgent: KeyAgent;
  private readonly fileSystem: FileSystemService;

  constructor(identityWriter: IdentityWriter, keyAgent: KeyAgent, fileSystem?: FileSystemService) {
    this.identityWriter = identityWriter;
    this.keyAgent = keyAgent;
    this.fileSystem = fileSystem ?? new FileSystemService();
  }

  public async activate(profile: Profile): Promise<ActivationReport> {
    const steps: ActivationStepOutcome[] = [
      await this.applyIdentity('user.name', profile.username),
      await this.applyIdentity('user.email', profile.email),
      await this.applyIdentity('init.defaultBranch', profile.defaultBranch),
    ];
    const success = steps.every(step => step.status !== 'failed');

    // key registration is best-effort and never affects success
    steps.push(await this.registerKey(profile.sshKeyPath));

    logger.debug(`Activation of '${profile.name}' ${success ? 'succeeded' : 'failed'}`);
    return { profileName: profile.name, success, steps };
  }

  private async applyIdentity(key: IdentityKey, value: string): Promise<ActivationStepOutcome> {
    if (value.length === 0) {
      return { step: key, status: 'skipped', reason: 'not set' };
    }

    try {
      await this.identityWriter.set(key, value);
      return { step: key, status: 'applied', value };
    } catch (error) {
      return {
        step: key,
        status: 'failed',
        value,
        error: {
          kind: 'IDENTITY_WRITE_FAILED',
          message: error instanceof BaseError ? error.getFullMessage() : describeError(error),
        },
      };
    }
  }

  private async registerKey(keyPath: string): Promise<ActivationStepOutcome> {
    if (keyPath.length === 0) {
      return { step: 'ssh-key', status: 'skipped', reason: 'not set' };
    }

    const resolved = expandHome(keyPath);
    if (!this.fileSystem.pathExists(resolved)) {
      return { step: 'ssh-key', status: 'skipped', value: keyPath, reason: 'key file not found' };
    }

    try {
      await this.keyAgent.addKey(resolved);
      return { step: 'ssh-key', status: 'applied', value: keyPath };
    } catch (error) {
      return {
        step: 'ssh-key',
        status: 'failed',
        value: keyPath,
        error: {
          kind: 'AGENT_UNAVAILABLE',
          message: error instanceof BaseError ? error.getFullMessage() : describeError(error),
        },
      };
    }
  }
}
