import { ProfileStore } from './profile.store';
import { ProfileActivator } from './profile.activator';
import { SwitchResult, SwitchState } from '../types/profile.types';
import { ProfileNotFoundError } from '../errors/store.error';
import { logger } from '../utils/logger.service';

/**
 * Drives a switch request: validating, activating, then committed or rolled back.
 * The current-profile pointer moves only after an activation without hard failure.
 */
export class ProfileSwitcher {
  private readonly store: ProfileStore;
  private readonly activator: ProfileActivator;
  private state: SwitchState = 'idle';

  constructor(store: ProfileStore, activator: ProfileActivator) {
    this.store = store;
    this.activator = activator;
  }

  public getState(): SwitchState {
    return this.state;
  }

  public async switchTo(name: string): Promise<SwitchResult> {
    this.transition('validating');
    const profile = this.store.get(name);
    if (!profile) {
      this.transition('idle');
      throw new ProfileNotFoundError(name);
    }

    this.transition('activating');
    const report = await this.activator.activate(profile);
    if (!report.success) {
      this.transition('rolled_back');
      return { state: 'rolled_back', profile, report };
    }

    try {
      this.store.setCurrent(name);
    } catch (error) {
      this.transition('rolled_back');
      throw error;
    }

    this.transition('committed');
    return { state: 'committed', profile, report };
  }

  private transition(next: SwitchState): void {
    logger.debug(`switch: ${this.state} -> ${next}`);
    this.state = next;
  }
}
