import chalk from 'chalk';
import { CommandOptions, CommandResult } from '../types/command.types';
import {
  ActivationReport,
  ActivationStepOutcome,
  Profile,
  ProfileInput,
  ProfileSet,
  SwitchResult,
} from '../types/profile.types';
import { FileSystemService } from '../core/filesystem.service';
import { ProfileStore } from '../core/profile.store';
import { ProfileActivator } from '../core/profile.activator';
import { ProfileSwitcher } from '../core/profile.switcher';
import { GitIdentityWriter, IdentityWriter } from '../core/identity.writer';
import { KeyAgent, SshKeyAgent } from '../core/key.agent';
import { EditorSettingsExporter } from '../core/editor-settings.exporter';
import { BaseError } from '../errors/base.error';
import { logger } from '../utils/logger.service';

/**
 * Collaborators that touch global state, replaceable for tests
 */
export interface ProfileCommandDependencies {
  fileSystem: FileSystemService;
  identityWriter: IdentityWriter;
  keyAgent: KeyAgent;
}

/**
 * Live identity read back from the global git config
 */
export interface CurrentProfileInfo {
  profile: Profile | null;
  gitUserName: string | null;
  gitUserEmail: string | null;
}

/**
 * Profile management commands
 */
export class ProfileCommand {
  private readonly store: ProfileStore;
  private readonly identityWriter: IdentityWriter;
  private readonly switcher: ProfileSwitcher;
  private readonly editorSettings: EditorSettingsExporter;

  constructor(configDir?: string, dependencies: Partial<ProfileCommandDependencies> = {}) {
    const fileSystem = dependencies.fileSystem ?? new FileSystemService();
    this.identityWriter = dependencies.identityWriter ?? new GitIdentityWriter();
    const keyAgent = dependencies.keyAgent ?? new SshKeyAgent();

    this.store = new ProfileStore(configDir, fileSystem);
    this.switcher = new ProfileSwitcher(
      this.store,
      new ProfileActivator(this.identityWriter, keyAgent, fileSystem),
    );
    this.editorSettings = new EditorSettingsExporter(this.store, fileSystem);
  }

  /**
   * List all profiles, marking the active one
   */
  public async list(options: CommandOptions = {}): Promise<CommandResult<Profile[]>> {
    return this.run('list profiles', () => {
      const profiles = this.store.list();
      const current = this.store.load().currentProfile;

      if (profiles.length === 0) {
        return { success: true, message: 'No profiles configured.', data: profiles, exitCode: 0 };
      }

      logger.info(chalk.bold('Available profiles:'));
      for (const profile of profiles) {
        this.displayProfile(profile, profile.name === current, options.verbose ?? false);
      }

      return {
        success: true,
        message: `${profiles.length} profile(s) configured`,
        data: profiles,
        exitCode: 0,
      };
    });
  }

  public async add(name: string, input: ProfileInput = {}): Promise<CommandResult<Profile>> {
    return this.run(`add profile '${name}'`, () => {
      const profile = this.store.add(name, input);
      return { success: true, message: `Added profile: ${name}`, data: profile, exitCode: 0 };
    });
  }

  public async edit(name: string, changes: ProfileInput): Promise<CommandResult<Profile>> {
    return this.run(`edit profile '${name}'`, () => {
      const profile = this.store.update(name, changes);
      return { success: true, message: `Updated profile: ${name}`, data: profile, exitCode: 0 };
    });
  }

  public async remove(name: string): Promise<CommandResult> {
    return this.run(`remove profile '${name}'`, () => {
      const wasCurrent = this.store.load().currentProfile === name;
      this.store.remove(name);
      return {
        success: true,
        message: wasCurrent
          ? `Removed profile '${name}' and cleared current profile`
          : `Removed profile: ${name}`,
        exitCode: 0,
      };
    });
  }

  /**
   * Apply a profile globally and make it current when identity setup succeeds
   */
  public async switch(name: string, options: CommandOptions = {}): Promise<CommandResult<SwitchResult>> {
    return this.run(`switch to profile '${name}'`, async () => {
      const result = await this.switcher.switchTo(name);
      this.displayReport(result.report, options.verbose ?? false);

      if (result.state === 'rolled_back') {
        return {
          success: false,
          message: `Failed to switch to profile '${name}'; current profile unchanged`,
          data: result,
          exitCode: 1,
        };
      }

      logger.info(`  Username: ${displayValue(result.profile.username)}`);
      logger.info(`  Email: ${displayValue(result.profile.email)}`);
      return { success: true, message: `Switched to profile: ${name}`, data: result, exitCode: 0 };
    });
  }

  public async current(): Promise<CommandResult<CurrentProfileInfo>> {
    return this.run('show current profile', async () => {
      const profile = this.store.getCurrent();
      const info: CurrentProfileInfo = {
        profile,
        gitUserName: await this.identityWriter.get('user.name'),
        gitUserEmail: await this.identityWriter.get('user.email'),
      };

      if (!profile) {
        return { success: true, message: 'No active profile', data: info, exitCode: 0 };
      }

      logger.info(`Current profile: ${chalk.cyan(profile.name)}`);
      logger.info(`Username: ${displayValue(profile.username)}`);
      logger.info(`Email: ${displayValue(profile.email)}`);
      logger.info(`Branch: ${displayValue(profile.defaultBranch)}`);
      if (profile.username && info.gitUserName !== null && info.gitUserName !== profile.username) {
        logger.warn(`Global user.name is '${info.gitUserName}', not '${profile.username}'`);
      }
      if (profile.email && info.gitUserEmail !== null && info.gitUserEmail !== profile.email) {
        logger.warn(`Global user.email is '${info.gitUserEmail}', not '${profile.email}'`);
      }

      return { success: true, message: `Current profile: ${profile.name}`, data: info, exitCode: 0 };
    });
  }

  public async export(filePath: string): Promise<CommandResult<ProfileSet>> {
    return this.run('export configuration', () => {
      const set = this.store.exportTo(filePath);
      return {
        success: true,
        message: `Configuration exported to ${filePath}`,
        data: set,
        exitCode: 0,
      };
    });
  }

  public async import(filePath: string): Promise<CommandResult<ProfileSet>> {
    return this.run('import configuration', () => {
      const set = this.store.importFrom(filePath);
      return {
        success: true,
        message: `Configuration imported from ${filePath}`,
        data: set,
        exitCode: 0,
      };
    });
  }

  /**
   * Write the settings file for the editor extension
   */
  public async vscode(): Promise<CommandResult<string>> {
    return this.run('create editor settings', () => {
      const { filePath } = this.editorSettings.export();
      logger.info('Add this to your VS Code settings.json:');
      logger.info(`  "git-profiles.configPath": ${JSON.stringify(filePath)}`);
      return {
        success: true,
        message: `Editor settings created: ${filePath}`,
        data: filePath,
        exitCode: 0,
      };
    });
  }

  public getStore(): ProfileStore {
    return this.store;
  }

  private async run<T>(
    action: string,
    operation: () => CommandResult<T> | Promise<CommandResult<T>>,
  ): Promise<CommandResult<T>> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof BaseError) {
        return { success: false, message: error.message, error, exitCode: 1 };
      }

      return {
        success: false,
        message: `Failed to ${action}`,
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }

  private displayProfile(profile: Profile, active: boolean, verbose: boolean): void {
    const status = active ? chalk.green('✓ Active  ') : '  Inactive';
    logger.info(`${status} ${chalk.bold(profile.name)}`);
    logger.info(`    Username: ${displayValue(profile.username)}`);
    logger.info(`    Email: ${displayValue(profile.email)}`);
    logger.info(`    Branch: ${displayValue(profile.defaultBranch)}`);
    if (profile.sshKeyPath) {
      logger.info(`    SSH Key: ${profile.sshKeyPath}`);
    }
    if (verbose) {
      logger.info(`    Auto push: ${profile.autoPush ? 'yes' : 'no'}`);
      logger.info(`    Sign commits: ${profile.signCommits ? 'yes' : 'no'}`);
    }
  }

  private displayReport(report: ActivationReport, verbose: boolean): void {
    for (const step of report.steps) {
      if (step.status === 'skipped' && !verbose) {
        continue;
      }
      const line = formatStep(step);
      if (step.status === 'failed') {
        logger.warn(line);
      } else {
        logger.info(line);
      }
    }
  }
}

function displayValue(value: string): string {
  return value.length > 0 ? value : chalk.dim('Not set');
}

export function formatStep(step: ActivationStepOutcome): string {
  switch (step.status) {
    case 'applied':
      return `  ${chalk.green('✓')} ${step.step}: ${step.value ?? ''}`;
    case 'skipped':
      return `  ${chalk.dim('-')} ${step.step}: skipped (${step.reason ?? 'not set'})`;
    case 'failed':
      return `  ${chalk.red('✗')} ${step.step}: ${step.error?.message ?? 'failed'}`;
  }
}
