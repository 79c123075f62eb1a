#!/usr/bin/env node

import { program } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ProfileCommand } from './commands/profile.command';
import { SshCommand } from './commands/ssh.command';
import { CommandResult, FALLBACK_VERSION } from './types/command.types';
import { DEFAULT_BRANCH, DEFAULT_SSH_HOST, ProfileInput } from './types/profile.types';
import { ErrorHandler } from './errors/error.handler';
import { logger, LogLevel } from './utils/logger.service';

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  configDir?: string;
};

interface ProfileFieldOptions {
  username?: string;
  email?: string;
  branch?: string;
  sshKey?: string;
  autoPush?: boolean;
  signCommits?: boolean;
}

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'),
    );
    if (
      packageJson &&
      typeof packageJson === 'object' &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    logger.debug('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

function toProfileInput(options: ProfileFieldOptions): ProfileInput {
  return {
    username: options.username,
    email: options.email,
    defaultBranch: options.branch,
    sshKeyPath: options.sshKey,
    autoPush: options.autoPush,
    signCommits: options.signCommits,
  };
}

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function profileCommand(): ProfileCommand {
  return new ProfileCommand(globalOptions().configDir);
}

/**
 * Print a command result and exit non-zero on failure
 */
function report(result: CommandResult): void {
  if (result.success) {
    logger.success(result.message ?? 'Done');
    return;
  }

  if (result.error) {
    ErrorHandler.handle(result.error);
  } else {
    logger.error(result.message ?? 'Command failed');
  }
  process.exit(result.exitCode);
}

function handleError(error: unknown, command?: string): void {
  ErrorHandler.handle(error, command);
  process.exit(1);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  program
    .name('git-profiles')
    .description('Switch global git identity and SSH keys between named profiles')
    .version(readVersion(), '-v, -V, --version', 'Output the current version')
    .option('--verbose', 'Show verbose output')
    .option('-q, --quiet', 'Only print errors')
    .option('--config-dir <dir>', 'Directory holding profiles.json (default: ~/.git-profiles)')
    .hook('preAction', () => {
      const options = globalOptions();
      if (options.verbose) {
        logger.setLevel(LogLevel.DEBUG);
      } else if (options.quiet) {
        logger.setLevel(LogLevel.ERROR);
      }
    });

  program
    .command('list')
    .description('List all profiles')
    .action(async () => {
      try {
        report(await profileCommand().list({ verbose: globalOptions().verbose }));
      } catch (error) {
        handleError(error, 'list');
      }
    });

  program
    .command('add <name>')
    .description('Add a new profile')
    .option('--username <username>', 'Account user name')
    .option('--email <email>', 'Email address')
    .option('--branch <branch>', 'Default branch for new repositories', DEFAULT_BRANCH)
    .option('--ssh-key <path>', 'Private SSH key to load on switch')
    .option('--auto-push', 'Push after commit')
    .option('--sign-commits', 'Sign commits')
    .action(async (name: string, options: ProfileFieldOptions) => {
      try {
        report(await profileCommand().add(name, toProfileInput(options)));
      } catch (error) {
        handleError(error, 'add');
      }
    });

  program
    .command('edit <name>')
    .description('Change fields of an existing profile')
    .option('--username <username>', 'Account user name')
    .option('--email <email>', 'Email address')
    .option('--branch <branch>', 'Default branch for new repositories')
    .option('--ssh-key <path>', 'Private SSH key to load on switch')
    .option('--auto-push', 'Push after commit')
    .option('--no-auto-push', 'Do not push after commit')
    .option('--sign-commits', 'Sign commits')
    .option('--no-sign-commits', 'Do not sign commits')
    .action(async (name: string, options: ProfileFieldOptions) => {
      try {
        report(await profileCommand().edit(name, toProfileInput(options)));
      } catch (error) {
        handleError(error, 'edit');
      }
    });

  program
    .command('remove <name>')
    .description('Remove a profile')
    .action(async (name: string) => {
      try {
        report(await profileCommand().remove(name));
      } catch (error) {
        handleError(error, 'remove');
      }
    });

  program
    .command('switch <name>')
    .description('Apply a profile to the global git config and SSH agent')
    .action(async (name: string) => {
      try {
        report(await profileCommand().switch(name, { verbose: globalOptions().verbose }));
      } catch (error) {
        handleError(error, 'switch');
      }
    });

  program
    .command('current')
    .description('Show the active profile')
    .action(async () => {
      try {
        const result = await profileCommand().current();
        if (result.success) {
          if (!result.data?.profile) {
            logger.info(result.message ?? 'No active profile');
          }
        } else {
          report(result);
        }
      } catch (error) {
        handleError(error, 'current');
      }
    });

  program
    .command('test-ssh')
    .description('Test the SSH connection to a git host')
    .option('--host <host>', 'Host to connect to', DEFAULT_SSH_HOST)
    .action(async (options: { host: string }) => {
      try {
        report(await new SshCommand().test(options.host));
      } catch (error) {
        handleError(error, 'test-ssh');
      }
    });

  program
    .command('export <file>')
    .description('Export all profiles and the active profile to a file')
    .action(async (file: string) => {
      try {
        report(await profileCommand().export(file));
      } catch (error) {
        handleError(error, 'export');
      }
    });

  program
    .command('import <file>')
    .description('Replace all profiles with the content of an export file')
    .action(async (file: string) => {
      try {
        report(await profileCommand().import(file));
      } catch (error) {
        handleError(error, 'import');
      }
    });

  program
    .command('vscode')
    .description('Create VS Code settings for profile switching')
    .action(async () => {
      try {
        report(await profileCommand().vscode());
      } catch (error) {
        handleError(error, 'vscode');
      }
    });

  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(error => handleError(error));
}
