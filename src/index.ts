/**
 * git-profiles
 *
 * Named git identities (user name, email, default branch, SSH key) stored in
 * the user's configuration directory and applied to the global git config
 * and SSH agent on switch.
 */

export * from './commands/profile.command';
export * from './commands/ssh.command';
export * from './core/filesystem.service';
export * from './core/profile.store';
export * from './core/profile.activator';
export * from './core/profile.switcher';
export * from './core/identity.writer';
export * from './core/key.agent';
export * from './core/ssh.connection';
export * from './core/editor-settings.exporter';
export * from './types/profile.types';
export * from './types/profile.schema';
export * from './types/command.types';
export * from './errors/base.error';
export * from './errors/store.error';
export * from './errors/activation.error';
export * from './errors/filesystem.error';
export * from './errors/error.handler';
export * from './utils/config.resolver';
export * from './utils/logger.service';
