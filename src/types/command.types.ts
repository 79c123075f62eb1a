/**
 * Options shared by every command
 */
export interface CommandOptions {
  verbose?: boolean;
}

/**
 * Outcome of a command, turned into output and an exit code by the CLI
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message?: string;
  data?: T;
  error?: Error;
  exitCode: number;
}

export const FALLBACK_VERSION = '1.0.0';
