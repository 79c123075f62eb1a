import chalk from 'chalk';
import { BaseError, describeError } from './base.error';
import { logger } from '../utils/logger.service';

/**
 * Formats errors that escape a command for the terminal
 */
export class ErrorHandler {
  /**
   * Lines describing an error, headline first
   */
  public static format(error: unknown, command?: string): string[] {
    const prefix = command ? `${command}: ` : '';

    if (error instanceof BaseError) {
      const lines = [`${prefix}${error.message} ${chalk.dim(`[${error.code}]`)}`];
      if (error.details) {
        lines.push(chalk.dim(`  ${error.details}`));
      }
      return lines;
    }

    return [`${prefix}${describeError(error)}`];
  }

  public static handle(error: unknown, command?: string): void {
    const [headline, ...rest] = ErrorHandler.format(error, command);
    logger.error(headline ?? 'Unknown error');
    for (const line of rest) {
      logger.debug(line);
    }
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
  }
}
