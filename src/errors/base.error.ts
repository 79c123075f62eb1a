/**
 * Base class for every error raised by git-profiles
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details?: string | undefined;
  public readonly timestamp: Date;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Message with the underlying cause appended, when there is one
   */
  public getFullMessage(): string {
    return this.details ? `${this.message}: ${this.details}` : this.message;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
