import { BaseError } from './base.error';

/**
 * Failure kinds recorded in an activation report
 */
export type ActivationErrorKind = 'IDENTITY_WRITE_FAILED' | 'AGENT_UNAVAILABLE';

/**
 * Writing a global identity setting failed
 */
export class IdentityWriteError extends BaseError {
  public readonly code: ActivationErrorKind = 'IDENTITY_WRITE_FAILED';
  public readonly recoverable = true;
  public readonly key: string;

  constructor(key: string, details?: string) {
    super(`Failed to set global ${key}`, details);
    this.key = key;
  }
}

/**
 * The SSH agent could not be reached or refused the key
 */
export class AgentUnavailableError extends BaseError {
  public readonly code: ActivationErrorKind = 'AGENT_UNAVAILABLE';
  public readonly recoverable = true;
}
