import { BaseError } from './base.error';

/**
 * Errors raised by the profile store
 */
export abstract class StoreError extends BaseError {}

/**
 * A profile with the requested name is already stored
 */
export class DuplicateProfileError extends StoreError {
  public readonly code = 'DUPLICATE_NAME';
  public readonly recoverable = true;
  public readonly profileName: string;

  constructor(profileName: string) {
    super(`Profile '${profileName}' already exists`);
    this.profileName = profileName;
  }
}

/**
 * No profile with the requested name is stored
 */
export class ProfileNotFoundError extends StoreError {
  public readonly code = 'NOT_FOUND';
  public readonly recoverable = true;
  public readonly profileName: string;

  constructor(profileName: string) {
    super(`Profile '${profileName}' does not exist`);
    this.profileName = profileName;
  }
}

/**
 * Persisting the profile set failed; on-disk state was not updated
 */
export class StoreWriteError extends StoreError {
  public readonly code = 'WRITE_FAILED';
  public readonly recoverable = true;
}

/**
 * Imported data does not describe a profile set
 */
export class InvalidFormatError extends StoreError {
  public readonly code = 'INVALID_FORMAT';
  public readonly recoverable = true;
}

/**
 * Profile fields rejected before they reach the store
 */
export class ProfileValidationError extends StoreError {
  public readonly code = 'INVALID_PROFILE';
  public readonly recoverable = true;
}
