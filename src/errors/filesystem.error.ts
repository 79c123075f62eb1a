import { BaseError } from './base.error';

/**
 * File system operation errors
 */
export class FileSystemError extends BaseError {
  public readonly code = 'FILESYSTEM_ERROR';
  public readonly recoverable = false;
  public readonly filePath: string;

  constructor(message: string, filePath: string, details?: string) {
    super(message, details);
    this.filePath = filePath;
  }
}

/**
 * Requested file is missing
 */
export class FileNotFoundError extends FileSystemError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, filePath);
  }
}
