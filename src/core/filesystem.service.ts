import * as fs from 'fs-extra';
import path from 'path';
import { randomBytes } from 'crypto';
import { FileNotFoundError, FileSystemError } from '../errors/filesystem.error';
import { describeError } from '../errors/base.error';

/**
 * Synchronous file access for the profile store.
 * Writes go through a temporary sibling file and a rename, so readers see
 * either the previous content or the new content, never a partial file.
 */
export class FileSystemService {
  public pathExists(filePath: string): boolean {
    return fs.pathExistsSync(filePath);
  }

  public isFile(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }

  /**
   * Read a UTF-8 file
   */
  public readFile(filePath: string): string {
    if (!this.pathExists(filePath)) {
      throw new FileNotFoundError(filePath);
    }

    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new FileSystemError(`Failed to read ${filePath}`, filePath, describeError(error));
    }
  }

  /**
   * Replace a file's content in one step, creating parent directories as needed
   */
  public writeFileAtomic(filePath: string, content: string): void {
    const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

    try {
      fs.ensureDirSync(path.dirname(filePath));
      fs.writeFileSync(tempPath, content, 'utf8');
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      this.discard(tempPath);
      throw new FileSystemError(`Failed to write ${filePath}`, filePath, describeError(error));
    }
  }

  private discard(tempPath: string): void {
    try {
      fs.removeSync(tempPath);
    } catch {
      // the temp file was never created
    }
  }
}
