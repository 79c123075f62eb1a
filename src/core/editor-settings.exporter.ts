import path from 'path';
import { FileSystemService } from './filesystem.service';
import { ProfileStore } from './profile.store';
import { DEFAULT_PATHS } from '../types/profile.types';
import { ProfileRecordJson, toProfileRecords } from '../types/profile.schema';
import { StoreWriteError } from '../errors/store.error';
import { describeError } from '../errors/base.error';

export interface EditorSettings {
  'git-profiles.profiles': Record<string, ProfileRecordJson>;
  'git-profiles.currentProfile': string | null;
}

/**
 * Writes the profile list in the settings format read by the editor extension
 */
export class EditorSettingsExporter {
  private readonly store: ProfileStore;
  private readonly fileSystem: FileSystemService;

  constructor(store: ProfileStore, fileSystem?: FileSystemService) {
    this.store = store;
    this.fileSystem = fileSystem ?? new FileSystemService();
  }

  public getSettingsPath(): string {
    return path.join(this.store.getConfigDir(), DEFAULT_PATHS.editorSettings);
  }

  public export(): { filePath: string; settings: EditorSettings } {
    const set = this.store.load();
    const settings: EditorSettings = {
      'git-profiles.profiles': toProfileRecords(set.profiles),
      'git-profiles.currentProfile': set.currentProfile,
    };
    const filePath = this.getSettingsPath();

    try {
      this.fileSystem.writeFileAtomic(filePath, JSON.stringify(settings, null, 2));
    } catch (error) {
      throw new StoreWriteError(`Failed to write editor settings to ${filePath}`, describeError(error));
    }

    return { filePath, settings };
  }
}
