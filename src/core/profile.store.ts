import path from 'path';
import { FileSystemService } from './filesystem.service';
import {
  DEFAULT_PATHS,
  MAX_PROFILE_NAME_LENGTH,
  Profile,
  ProfileInput,
  ProfileSet,
  createProfile,
  createRecordMap,
} from '../types/profile.types';
import {
  CurrentProfileFileSchema,
  ExportBundleJson,
  ExportBundleSchema,
  ProfileRecordSchema,
  ProfilesFileSchema,
  fromProfileRecord,
  toProfileRecords,
} from '../types/profile.schema';
import {
  DuplicateProfileError,
  InvalidFormatError,
  ProfileNotFoundError,
  ProfileValidationError,
  StoreWriteError,
} from '../errors/store.error';
import { describeError } from '../errors/base.error';
import { FileSystemError } from '../errors/filesystem.error';
import { resolveConfigDir } from '../utils/config.resolver';
import { logger } from '../utils/logger.service';

/**
 * Durable storage of named profiles and the active-profile pointer.
 *
 * State lives in two files of the configuration directory: profiles.json
 * (name to record) and current_profile.json. Every operation reads the files
 * afresh, so manual edits between calls are picked up. Unreadable files load
 * as an empty set instead of failing.
 */
export class ProfileStore {
  private readonly configDir: string;
  private readonly profilesPath: string;
  private readonly currentProfilePath: string;
  private readonly fileSystem: FileSystemService;

  constructor(configDir?: string, fileSystem?: FileSystemService) {
    this.configDir = configDir ?? resolveConfigDir();
    this.profilesPath = path.join(this.configDir, DEFAULT_PATHS.profiles);
    this.currentProfilePath = path.join(this.configDir, DEFAULT_PATHS.currentProfile);
    this.fileSystem = fileSystem ?? new FileSystemService();
  }

  /**
   * Read persisted state. Missing or corrupt files yield an empty set, and a
   * current-profile pointer naming no stored profile is dropped.
   */
  public load(): ProfileSet {
    const profiles = this.loadProfiles();
    let currentProfile = this.loadCurrentName();

    if (currentProfile !== null && !Object.hasOwn(profiles, currentProfile)) {
      logger.debug(`Ignoring current profile '${currentProfile}': no such profile`);
      currentProfile = null;
    }

    return { profiles, currentProfile };
  }

  /**
   * Replace both files. Each file is swapped in atomically; the profile map is
   * written first so that a failure on the pointer leaves at worst a dangling
   * pointer, which load() discards.
   */
  public save(set: ProfileSet): void {
    const profilesJson = JSON.stringify(toProfileRecords(set.profiles), null, 2);
    const currentJson = JSON.stringify({ current_profile: set.currentProfile }, null, 2);

    try {
      this.fileSystem.writeFileAtomic(this.profilesPath, profilesJson);
      this.fileSystem.writeFileAtomic(this.currentProfilePath, currentJson);
    } catch (error) {
      throw new StoreWriteError(
        `Failed to save profiles to ${this.configDir}`,
        error instanceof FileSystemError ? error.getFullMessage() : describeError(error),
      );
    }

    logger.debug(`Saved ${Object.keys(set.profiles).length} profile(s) to ${this.configDir}`);
  }

  /**
   * Insert a new profile and persist it
   */
  public add(name: string, input: ProfileInput = {}): Profile {
    this.validateName(name);

    const set = this.load();
    if (Object.hasOwn(set.profiles, name)) {
      throw new DuplicateProfileError(name);
    }

    const profile = createProfile(name, input);
    set.profiles[name] = profile;
    this.save(set);
    return profile;
  }

  /**
   * Change fields of an existing profile. The name cannot change.
   */
  public update(name: string, changes: ProfileInput): Profile {
    const set = this.load();
    const existing = Object.hasOwn(set.profiles, name) ? set.profiles[name] : undefined;
    if (!existing) {
      throw new ProfileNotFoundError(name);
    }

    const updated: Profile = {
      name,
      username: changes.username ?? existing.username,
      email: changes.email ?? existing.email,
      defaultBranch: changes.defaultBranch ?? existing.defaultBranch,
      sshKeyPath: changes.sshKeyPath ?? existing.sshKeyPath,
      autoPush: changes.autoPush ?? existing.autoPush,
      signCommits: changes.signCommits ?? existing.signCommits,
    };
    set.profiles[name] = updated;
    this.save(set);
    return updated;
  }

  /**
   * Delete a profile; clears the pointer in the same write when it was active
   */
  public remove(name: string): void {
    const set = this.load();
    if (!Object.hasOwn(set.profiles, name)) {
      throw new ProfileNotFoundError(name);
    }

    delete set.profiles[name];
    if (set.currentProfile === name) {
      set.currentProfile = null;
    }

    this.save(set);
  }

  public get(name: string): Profile | null {
    const { profiles } = this.load();
    return Object.hasOwn(profiles, name) ? (profiles[name] ?? null) : null;
  }

  /**
   * All profiles, ordered by name
   */
  public list(): Profile[] {
    return Object.values(this.load().profiles).sort((a, b) => a.name.localeCompare(b.name));
  }

  public getCurrent(): Profile | null {
    const set = this.load();
    return set.currentProfile !== null && Object.hasOwn(set.profiles, set.currentProfile)
      ? (set.profiles[set.currentProfile] ?? null)
      : null;
  }

  /**
   * Point the active-profile marker at a stored profile, or clear it with null
   */
  public setCurrent(name: string | null): void {
    const set = this.load();
    if (name !== null && !Object.hasOwn(set.profiles, name)) {
      throw new ProfileNotFoundError(name);
    }

    set.currentProfile = name;
    this.save(set);
  }

  /**
   * Write profiles and pointer to a single file
   */
  public exportTo(filePath: string): ProfileSet {
    const set = this.load();
    const bundle: ExportBundleJson = {
      profiles: toProfileRecords(set.profiles),
      current_profile: set.currentProfile,
    };

    try {
      this.fileSystem.writeFileAtomic(filePath, JSON.stringify(bundle, null, 2));
    } catch (error) {
      throw new StoreWriteError(`Failed to export profiles to ${filePath}`, describeError(error));
    }

    return set;
  }

  /**
   * Replace the stored set with the content of an export file. Nothing is
   * written unless the whole file validates.
   */
  public importFrom(filePath: string): ProfileSet {
    let raw: unknown;
    try {
      raw = JSON.parse(this.fileSystem.readFile(filePath));
    } catch (error) {
      throw new InvalidFormatError(`Cannot read profiles from ${filePath}`, describeError(error));
    }

    const parsed = ExportBundleSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      );
      throw new InvalidFormatError(`Invalid profile export file: ${filePath}`, issues.join(', '));
    }

    const profiles = createRecordMap<Profile>();
    for (const [name, record] of Object.entries(parsed.data.profiles)) {
      const problem = checkProfileName(name);
      if (problem) {
        throw new InvalidFormatError(`Invalid profile export file: ${filePath}`, problem);
      }
      profiles[name] = fromProfileRecord(name, record);
    }

    const requested = parsed.data.current_profile ?? null;
    const set: ProfileSet = {
      profiles,
      currentProfile: requested !== null && Object.hasOwn(profiles, requested) ? requested : null,
    };

    this.save(set);
    return set;
  }

  public getConfigDir(): string {
    return this.configDir;
  }

  private loadProfiles(): Record<string, Profile> {
    const raw = this.readJson(this.profilesPath);
    const parsed = ProfilesFileSchema.safeParse(raw);
    if (!parsed.success) {
      if (raw !== undefined) {
        logger.debug(`Discarding ${this.profilesPath}: not a profile map`);
      }
      return createRecordMap<Profile>();
    }

    const profiles = createRecordMap<Profile>();
    for (const [name, value] of Object.entries(parsed.data)) {
      const record = ProfileRecordSchema.safeParse(value);
      if (!record.success || name.length === 0) {
        logger.debug(`Skipping unreadable profile entry '${name}'`);
        continue;
      }
      profiles[name] = fromProfileRecord(name, record.data);
    }
    return profiles;
  }

  private loadCurrentName(): string | null {
    const parsed = CurrentProfileFileSchema.safeParse(this.readJson(this.currentProfilePath));
    return parsed.success ? (parsed.data.current_profile ?? null) : null;
  }

  /**
   * Parsed JSON content, or undefined when the file is absent or unparseable
   */
  private readJson(filePath: string): unknown {
    if (!this.fileSystem.pathExists(filePath)) {
      return undefined;
    }

    try {
      return JSON.parse(this.fileSystem.readFile(filePath));
    } catch (error) {
      logger.debug(`Failed to parse ${filePath}: ${describeError(error)}`);
      return undefined;
    }
  }

  private validateName(name: string): void {
    const problem = checkProfileName(name);
    if (problem) {
      throw new ProfileValidationError(problem);
    }
  }
}

/**
 * Reason a profile name is unusable, or null when it is fine
 */
export function checkProfileName(name: string): string | null {
  if (!name || name.trim().length === 0) {
    return 'Profile name cannot be empty';
  }
  if (name.length > MAX_PROFILE_NAME_LENGTH) {
    return `Profile name too long (max ${MAX_PROFILE_NAME_LENGTH} characters)`;
  }
  if (/[\\/]/.test(name)) {
    return `Profile name cannot contain path separators: ${name}`;
  }
  return null;
}

