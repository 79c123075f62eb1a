import type { ActivationErrorKind } from '../errors/activation.error';

export const DEFAULT_BRANCH = 'main';

/**
 * Locations of the persisted state, relative to the user's home directory
 */
export const DEFAULT_PATHS = {
  configDir: '.git-profiles',
  profiles: 'profiles.json',
  currentProfile: 'current_profile.json',
  editorSettings: 'vscode_settings.json',
} as const;

export const CONFIG_DIR_ENV = 'GIT_PROFILES_HOME';

export const SSH_TIMEOUT_MS = 10_000;

export const DEFAULT_SSH_HOST = 'github.com';

export const MAX_PROFILE_NAME_LENGTH = 64;

/**
 * A named identity configuration
 */
export interface Profile {
  /** Unique key within the store */
  name: string;
  /** Account name, written to the global user.name */
  username: string;
  email: string;
  defaultBranch: string;
  /** Private key registered with the SSH agent on activation */
  sshKeyPath: string;
  autoPush: boolean;
  signCommits: boolean;
}

/**
 * Fields accepted when creating or editing a profile
 */
export type ProfileInput = Partial<Omit<Profile, 'name'>>;

/**
 * Durable store contents
 */
export interface ProfileSet {
  profiles: Record<string, Profile>;
  /** Active profile name; never dangling after a load */
  currentProfile: string | null;
}

/**
 * Global settings touched by activation, in the order they are applied
 */
export type IdentityKey = 'user.name' | 'user.email' | 'init.defaultBranch';

export type ActivationStep = IdentityKey | 'ssh-key';

export type ActivationStepStatus = 'applied' | 'skipped' | 'failed';

export interface ActivationStepOutcome {
  step: ActivationStep;
  status: ActivationStepStatus;
  /** Value written, or the key path for the ssh-key step */
  value?: string;
  /** Why a step was skipped */
  reason?: string;
  error?: {
    kind: ActivationErrorKind;
    message: string;
  };
}

export interface ActivationReport {
  profileName: string;
  /** True iff every identity step succeeded; the ssh-key step never affects it */
  success: boolean;
  steps: ActivationStepOutcome[];
}

export type SwitchState = 'idle' | 'validating' | 'activating' | 'committed' | 'rolled_back';

export interface SwitchResult {
  state: Extract<SwitchState, 'committed' | 'rolled_back'>;
  profile: Profile;
  report: ActivationReport;
}

export type SshTestStatus = 'success' | 'failed' | 'timeout' | 'error';

export interface SshTestResult {
  host: string;
  status: SshTestStatus;
  message: string;
}

/**
 * Empty map without a prototype, so keys such as "constructor" or
 * "__proto__" are ordinary entries
 */
export function createRecordMap<T>(): Record<string, T> {
  return Object.create(null);
}

/**
 * Create a profile with every unset field at its default
 */
export function createProfile(name: string, input: ProfileInput = {}): Profile {
  return {
    name,
    username: input.username ?? '',
    email: input.email ?? '',
    defaultBranch: input.defaultBranch ?? DEFAULT_BRANCH,
    sshKeyPath: input.sshKeyPath ?? '',
    autoPush: input.autoPush ?? false,
    signCommits: input.signCommits ?? false,
  };
}
