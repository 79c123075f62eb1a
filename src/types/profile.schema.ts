import { z } from 'zod';
import { DEFAULT_BRANCH, Profile, createRecordMap } from './profile.types';

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? '');

const optionalFlag = z
  .boolean()
  .nullish()
  .transform(value => value ?? false);

/**
 * A profile as written to profiles.json and export files.
 * Earlier files may hold null for unset text fields.
 */
export const ProfileRecordSchema = z.object({
  name: z.string().nullish(),
  username: optionalText,
  email: optionalText,
  default_branch: z
    .string()
    .nullish()
    .transform(value => value ?? DEFAULT_BRANCH),
  ssh_key: optionalText,
  auto_push: optionalFlag,
  sign_commits: optionalFlag,
});

export type ParsedProfileRecord = z.output<typeof ProfileRecordSchema>;

/**
 * Serialized form of a profile
 */
export interface ProfileRecordJson {
  name: string;
  username: string;
  email: string;
  default_branch: string;
  ssh_key: string;
  auto_push: boolean;
  sign_commits: boolean;
}

/**
 * profiles.json: profile name to record. Entries are validated one by one.
 */
export const ProfilesFileSchema = z.record(z.string(), z.unknown());

export const CurrentProfileFileSchema = z.object({
  current_profile: z.string().nullish(),
});

/**
 * Single-file export of the whole profile set
 */
export const ExportBundleSchema = z.object({
  profiles: z.record(z.string(), ProfileRecordSchema),
  current_profile: z.string().nullish(),
});

export interface ExportBundleJson {
  profiles: Record<string, ProfileRecordJson>;
  current_profile: string | null;
}

/**
 * Build a profile from a parsed record. The map key is authoritative for the name.
 */
export function fromProfileRecord(key: string, record: ParsedProfileRecord): Profile {
  return {
    name: key,
    username: record.username,
    email: record.email,
    defaultBranch: record.default_branch,
    sshKeyPath: record.ssh_key,
    autoPush: record.auto_push,
    signCommits: record.sign_commits,
  };
}

export function toProfileRecord(profile: Profile): ProfileRecordJson {
  return {
    name: profile.name,
    username: profile.username,
    email: profile.email,
    default_branch: profile.defaultBranch,
    ssh_key: profile.sshKeyPath,
    auto_push: profile.autoPush,
    sign_commits: profile.signCommits,
  };
}

export function toProfileRecords(profiles: Record<string, Profile>): Record<string, ProfileRecordJson> {
  const records = createRecordMap<ProfileRecordJson>();
  for (const [name, profile] of Object.entries(profiles)) {
    records[name] = toProfileRecord(profile);
  }
  return records;
}
