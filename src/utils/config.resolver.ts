import os from 'os';
import path from 'path';
import { CONFIG_DIR_ENV, DEFAULT_PATHS } from '../types/profile.types';

/**
 * Resolve the directory holding profiles.json and current_profile.json.
 * Precedence: explicit option, then GIT_PROFILES_HOME, then ~/.git-profiles.
 */
export function resolveConfigDir(
  explicitDir?: string,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): string {
  if (explicitDir && explicitDir.trim().length > 0) {
    return path.resolve(expandHome(explicitDir.trim(), homeDir));
  }

  const fromEnv = env[CONFIG_DIR_ENV];
  if (fromEnv && fromEnv.trim().length > 0) {
    return path.resolve(expandHome(fromEnv.trim(), homeDir));
  }

  return path.join(homeDir, DEFAULT_PATHS.configDir);
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}
