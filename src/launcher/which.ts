import fs from 'fs/promises';
import { constants } from 'fs';
import { pathApi } from './paths.js';

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export interface SearchOptions {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
}

/** True when p is a regular file, following symlinks. */
export async function isRegularFile(p: string): Promise<boolean> {
  try {
    const stats = await fs.stat(p);
    return stats.isFile();
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw err;
  }
}

// A PATH entry that cannot be read (ELOOP, EACCES, ENAMETOOLONG) is skipped, as a shell would.
async function isExecutableFile(p: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stats = await fs.stat(p);
    if (!stats.isFile()) return false;
    // Windows decides executability by extension, not mode bits.
    if (platform === 'win32') return true;
    await fs.access(p, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function envValue(env: NodeJS.ProcessEnv, key: string, platform: NodeJS.Platform): string | undefined {
  if (platform !== 'win32') return env[key];
  // Windows environment keys are case-insensitive ("Path" is common).
  const match = Object.keys(env).find((k) => k.toUpperCase() === key);
  return match === undefined ? undefined : env[match];
}

/** Directories of the search path, in order, without empty entries. */
export function searchPathDirs(options: SearchOptions): string[] {
  const raw = envValue(options.env, 'PATH', options.platform) ?? '';
  return raw
    .split(pathApi(options.platform).delimiter)
    .map((dir) => dir.replace(/^"(.*)"$/, '$1'))
    .filter((dir) => dir.length > 0);
}

/** File names tried in each PATH directory; Windows expands the name with PATHEXT. */
export function candidateFileNames(name: string, options: SearchOptions): string[] {
  if (options.platform !== 'win32') return [name];
  const extensions = (envValue(options.env, 'PATHEXT', options.platform) ?? DEFAULT_PATHEXT)
    .split(';')
    .filter((ext) => ext.length > 0);
  const hasKnownExtension = extensions.some((ext) => name.toLowerCase().endsWith(ext.toLowerCase()));
  return hasKnownExtension ? [name] : extensions.map((ext) => name + ext.toLowerCase());
}

/**
 * Locate an executable by name on the search path.
 * Returns the first match, or null when no directory holds one.
 */
export async function findOnPath(name: string, options: SearchOptions): Promise<string | null> {
  const api = pathApi(options.platform);
  for (const dir of searchPathDirs(options)) {
    for (const fileName of candidateFileNames(name, options)) {
      const candidate = api.join(dir, fileName);
      if (await isExecutableFile(candidate, options.platform)) return candidate;
    }
  }
  return null;
}

// fs errors may come from another realm (Jest VM contexts), so check shape, not instanceof.
function isMissingPathError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}
