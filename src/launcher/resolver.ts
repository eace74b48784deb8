// Interpreter resolution: explicit override, then the project venv, then PATH.
// A venv interpreter that exists is always chosen, even if it turns out not to
// be executable; the spawn reports that instead of falling through to PATH.
import { LauncherError, LauncherErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { pathApi, systemInterpreterNames, venvInterpreterPath } from './paths.js';
import type { ResolvedInterpreter } from './types.js';
import { findOnPath, isRegularFile, searchPathDirs } from './which.js';

export interface ResolveOptions {
  homeDir: string;
  venvDir: string;
  interpreterOverride?: string;
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
}

export async function resolveInterpreter(options: ResolveOptions): Promise<ResolvedInterpreter> {
  const { env, platform } = options;

  if (options.interpreterOverride !== undefined) {
    return resolveOverride(options.interpreterOverride, options);
  }

  const localPath = venvInterpreterPath(options.homeDir, options.venvDir, platform);
  if (await isRegularFile(localPath)) {
    logger.debug({ path: localPath }, 'Using virtual environment interpreter');
    return { source: 'local', path: localPath };
  }
  logger.debug({ path: localPath }, 'No virtual environment interpreter');

  const names = systemInterpreterNames(platform);
  for (const name of names) {
    const found = await findOnPath(name, { env, platform });
    if (found !== null) {
      logger.debug({ name, path: found }, 'Using system interpreter');
      return { source: 'system', path: found };
    }
  }

  throw new LauncherError(
    LauncherErrorCode.INTERPRETER_NOT_FOUND,
    `No Python interpreter found (tried ${localPath}, then ${names.join(', ')} on PATH)`,
    { tried: [localPath, ...names], searchPath: searchPathDirs({ env, platform }) }
  );
}

async function resolveOverride(
  override: string,
  options: ResolveOptions
): Promise<ResolvedInterpreter> {
  const { env, platform } = options;
  const api = pathApi(platform);
  const looksLikePath = override.includes('/') || override.includes(api.sep);

  if (looksLikePath) {
    const overridePath = api.resolve(options.homeDir, override);
    if (await isRegularFile(overridePath)) {
      logger.debug({ path: overridePath }, 'Using QGRAPHIC_PYTHON interpreter');
      return { source: 'override', path: overridePath };
    }
    throw new LauncherError(
      LauncherErrorCode.INTERPRETER_NOT_FOUND,
      `QGRAPHIC_PYTHON interpreter not found: ${overridePath}`,
      { tried: [overridePath] }
    );
  }

  const found = await findOnPath(override, { env, platform });
  if (found === null) {
    throw new LauncherError(
      LauncherErrorCode.INTERPRETER_NOT_FOUND,
      `QGRAPHIC_PYTHON interpreter not found on PATH: ${override}`,
      { tried: [override], searchPath: searchPathDirs({ env, platform }) }
    );
  }
  logger.debug({ name: override, path: found }, 'Using QGRAPHIC_PYTHON interpreter');
  return { source: 'override', path: found };
}
