#!/usr/bin/env node
import path from 'path';
import { loadConfig } from './config.js';
import { launch } from './launcher/launcher.js';
import { LauncherError } from './shared/errors.js';
import { logger } from './shared/logger.js';

// Package root: the parent of src/ (tests) or dist/ (installed bin).
export const DEFAULT_HOME_DIR = path.resolve(__dirname, '..');

export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const config = loadConfig(env, DEFAULT_HOME_DIR);
    logger.level = config.logLevel;
    return await launch(argv, {
      homeDir: config.homeDir,
      venvDir: config.venvDir,
      interpreterOverride: config.interpreterOverride,
      env,
    });
  } catch (err) {
    if (err instanceof LauncherError) {
      logger.debug({ code: err.code, ...err.context }, err.message);
      process.stderr.write(`qgraphic: ${err.message}\n`);
      return err.exitCode;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`qgraphic: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  );
}
