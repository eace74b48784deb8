/**
 * Launcher configuration, read from the environment.
 *
 * Priority:
 * 1. Environment variables (QGRAPHIC_HOME, QGRAPHIC_VENV, QGRAPHIC_PYTHON, LOG_LEVEL)
 * 2. Default values
 */

import path from 'path';
import { z } from 'zod';
import { LauncherError, LauncherErrorCode } from './shared/errors.js';
import { logger } from './shared/logger.js';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function normalizeLogLevel(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

// LOG_LEVEL is shared with other tools; a value pino does not know never blocks a launch.
const EnvSchema = z.object({
  QGRAPHIC_HOME: optionalString,
  QGRAPHIC_VENV: optionalString.refine((value) => value === undefined || !path.isAbsolute(value), {
    message: 'must be relative to QGRAPHIC_HOME',
  }),
  QGRAPHIC_PYTHON: optionalString,
  LOG_LEVEL: z.preprocess(normalizeLogLevel, LogLevelSchema).catch('warn'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LauncherConfig {
  /** Directory holding the launcher and qgraphic.py. */
  homeDir: string;
  /** Virtual environment directory, relative to homeDir. */
  venvDir: string;
  /** Interpreter name or path that bypasses venv and PATH resolution. */
  interpreterOverride?: string;
  logLevel: LogLevel;
}

export const DEFAULT_VENV_DIR = '.venv';

export function loadConfig(
  env: NodeJS.ProcessEnv,
  defaultHomeDir: string
): LauncherConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new LauncherError(
      LauncherErrorCode.INVALID_CONFIG,
      `Invalid launcher environment: ${issues.join('; ')}`,
      { issues }
    );
  }

  const { QGRAPHIC_HOME, QGRAPHIC_VENV, QGRAPHIC_PYTHON, LOG_LEVEL } = parsed.data;
  const rawLevel = normalizeLogLevel(env['LOG_LEVEL']);
  if (rawLevel !== undefined && rawLevel !== '' && !LogLevelSchema.safeParse(rawLevel).success) {
    logger.warn({ value: env['LOG_LEVEL'] }, `Ignoring unrecognised LOG_LEVEL, using ${LOG_LEVEL}`);
  }
  return {
    homeDir: path.resolve(QGRAPHIC_HOME ?? defaultHomeDir),
    venvDir: QGRAPHIC_VENV ?? DEFAULT_VENV_DIR,
    interpreterOverride: QGRAPHIC_PYTHON,
    logLevel: LOG_LEVEL,
  };
}
