import { logger } from '../shared/logger.js';
import { targetScriptPath } from './paths.js';
import { resolveInterpreter } from './resolver.js';
import { ExecaSpawner, type Spawner } from './spawner.js';
import type { LaunchPlan } from './types.js';

export interface LaunchOptions {
  homeDir: string;
  venvDir: string;
  interpreterOverride?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  spawner?: Spawner;
}

/**
 * Work out what to run. Does not check that the target script exists;
 * the interpreter reports a missing script itself.
 */
export async function planLaunch(args: readonly string[], options: LaunchOptions): Promise<LaunchPlan> {
  const platform = options.platform ?? process.platform;
  const interpreter = await resolveInterpreter({
    homeDir: options.homeDir,
    venvDir: options.venvDir,
    interpreterOverride: options.interpreterOverride,
    env: options.env ?? process.env,
    platform,
  });
  return {
    interpreter,
    script: targetScriptPath(options.homeDir, platform),
    args: [...args],
  };
}

/** Resolve the interpreter, run qgraphic.py with args, return the child's exit code. */
export async function launch(args: readonly string[], options: LaunchOptions): Promise<number> {
  const plan = await planLaunch(args, options);
  const spawner = options.spawner ?? new ExecaSpawner();

  logger.debug(
    { interpreter: plan.interpreter.path, source: plan.interpreter.source, script: plan.script, args: plan.args },
    'Launching'
  );
  const outcome = await spawner.run(plan.interpreter.path, [plan.script, ...plan.args]);
  if (outcome.signal !== undefined) {
    logger.debug({ signal: outcome.signal, exitCode: outcome.exitCode }, 'Interpreter terminated by signal');
  }
  return outcome.exitCode;
}
