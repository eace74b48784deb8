import path from 'path';

export const TARGET_SCRIPT = 'qgraphic.py';

export function pathApi(platform: NodeJS.Platform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

/**
 * Interpreter inside a virtual environment:
 * - Windows: <venv>/Scripts/python.exe
 * - elsewhere: <venv>/bin/python
 */
export function venvInterpreterPath(
  homeDir: string,
  venvDir: string,
  platform: NodeJS.Platform
): string {
  return platform === 'win32'
    ? pathApi(platform).join(homeDir, venvDir, 'Scripts', 'python.exe')
    : pathApi(platform).join(homeDir, venvDir, 'bin', 'python');
}

export function targetScriptPath(homeDir: string, platform: NodeJS.Platform): string {
  return pathApi(platform).join(homeDir, TARGET_SCRIPT);
}

/** Names tried on the search path, in order, when no local interpreter exists. */
export function systemInterpreterNames(platform: NodeJS.Platform): string[] {
  return platform === 'win32' ? ['python'] : ['python3', 'python'];
}
