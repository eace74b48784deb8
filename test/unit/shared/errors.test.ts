import { LauncherError, LauncherErrorCode } from '../../../src/shared/errors.js';

describe('LauncherError', () => {
  it('creates error with code and message', () => {
    const err = new LauncherError(LauncherErrorCode.INTERPRETER_NOT_FOUND, 'No interpreter');
    expect(err.code).toBe(LauncherErrorCode.INTERPRETER_NOT_FOUND);
    expect(err.message).toBe('No interpreter');
    expect(err.name).toBe('LauncherError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new LauncherError(LauncherErrorCode.INVOCATION_FAILED, 'Spawn failed', { errno: 'EACCES' });
    expect(err.context).toEqual({ errno: 'EACCES' });
  });

  it('maps each code to a distinct exit status', () => {
    expect(new LauncherError(LauncherErrorCode.INTERPRETER_NOT_FOUND, '').exitCode).toBe(127);
    expect(new LauncherError(LauncherErrorCode.INVOCATION_FAILED, '').exitCode).toBe(126);
    expect(new LauncherError(LauncherErrorCode.INVALID_CONFIG, '').exitCode).toBe(78);
  });
});
