export enum LauncherErrorCode {
  INTERPRETER_NOT_FOUND = 'INTERPRETER_NOT_FOUND',
  INVOCATION_FAILED = 'INVOCATION_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

const EXIT_CODES: Record<LauncherErrorCode, number> = {
  [LauncherErrorCode.INTERPRETER_NOT_FOUND]: 127,
  [LauncherErrorCode.INVOCATION_FAILED]: 126,
  [LauncherErrorCode.INVALID_CONFIG]: 78,
};

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LauncherErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'LauncherError';
    this.code = code;
    this.context = context;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}
