export type IcePanelErrorCode =
  | 'COMMAND_NOT_FOUND'
  | 'COMMAND_FAILED'
  | 'AUTH_CANCELLED'
  | 'UNSUPPORTED_ENVIRONMENT'
  | 'VALIDATION'
  | 'NOT_FOUND';

export class IcePanelError extends Error {
  readonly code: IcePanelErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: IcePanelErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'IcePanelError';
    this.code = code;
    this.details = details;
  }
}

export class CommandNotFoundError extends IcePanelError {
  readonly command: string;

  constructor(command: string, message?: string) {
    super('COMMAND_NOT_FOUND', message ?? `Command not found: ${command}`, { command });
    this.name = 'CommandNotFoundError';
    this.command = command;
  }
}

export class CommandFailedError extends IcePanelError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    exitCode: number | null,
    stdout: string,
    stderr: string,
    message?: string,
  ) {
    super(
      'COMMAND_FAILED',
      message ?? `${command} exited with code ${exitCode ?? 'unknown'}`,
      { command, exitCode },
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class AuthCancelledError extends IcePanelError {
  constructor(message = 'Authentication was cancelled. No changes were made.') {
    super('AUTH_CANCELLED', message);
    this.name = 'AuthCancelledError';
  }
}

export class UnsupportedEnvironmentError extends IcePanelError {
  constructor(message: string) {
    super('UNSUPPORTED_ENVIRONMENT', message);
    this.name = 'UnsupportedEnvironmentError';
  }
}

export class ValidationError extends IcePanelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION', message, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends IcePanelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

const EXIT_CODES: Record<IcePanelErrorCode, number> = {
  COMMAND_NOT_FOUND: 1,
  COMMAND_FAILED: 1,
  NOT_FOUND: 1,
  VALIDATION: 2,
  AUTH_CANCELLED: 3,
  UNSUPPORTED_ENVIRONMENT: 4,
};

export class ErrorHandler {
  static isIcePanelError(error: unknown): error is IcePanelError {
    return error instanceof IcePanelError;
  }

  static format(error: unknown): string {
    if (error instanceof CommandFailedError) {
      const output = (error.stderr || error.stdout).trim();
      return output ? `${error.message}:\n${output}` : error.message;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  static exitCode(error: unknown): number {
    return error instanceof IcePanelError ? EXIT_CODES[error.code] : 1;
  }
}
