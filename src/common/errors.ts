/**
 * Application errors
 *
 * Anything thrown as an AppError is rendered by the global handler with its
 * own status code; everything else is a 500.
 */

export class AppError extends Error {
  statusCode: number;
  code: string;

  constructor(code: string, message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidArgumentError extends AppError {
  argument: string;

  constructor(argument: string, message: string) {
    super('INVALID_ARGUMENT', message, 400);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

export class NotReadyError extends AppError {
  constructor(message: string) {
    super('NOT_READY', message, 503);
    this.name = 'NotReadyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
