// Error taxonomy for the mic-remote host
// Maps audio, validation and server failures onto HTTP status codes

import type { ZodError } from 'zod';

export enum ErrorType {
  AUDIO_CONTROL = 'audio_control',
  VALIDATION = 'validation',
  SERVER = 'server',
  UNKNOWN = 'unknown'
}

export type AdapterErrorCode = 'NO_DEVICE' | 'UNSUPPORTED' | 'OS_CALL_FAILED';

export abstract class HostError extends Error {
  abstract readonly type: ErrorType;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AdapterError extends HostError {
  readonly type = ErrorType.AUDIO_CONTROL;
  readonly statusCode = 500;
  readonly code: AdapterErrorCode;

  constructor(message: string, code: AdapterErrorCode = 'OS_CALL_FAILED', options?: { cause?: unknown }) {
    super(message);
    this.code = code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ValidationError extends HostError {
  readonly type = ErrorType.VALIDATION;
  readonly statusCode = 400;
  readonly field?: string;
  readonly value?: unknown;

  constructor(message: string, field?: string, value?: unknown) {
    super(message);
    this.field = field;
    this.value = value;
  }
}

export class PortInUseError extends HostError {
  readonly type = ErrorType.SERVER;
  readonly statusCode = 500;
  readonly code = 'EADDRINUSE';
  readonly port: number;

  constructor(port: number) {
    super(`Port ${port} is already in use`);
    this.port = port;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// Wraps anything thrown by an OS call so callers only see AdapterError
export function toAdapterError(error: unknown, action: string): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  const cause = toError(error);
  return new AdapterError(`${action} failed: ${cause.message}`, 'OS_CALL_FAILED', { cause });
}

export function fromZodError(error: ZodError, fallbackMessage = 'Invalid request body'): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError(fallbackMessage);
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
  const message = field ? `${field}: ${issue.message}` : issue.message;
  return new ValidationError(message, field);
}
