import { AppError, ErrorKind, Result } from '../types';

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function appError(kind: ErrorKind, message: string): AppError {
  return { kind, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
