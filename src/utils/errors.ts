import type { Response } from 'express';
import type { ZodError } from 'zod';
import { Logger, type LogEntry } from './Logger';

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }

  static fromZod(error: ZodError, message = 'Invalid request body') {
    return new ValidationError(message, error.flatten());
  }
}

export class AuthError extends AppError {
  constructor(message = 'Authentication required', details?: unknown) {
    super(message, 401, 'AUTH_ERROR', details);
  }
}

export class AccountLockedError extends AppError {
  constructor(readonly lockedUntil: string) {
    super(`Account locked until ${lockedUntil}`, 423, 'ACCOUNT_LOCKED', { locked_until: lockedUntil });
  }
}

export class QuotaExceededError extends AppError {
  constructor(message = 'No free optimizations left') {
    super(message, 402, 'QUOTA_EXCEEDED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(what: string) {
    super(`${what} not found`, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 502, 'UPSTREAM_ERROR', details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 503, 'NOT_CONFIGURED');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorResponseMeta extends Partial<LogEntry> {
  category: string;
  fallbackMessage?: string;
}

// Logs the failure and writes the JSON error body; unknown errors become 500s
export async function respondWithError(res: Response, error: unknown, meta: ErrorResponseMeta) {
  const { category, fallbackMessage = 'Internal server error', ...logMeta } = meta;

  if (error instanceof AppError) {
    await Logger.logBackendError(category, error, { ...logMeta, Status: error.code });
    const body: { error: string; code: string; details?: unknown } = { error: error.message, code: error.code };
    if (error.details !== undefined) body.details = error.details;
    return res.status(error.status).json(body);
  }

  await Logger.logBackendError(category, error, { ...logMeta, Status: 'INTERNAL_ERROR' });
  return res.status(500).json({ error: fallbackMessage });
}
