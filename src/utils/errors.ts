import type { Response } from 'express';
import type { ZodError } from 'zod';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class StoreUnavailableError extends HttpError {
  constructor() {
    super(500, 'Database not configured');
  }
}

export class InvalidArgumentError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

// The runtime was configured without the parser this file type needs
export class CapabilityUnavailableError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class MalformedInputError extends HttpError {
  constructor(cause: unknown) {
    super(400, `Failed to read file: ${errorMessage(cause).slice(0, 120)}`);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

/** Raised by a store when an insert hits a unique constraint. */
export class StoreConflictError extends Error {
  constructor(
    readonly collection: string,
    message: string
  ) {
    super(message);
    this.name = 'StoreConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function fromZodError(error: ZodError): InvalidArgumentError {
  const [issue] = error.issues;
  if (!issue) {
    return new InvalidArgumentError('Invalid request body');
  }
  const path = issue.path.join('.');
  return new InvalidArgumentError(path ? `${path}: ${issue.message}` : issue.message);
}

export function statusOf(error: unknown): number {
  return error instanceof HttpError ? error.status : 500;
}

export function sendError(res: Response, error: unknown) {
  if (error instanceof HttpError) {
    return res.status(error.status).json({ detail: error.message });
  }
  return res.status(500).json({ detail: 'Internal server error' });
}
