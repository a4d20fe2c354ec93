/**
 * Sandbox Error Handling Module
 *
 * Typed errors for sandbox operations. Everything a caller can be told about is a
 * SandboxError; timeouts, resource kills and failed installs are not errors here,
 * they are reported as statuses on the execution or install result.
 */

import { ZodError } from 'zod';

export type SandboxErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'PATH_ESCAPE'
  | 'SANDBOX_BUSY'
  | 'INFRASTRUCTURE'
  | 'ENTRY_NOT_FOUND'
  | 'NOT_EMPTY'
  | 'INVALID_REQUEST'
  | 'UNKNOWN_ERROR';

/**
 * Base error class for all sandbox errors
 */
export class SandboxError extends Error {
  public readonly code: SandboxErrorCode;
  public readonly retryable: boolean;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: SandboxErrorCode,
    retryable: boolean = false,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SandboxError';
    this.code = code;
    this.retryable = retryable;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SandboxError.prototype);
  }
}

/**
 * Error thrown when a user has no sandbox
 */
export class SandboxNotFoundError extends SandboxError {
  constructor(userId: string, details?: Record<string, unknown>) {
    super(`No sandbox found for user ${userId}`, 'NOT_FOUND', false, { userId, ...details });
    this.name = 'SandboxNotFoundError';
    Object.setPrototypeOf(this, SandboxNotFoundError.prototype);
  }
}

/**
 * Error thrown when a user already owns a sandbox
 */
export class SandboxExistsError extends SandboxError {
  constructor(userId: string, details?: Record<string, unknown>) {
    super(`A sandbox already exists for user ${userId}`, 'ALREADY_EXISTS', false, {
      userId,
      ...details,
    });
    this.name = 'SandboxExistsError';
    Object.setPrototypeOf(this, SandboxExistsError.prototype);
  }
}

/**
 * Error thrown when a user path resolves outside the sandbox root
 */
export class PathEscapeError extends SandboxError {
  constructor(userPath: string, details?: Record<string, unknown>) {
    super(`Path escapes the sandbox: ${userPath}`, 'PATH_ESCAPE', false, { userPath, ...details });
    this.name = 'PathEscapeError';
    Object.setPrototypeOf(this, PathEscapeError.prototype);
  }
}

/**
 * Error thrown when another execution-class operation holds the sandbox
 */
export class SandboxBusyError extends SandboxError {
  constructor(userId: string, heldBy: string, details?: Record<string, unknown>) {
    super(`Sandbox for user ${userId} is busy (${heldBy} in progress)`, 'SANDBOX_BUSY', true, {
      userId,
      heldBy,
      ...details,
    });
    this.name = 'SandboxBusyError';
    Object.setPrototypeOf(this, SandboxBusyError.prototype);
  }
}

/**
 * Error thrown when the container runtime cannot serve a request.
 * Not retried automatically; the hint tells the operator what to fix.
 */
export class InfrastructureError extends SandboxError {
  public readonly hint?: string;

  constructor(message: string, hint?: string, details?: Record<string, unknown>) {
    super(message, 'INFRASTRUCTURE', false, { ...details, hint });
    this.name = 'InfrastructureError';
    this.hint = hint;
    Object.setPrototypeOf(this, InfrastructureError.prototype);
  }
}

/**
 * Error thrown when a file or directory inside a sandbox does not exist
 */
export class EntryNotFoundError extends SandboxError {
  constructor(userPath: string, details?: Record<string, unknown>) {
    super(`No such file or directory: ${userPath}`, 'ENTRY_NOT_FOUND', false, {
      userPath,
      ...details,
    });
    this.name = 'EntryNotFoundError';
    Object.setPrototypeOf(this, EntryNotFoundError.prototype);
  }
}

/**
 * Error thrown when removing a non-empty directory without recursive=true
 */
export class NotEmptyError extends SandboxError {
  constructor(userPath: string, details?: Record<string, unknown>) {
    super(
      `Directory is not empty: ${userPath} (use recursive=true to remove it)`,
      'NOT_EMPTY',
      false,
      { userPath, ...details },
    );
    this.name = 'NotEmptyError';
    Object.setPrototypeOf(this, NotEmptyError.prototype);
  }
}

/**
 * Error thrown when request parameters fail validation
 */
export class InvalidRequestError extends SandboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', false, details || {});
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }

  static fromZod(error: ZodError): InvalidRequestError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    return new InvalidRequestError(`Invalid request: ${summary}`, { issues });
  }
}

/** errno-style `code` of a Node.js system error, if present */
export function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Convert filesystem, validation and unknown errors to typed sandbox errors.
 * `userPath` is used to word filesystem errors in terms the caller sent.
 */
export function toSandboxError(error: unknown, userPath?: string): SandboxError {
  if (error instanceof SandboxError) {
    return error;
  }

  if (error instanceof ZodError) {
    return InvalidRequestError.fromZod(error);
  }

  const message = error instanceof Error ? error.message : String(error);
  const label = userPath ?? '(unknown path)';

  switch (errnoCode(error)) {
    case 'ENOENT':
      return new EntryNotFoundError(label);
    case 'ENOTEMPTY':
    case 'EEXIST':
      return new NotEmptyError(label);
    case 'EISDIR':
      return new InvalidRequestError(`A directory exists with that name: ${label}`);
    case 'ENOTDIR':
      return new InvalidRequestError(`Not a directory: ${label}`);
    case 'ELOOP':
      return new PathEscapeError(label, { reason: 'too many symbolic links' });
    default:
      return new SandboxError(message || 'Unknown error', 'UNKNOWN_ERROR', false, {
        originalError: String(error),
      });
  }
}

/**
 * Shape reported to callers when a request is rejected
 */
export interface SandboxErrorPayload {
  code: SandboxErrorCode;
  message: string;
  hint?: string;
}

export function describeError(error: SandboxError): SandboxErrorPayload {
  const payload: SandboxErrorPayload = { code: error.code, message: error.message };
  if (error instanceof InfrastructureError && error.hint) {
    payload.hint = error.hint;
  }
  return payload;
}
