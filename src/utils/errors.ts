// Common error helpers with a compact, consistent user-facing format.

export const CODES = {
  parse_failed: 'parse_failed',
  argument_resolution_failed: 'argument_resolution_failed',
  tool_execution_failed: 'tool_execution_failed',
  timeout: 'timeout',
  generation_unavailable: 'generation_unavailable',
  cancelled: 'cancelled',
  precondition_failed: 'precondition_failed',
  internal: 'internal',
} as const;

export type ErrorCode = (typeof CODES)[keyof typeof CODES];

export type AppErrorOptions = {
  required?: string[] | string;
  next?: string;
  details?: unknown;
  cause?: unknown;
};

function toArray(val: string[] | string | undefined): string[] | undefined {
  if (val === undefined) return undefined;
  return Array.isArray(val) ? val : [val];
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly required?: string[];
  readonly next?: string;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, opts: AppErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'AppError';
    this.code = code;
    this.required = toArray(opts.required);
    this.next = opts.next;
    this.details = opts.details;
  }
}

/** The structured-generation service could not be reached. Fatal for a turn. */
export class GenerationUnavailableError extends AppError {
  constructor(message: string, opts: AppErrorOptions = {}) {
    super(CODES.generation_unavailable, message, opts);
    this.name = 'GenerationUnavailableError';
  }
}

export function messageOf(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return String(cause);
}

export function createError(code: ErrorCode = CODES.internal, cause?: unknown, opts: AppErrorOptions = {}): AppError {
  const message = messageOf(cause ?? code);
  const withCause = cause instanceof Error && opts.cause === undefined ? { ...opts, cause } : opts;
  return new AppError(code, message, withCause);
}

// Shortcuts
export const parseFailed = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.parse_failed, cause, opts);
export const argumentResolutionFailed = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.argument_resolution_failed, cause, opts);
export const toolExecutionFailed = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.tool_execution_failed, cause, opts);
export const timeout = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.timeout, cause, opts);
export const cancelled = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.cancelled, cause, opts);
export const preconditionFailed = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.precondition_failed, cause, opts);
export const internal = (cause?: unknown, opts?: AppErrorOptions) => createError(CODES.internal, cause, opts);

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

export function codeOf(err: unknown): ErrorCode {
  return err instanceof AppError ? err.code : CODES.internal;
}

export function formatForUser(err: unknown): string {
  const cause = err instanceof Error && err.cause !== undefined ? messageOf(err.cause) : messageOf(err);
  const required = err instanceof AppError && err.required?.length ? err.required.join(', ') : '-';
  const next = err instanceof AppError && err.next ? err.next : 'Provide missing inputs or fix the cause, then retry.';
  return `Cause: ${cause}\nRequired Input: ${required}\nNext Action: ${next}`;
}
