/**
 * Error Handling Utilities
 *
 * Typed escalation errors plus retry and timeout helpers for the
 * playback and notification channels.
 */

import type { Logger } from 'pino';

/**
 * Base escalation error class
 */
export class EscalationError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  /** Whether the queue consumer should redeliver the message */
  public readonly retryable: boolean;

  constructor(message: string, code: string, statusCode: number = 500, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed observation payload or unknown pet. Never retried.
 */
export class InvalidObservationError extends EscalationError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'INVALID_OBSERVATION', 400, false);
    this.issues = issues;
  }
}

/**
 * Alert history store unreachable or timed out
 */
export class StateUnavailableError extends EscalationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STATE_UNAVAILABLE', 503, true);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Playback or notification channel still failing after the retry budget
 */
export class DeliveryFailureError extends EscalationError {
  public readonly channel: string;
  public readonly attempts: number;

  constructor(channel: string, attempts: number, options?: { cause?: unknown }) {
    super(`Delivery to ${channel} failed after ${attempts} attempt(s)`, 'DELIVERY_FAILURE', 502, false);
    this.channel = channel;
    this.attempts = attempts;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Open-alert / count invariant violated for a pet.
 * Processing for that pet stops; nothing is repaired automatically.
 */
export class InconsistentStateError extends EscalationError {
  public readonly petId: string;

  constructor(petId: string, message: string) {
    super(`Inconsistent alert state for pet ${petId}: ${message}`, 'INCONSISTENT_STATE', 500, false);
    this.petId = petId;
  }
}

export class NotFoundError extends EscalationError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string) {
    const message = identifier ? `${resource} not found: ${identifier}` : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.resource = resource;
  }
}

export class UnauthorizedError extends EscalationError {
  constructor(message: string = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

export class ForbiddenError extends EscalationError {
  constructor(message: string = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
  }
}

export class ConflictError extends EscalationError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

/**
 * Wrap anything that is not already an escalation error as StateUnavailable.
 * Store adapters use this so driver errors never reach the caller untyped.
 */
export function toStateError(error: unknown, context: string): EscalationError {
  if (error instanceof EscalationError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StateUnavailableError(`${context}: ${detail}`, { cause: error });
}

// --------------------------------------------------------------------------
// Retry
// --------------------------------------------------------------------------

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  /** Maximum number of attempts */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Optional custom retry condition */
  shouldRetry?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with exponential backoff
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  log?: Logger,
  context?: string
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = cfg.shouldRetry ?? (() => true);

  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === cfg.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      log?.warn(
        {
          attempt,
          maxAttempts: cfg.maxAttempts,
          delay,
          context,
          error: error instanceof Error ? error.message : String(error),
        },
        'Retrying after transient error'
      );

      if (delay > 0) {
        await sleep(delay);
      }
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError;
}

/**
 * Reject when `promise` does not settle within `timeoutMs`
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface DeliveryOptions {
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
}

/**
 * Run a channel call with a per-attempt timeout and the retry budget.
 * Rejects with DeliveryFailureError once the budget is spent.
 */
export async function deliver(
  fn: () => Promise<void>,
  channel: string,
  options: DeliveryOptions,
  log?: Logger
): Promise<void> {
  try {
    await withRetry(
      () => withTimeout(fn(), options.timeoutMs, channel),
      { maxAttempts: options.maxAttempts, initialDelayMs: options.retryDelayMs },
      log,
      channel
    );
  } catch (error) {
    throw new DeliveryFailureError(channel, options.maxAttempts, { cause: error });
  }
}

/**
 * Format error for an API response (no internal details)
 */
export function formatUserError(error: unknown): { error: string; code: string } {
  if (error instanceof EscalationError) {
    return { error: error.message, code: error.code };
  }

  return { error: 'An unexpected error occurred', code: 'INTERNAL_ERROR' };
}
