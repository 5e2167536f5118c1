/**
 * Error Handling Module
 *
 * Error taxonomy shared by every component, plus a retry helper used around
 * transport calls that fail transiently.
 */

import { BroadcastLogger, createComponentLogger } from '../../utils/logger';

export enum BroadcastErrorType {
  NOT_FOUND = 'not_found',
  FETCH = 'fetch',
  PERSISTENCE = 'persistence',
  VALIDATION = 'validation'
}

export interface ErrorContext {
  errorType: BroadcastErrorType;
  operation?: string;
  destinationId?: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export interface BroadcastErrorOptions {
  operation?: string;
  destinationId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class BroadcastError extends Error {
  public readonly context: ErrorContext;

  constructor(message: string, errorType: BroadcastErrorType, options: BroadcastErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'BroadcastError';
    this.context = {
      errorType,
      operation: options.operation,
      destinationId: options.destinationId,
      timestamp: new Date(),
      details: options.details
    };
  }

  toString(): string {
    const where = [this.context.operation, this.context.destinationId].filter(Boolean).join(' @ ');
    return `[${this.context.errorType}] ${this.message}${where ? ` (${where})` : ''}`;
  }
}

/** Requested content, template, scope or message does not exist. */
export class NotFoundError extends BroadcastError {
  constructor(message: string, options: BroadcastErrorOptions = {}) {
    super(message, BroadcastErrorType.NOT_FOUND, options);
    this.name = 'NotFoundError';
  }
}

/** An external endpoint (transport or metric source) could not be reached or refused the call. */
export class FetchError extends BroadcastError {
  public readonly status?: number;
  public readonly retryAfterSeconds?: number;

  constructor(message: string, options: BroadcastErrorOptions & { status?: number; retryAfterSeconds?: number } = {}) {
    super(message, BroadcastErrorType.FETCH, options);
    this.name = 'FetchError';
    this.status = options.status;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }

  /** The server answered with a rate limit or a server-side failure. */
  isTransient(): boolean {
    return this.status !== undefined && (this.status === 429 || this.status >= 500);
  }

  /** No response arrived, so the request may or may not have been applied. */
  isNetworkFailure(): boolean {
    return this.status === undefined;
  }
}

export class PersistenceError extends BroadcastError {
  constructor(message: string, options: BroadcastErrorOptions = {}) {
    super(message, BroadcastErrorType.PERSISTENCE, options);
    this.name = 'PersistenceError';
  }
}

/** Malformed input to a mutating operation; raised before anything is changed. */
export class ValidationError extends BroadcastError {
  public readonly problems: string[];

  constructor(message: string, problems: string[] = [message], options: BroadcastErrorOptions = {}) {
    super(message, BroadcastErrorType.VALIDATION, options);
    this.name = 'ValidationError';
    this.problems = problems;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export interface RetryOptions {
  /** Additional attempts after the first one */
  maxRetries: number;
  retryDelay: number; // milliseconds
  backoffFactor?: number;
  shouldRetry?: (error: Error) => boolean;
  /** Overrides the computed delay, e.g. from a server-sent Retry-After */
  delayFor?: (error: Error) => number | undefined;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs an operation with bounded retries. The last error is rethrown once
 * every attempt has failed or `shouldRetry` refuses it.
 */
export class RetryHandler {
  private readonly operationName: string;
  private readonly logger: BroadcastLogger;
  private readonly wait: Sleep;

  constructor(operationName: string, logger?: BroadcastLogger, wait: Sleep = sleep) {
    this.operationName = operationName;
    this.logger = logger ?? createComponentLogger('retry');
    this.wait = wait;
  }

  async handle<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const totalAttempts = Math.max(1, options.maxRetries + 1);
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await operation();
      } catch (caught) {
        const error = toError(caught);
        const retryable = options.shouldRetry ? options.shouldRetry(error) : true;

        if (!retryable || attempt >= totalAttempts) {
          throw error;
        }

        const delay = options.delayFor?.(error)
          ?? options.retryDelay * (options.backoffFactor ?? 1) ** (attempt - 1);

        this.logger.warn(`Attempt ${attempt}/${totalAttempts} failed, retrying in ${delay}ms`, {
          error: error.message
        }, this.operationName);

        await this.wait(delay);
      }
    }
  }
}
