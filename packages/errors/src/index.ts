export class TradingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TradingError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class ValidationError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends TradingError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id ${id} not found` : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * A state machine was asked for a transition it does not allow.
 */
export class InvalidTransitionError extends TradingError {
  constructor(entity: string, id: string, from: string, to: string) {
    super(
      `${entity} ${id} cannot move from ${from} to ${to}`,
      'INVALID_TRANSITION',
      409,
      { entity, id, from, to }
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A write would break an entity invariant. Always a programming-level error.
 */
export class InvariantViolationError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', 409, details);
    this.name = 'InvariantViolationError';
  }
}

export class OrderConstraintError extends TradingError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, 400, details);
    this.name = 'OrderConstraintError';
  }
}

/**
 * The exchange definitively refused the request (bad parameters, balance).
 */
export class ExchangeRejectedError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXCHANGE_REJECTED', 422, details);
    this.name = 'ExchangeRejectedError';
  }
}

/**
 * The request may or may not have reached the exchange.
 */
export class AmbiguousOutcomeError extends TradingError {
  constructor(operation: string, cause: string) {
    super(`Outcome of ${operation} is unknown: ${cause}`, 'AMBIGUOUS_OUTCOME', 504, {
      operation,
      cause,
    });
    this.name = 'AmbiguousOutcomeError';
  }
}

export class TimeoutError extends TradingError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class DurableStoreError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DURABLE_STORE_ERROR', 503, details);
    this.name = 'DurableStoreError';
  }
}

export class BatchDumpError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BATCH_DUMP_ERROR', 500, details);
    this.name = 'BatchDumpError';
  }
}

export class ServiceUnavailableError extends TradingError {
  constructor(service: string) {
    super(`Service ${service} is temporarily unavailable`, 'SERVICE_UNAVAILABLE', 503);
    this.name = 'ServiceUnavailableError';
  }
}

export function isTradingError(error: unknown): error is TradingError {
  return error instanceof TradingError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rejects with TimeoutError when `promise` has not settled within
 * `timeoutMs`. The underlying operation is not cancelled.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
