/**
 * Matching Errors
 *
 * Single-item operations turn these into result values; batch operations
 * collect them per item. Only match-level preconditions (missing job,
 * job embedding unavailable) propagate to the caller.
 */

// =============================================================================
// ERROR TYPES
// =============================================================================

export type MatchingErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'EXTERNAL_SERVICE'
  | 'NOT_FOUND'
  | 'INVALID_STATUS_TRANSITION';

export class MatchingError extends Error {
  constructor(
    message: string,
    public code: MatchingErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MatchingError';
  }
}

export class InsufficientDataError extends MatchingError {
  constructor(ownerKind: string, ownerId: string, textLength: number) {
    super(`${ownerKind} ${ownerId} has too little text (${textLength} chars)`, 'INSUFFICIENT_DATA', {
      ownerKind,
      ownerId,
      textLength,
    });
    this.name = 'InsufficientDataError';
  }
}

export type ExternalService = 'llm' | 'embedding' | 'database';

/**
 * `unavailable`: the call produced nothing usable (empty input, failed write)
 */
export type ExternalFailureReason = 'timeout' | 'http' | 'connection' | 'malformed_response' | 'unavailable';

export class ExternalServiceError extends MatchingError {
  constructor(
    message: string,
    public service: ExternalService,
    public reason: ExternalFailureReason,
    public status?: number
  ) {
    super(message, 'EXTERNAL_SERVICE', { service, reason, status });
    this.name = 'ExternalServiceError';
  }
}

export class NotFoundError extends MatchingError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
  }
}

export class InvalidStatusTransitionError extends MatchingError {
  constructor(from: string, to: string) {
    super(`Match status cannot move from ${from} to ${to}`, 'INVALID_STATUS_TRANSITION', { from, to });
    this.name = 'InvalidStatusTransitionError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * One-line description of any thrown value, for per-item error lists
 */
export function describeError(error: unknown): string {
  const message =
    error instanceof Error ? `${error.name}: ${error.message}` : `Unknown error: ${String(error)}`;
  const singleLine = message.replace(/\s+/g, ' ').trim();
  return singleLine.length > MAX_ERROR_MESSAGE_LENGTH
    ? `${singleLine.slice(0, MAX_ERROR_MESSAGE_LENGTH - 3)}...`
    : singleLine;
}

/**
 * Keeps the first `limit` per-item errors and counts the rest
 */
export class BoundedErrorList {
  private items: string[] = [];
  private overflow = 0;

  constructor(private limit: number) {}

  add(message: string): void {
    if (this.items.length < this.limit) {
      this.items.push(message);
    } else {
      this.overflow++;
    }
  }

  addAll(messages: string[]): void {
    for (const message of messages) {
      this.add(message);
    }
  }

  get size(): number {
    return this.items.length + this.overflow;
  }

  get dropped(): number {
    return this.overflow;
  }

  toArray(): string[] {
    return [...this.items];
  }
}
