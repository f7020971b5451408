export type OrderingErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_QUANTITY'
  | 'EMPTY_CART'
  | 'ITEM_UNAVAILABLE'
  | 'INVALID_TRANSITION'
  | 'CONFLICT'
  | 'DEADLINE_EXCEEDED';

/**
 * Typed failure of a single core operation. None of these are fatal to the
 * process and none are retried by the core; retry policy belongs to the caller.
 */
export class OrderingError extends Error {
  readonly code: OrderingErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: OrderingErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'OrderingError';
    this.code = code;
    this.details = details;
  }
}

export function isOrderingError(err: unknown, code?: OrderingErrorCode): err is OrderingError {
  return err instanceof OrderingError && (code === undefined || err.code === code);
}

export const notFound = (message: string, details?: Record<string, unknown>) =>
  new OrderingError('NOT_FOUND', message, details);

export const conflict = (message: string, details?: Record<string, unknown>) =>
  new OrderingError('CONFLICT', message, details);
