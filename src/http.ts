import type { APIGatewayProxyResult } from 'aws-lambda';
import type { OrderingError, OrderingErrorCode } from './errors';
import type { ErrorResponse } from './types';

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function ok(body: unknown, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(body),
  };
}

export function noContent(): APIGatewayProxyResult {
  return { statusCode: 204, headers: JSON_HEADERS, body: '' };
}

export function errorResult(statusCode: number, body: ErrorResponse): APIGatewayProxyResult {
  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(body),
  };
}

export function validationError(message: string): APIGatewayProxyResult {
  return errorResult(400, { error: 'VALIDATION_ERROR', message });
}

export function unauthorized(): APIGatewayProxyResult {
  return errorResult(401, { error: 'UNAUTHORIZED', message: 'Missing caller identity' });
}

export function forbidden(message: string): APIGatewayProxyResult {
  return errorResult(403, { error: 'FORBIDDEN', message });
}

export function internalError(): APIGatewayProxyResult {
  return errorResult(500, { error: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
}

export const STATUS_BY_CODE: Readonly<Record<OrderingErrorCode, number>> = {
  NOT_FOUND: 404,
  INVALID_QUANTITY: 400,
  EMPTY_CART: 400,
  ITEM_UNAVAILABLE: 409,
  INVALID_TRANSITION: 409,
  CONFLICT: 409,
  DEADLINE_EXCEEDED: 504,
};

export function orderingErrorResult(err: OrderingError): APIGatewayProxyResult {
  return errorResult(STATUS_BY_CODE[err.code], {
    error: err.code,
    message: err.message,
    ...(err.details ? { details: err.details } : {}),
  });
}
