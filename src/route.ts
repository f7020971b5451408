import type { APIGatewayProxyEvent, APIGatewayProxyHandler, APIGatewayProxyResult, Context } from 'aws-lambda';
import { callerFrom } from './access';
import { deadlineFor } from './deadline';
import { OrderingError } from './errors';
import { internalError, orderingErrorResult, unauthorized } from './http';
import { errorMessage, log } from './logger';
import { getServices } from './services';
import type { Services } from './services';
import type { Caller } from './types';

export interface RouteRequest {
  event: APIGatewayProxyEvent;
  caller: Caller;
  services: Services;
  /** Absolute deadline for the core call, epoch ms. */
  deadline: number;
}

/**
 * Wraps a route body with identity resolution, deadline derivation and the
 * error-to-response mapping shared by every handler.
 */
export function route(
  action: string,
  body: (request: RouteRequest) => Promise<APIGatewayProxyResult>,
): APIGatewayProxyHandler {
  return async (event: APIGatewayProxyEvent, context: Context) => {
    const start = Date.now();
    const caller = callerFrom(event);
    if (!caller) {
      log({ level: 'warn', action: `${action}.unauthorized` });
      return unauthorized();
    }

    try {
      const services = getServices();
      const deadline = deadlineFor(context, services.config.requestTimeoutMs, services.clock);
      return await body({ event, caller, services, deadline });
    } catch (err) {
      if (err instanceof OrderingError) {
        log({ level: 'warn', action: `${action}.rejected`, userId: caller.userId, code: err.code, message: err.message, durationMs: Date.now() - start });
        return orderingErrorResult(err);
      }
      log({ level: 'error', action: `${action}.error`, userId: caller.userId, error: errorMessage(err), durationMs: Date.now() - start });
      return internalError();
    }
  };
}
