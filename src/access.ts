import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { Caller, Order, OrderStatus } from './types';

/**
 * Caller identity set by the API Gateway authorizer. The core never looks at
 * roles; the gate below is the only place that does.
 */
export function callerFrom(event: APIGatewayProxyEvent): Caller | null {
  const authorizer: unknown = event.requestContext?.authorizer;
  if (authorizer === null || typeof authorizer !== 'object') return null;

  const userId: unknown = Reflect.get(authorizer, 'userId');
  const role: unknown = Reflect.get(authorizer, 'role');
  if (typeof userId !== 'string' || userId === '') return null;

  return { userId, role: role === 'staff' ? 'staff' : 'customer' };
}

export function canViewOrder(caller: Caller, order: Order): boolean {
  return caller.role === 'staff' || order.userId === caller.userId;
}

export type TransitionDecision =
  | { allowed: true; expectedStatus?: OrderStatus | undefined }
  | { allowed: false; reason: string };

/**
 * Staff may drive any transition. Customers may only cancel their own order
 * while it is still PLACED; the returned expectedStatus pins that check to the
 * write so a concurrent staff transition turns the request into a CONFLICT.
 */
export function decideTransition(caller: Caller, order: Order, target: OrderStatus): TransitionDecision {
  if (caller.role === 'staff') {
    return { allowed: true };
  }
  if (target !== 'CANCELLED') {
    return { allowed: false, reason: 'Customers may only cancel orders' };
  }
  if (order.status !== 'PLACED') {
    return { allowed: false, reason: `Order is ${order.status} and can no longer be cancelled by the customer` };
  }
  return { allowed: true, expectedStatus: 'PLACED' };
}
