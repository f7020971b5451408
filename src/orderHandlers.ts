import { canViewOrder, decideTransition } from './access';
import { notFound } from './errors';
import { forbidden, ok, validationError } from './http';
import { isOrderStatus } from './orderStatus';
import { route } from './route';
import { parseBody, parseDateRange, parseLimit, validateTransition } from './validation';
import type { DateRange } from './validation';

// GET /orders/{orderId}
export const getOrderHandler = route('order.get', async ({ event, caller, services }) => {
  const orderId = event.pathParameters?.['orderId'];
  if (!orderId) return validationError('Missing orderId path parameter');

  const order = await services.ledger.getOrder(orderId);
  // Other users' orders are reported as absent
  if (!canViewOrder(caller, order)) {
    throw notFound(`Order ${orderId} not found`, { orderId });
  }
  return ok(order);
});

// GET /orders
export const listMyOrdersHandler = route('order.list_mine', async ({ event, caller, services }) => {
  const limit = parseLimit(event.queryStringParameters?.['limit']);
  if (!limit.ok) return validationError(limit.message);

  const orders = await services.ledger.listOrdersByUser(caller.userId, { limit: limit.value });
  return ok({ orders, count: orders.length });
});

// GET /orders/status/{status}
export const listOrdersByStatusHandler = route('order.list_by_status', async ({ event, caller, services }) => {
  if (caller.role !== 'staff') return forbidden('Staff role required');

  const status = event.pathParameters?.['status'];
  if (!isOrderStatus(status)) return validationError('Unknown order status');

  const limit = parseLimit(event.queryStringParameters?.['limit']);
  if (!limit.ok) return validationError(limit.message);

  const query = event.queryStringParameters;
  let range: DateRange | undefined;
  if (query?.['from'] !== undefined || query?.['to'] !== undefined) {
    const parsed = parseDateRange(query, services.clock.now());
    if (!parsed.ok) return validationError(parsed.message);
    range = parsed.value;
  }

  const orders = await services.ledger.listOrdersByStatus(status, { limit: limit.value, ...range });
  return ok({ orders, count: orders.length });
});

// PATCH /orders/{orderId}/status
export const transitionOrderHandler = route('order.transition', async ({ event, caller, services, deadline }) => {
  const orderId = event.pathParameters?.['orderId'];
  if (!orderId) return validationError('Missing orderId path parameter');

  const body = parseBody(event.body);
  if (!body.ok) return validationError(body.message);

  const validation = validateTransition(body.value);
  if (!validation.ok) return validationError(validation.message);

  const order = await services.ledger.getOrder(orderId);
  if (!canViewOrder(caller, order)) {
    throw notFound(`Order ${orderId} not found`, { orderId });
  }

  const decision = decideTransition(caller, order, validation.value.status);
  if (!decision.allowed) return forbidden(decision.reason);

  const updated = await services.stateMachine.transition(orderId, validation.value.status, {
    deadline,
    expectedStatus: validation.value.expectedStatus ?? decision.expectedStatus,
    reason: caller.role === 'customer' ? 'CUSTOMER_REQUEST' : undefined,
  });
  return ok(updated);
});

// GET /orders/stats
export const orderStatsHandler = route('order.stats', async ({ event, caller, services }) => {
  if (caller.role !== 'staff') return forbidden('Staff role required');

  const range = parseDateRange(event.queryStringParameters, services.clock.now());
  if (!range.ok) return validationError(range.message);

  return ok(await services.ledger.getOrderStats(range.value));
});
