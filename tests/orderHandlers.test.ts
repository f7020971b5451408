import {
  getOrderHandler,
  listMyOrdersHandler,
  listOrdersByStatusHandler,
  orderStatsHandler,
  transitionOrderHandler,
} from '../src/orderHandlers';
import { getServices } from '../src/services';
import type { Order } from '../src/types';
import { BURGER, FRIES, createHarness } from './support/inMemory';
import type { TestHarness } from './support/inMemory';
import { callHandler, makeEvent } from './support/lambda';

jest.mock('../src/services');

const mockedGetServices = getServices as jest.MockedFunction<typeof getServices>;

let h: TestHarness;

async function placeOrder(userId: string, key: string): Promise<Order> {
  await h.services.carts.addItem(userId, BURGER.itemId, 1);
  await h.services.carts.addItem(userId, FRIES.itemId, 2);
  const { order } = await h.services.checkout.checkout(userId, { idempotencyKey: key });
  return order;
}

beforeEach(() => {
  jest.clearAllMocks();
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  h = createHarness();
  mockedGetServices.mockReturnValue(h.services);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe('GET /orders/{orderId}', () => {
  test('owner sees the order', async () => {
    const order = await placeOrder('customer-1', 'k1');

    const res = await callHandler(getOrderHandler, makeEvent({ pathParameters: { orderId: order.orderId } }));

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ orderId: order.orderId, total: 2199, status: 'PLACED' });
  });

  test("another customer's order is reported as not found", async () => {
    const order = await placeOrder('customer-2', 'k1');

    const res = await callHandler(getOrderHandler, makeEvent({ pathParameters: { orderId: order.orderId } }));

    expect(res.statusCode).toBe(404);
    expect(res.body['error']).toBe('NOT_FOUND');
  });

  test('staff see any order', async () => {
    const order = await placeOrder('customer-2', 'k1');

    const res = await callHandler(
      getOrderHandler,
      makeEvent({ userId: 'staff-1', role: 'staff', pathParameters: { orderId: order.orderId } })
    );

    expect(res.statusCode).toBe(200);
  });
});

test('GET /orders lists only the caller, newest first', async () => {
  const first = await placeOrder('customer-1', 'k1');
  h.clock.advance(60_000);
  const second = await placeOrder('customer-1', 'k2');
  await placeOrder('customer-2', 'k3');

  const res = await callHandler(listMyOrdersHandler, makeEvent());

  expect(res.statusCode).toBe(200);
  expect(res.body['count']).toBe(2);
  const orders = res.body['orders'] as Array<Record<string, unknown>>;
  expect(orders.map(order => order['orderId'])).toEqual([second.orderId, first.orderId]);
});

test('GET /orders with limit=0 → 400', async () => {
  const res = await callHandler(listMyOrdersHandler, makeEvent({ query: { limit: '0' } }));

  expect(res.statusCode).toBe(400);
  expect(res.body['message']).toBe('limit must be an integer between 1 and 100');
});

describe('GET /orders/status/{status}', () => {
  test('customers are refused', async () => {
    const res = await callHandler(listOrdersByStatusHandler, makeEvent({ pathParameters: { status: 'PLACED' } }));

    expect(res.statusCode).toBe(403);
    expect(res.body).toEqual({ error: 'FORBIDDEN', message: 'Staff role required' });
  });

  test('unknown status → 400', async () => {
    const res = await callHandler(
      listOrdersByStatusHandler,
      makeEvent({ role: 'staff', pathParameters: { status: 'PENDING' } })
    );

    expect(res.statusCode).toBe(400);
    expect(res.body['message']).toBe('Unknown order status');
  });

  test('staff see the queue oldest first', async () => {
    const first = await placeOrder('customer-1', 'k1');
    h.clock.advance(60_000);
    const second = await placeOrder('customer-2', 'k2');

    const res = await callHandler(
      listOrdersByStatusHandler,
      makeEvent({ role: 'staff', pathParameters: { status: 'PLACED' } })
    );

    expect(res.statusCode).toBe(200);
    const orders = res.body['orders'] as Array<Record<string, unknown>>;
    expect(orders.map(order => order['orderId'])).toEqual([first.orderId, second.orderId]);
  });

  test('a from/to range bounds the results', async () => {
    await placeOrder('customer-1', 'k1');
    h.clock.advance(60 * 60_000);
    const later = await placeOrder('customer-2', 'k2');

    const res = await callHandler(
      listOrdersByStatusHandler,
      makeEvent({ role: 'staff', pathParameters: { status: 'PLACED' }, query: { from: '2026-03-01T12:30:00.000Z' } })
    );

    const orders = res.body['orders'] as Array<Record<string, unknown>>;
    expect(orders.map(order => order['orderId'])).toEqual([later.orderId]);
  });
});

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

describe('PATCH /orders/{orderId}/status', () => {
  function transition(orderId: string, body: unknown, caller: { userId?: string; role?: 'customer' | 'staff' } = {}) {
    return callHandler(transitionOrderHandler, makeEvent({ ...caller, pathParameters: { orderId }, body }));
  }

  test('customer cancels their own PLACED order', async () => {
    const order = await placeOrder('customer-1', 'k1');

    const res = await transition(order.orderId, { status: 'CANCELLED' });

    expect(res.statusCode).toBe(200);
    expect(res.body['status']).toBe('CANCELLED');
    expect(res.body['history']).toEqual([
      { status: 'PLACED', at: '2026-03-01T12:00:00.000Z' },
      { status: 'CANCELLED', at: '2026-03-01T12:00:00.000Z', reason: 'CUSTOMER_REQUEST' },
    ]);
  });

  test('customer may not advance an order', async () => {
    const order = await placeOrder('customer-1', 'k1');

    const res = await transition(order.orderId, { status: 'IN_PREPARATION' });

    expect(res.statusCode).toBe(403);
    expect(res.body['message']).toBe('Customers may only cancel orders');
  });

  test('customer may not cancel once preparation started', async () => {
    const order = await placeOrder('customer-1', 'k1');
    await h.services.stateMachine.transition(order.orderId, 'IN_PREPARATION');

    const res = await transition(order.orderId, { status: 'CANCELLED' });

    expect(res.statusCode).toBe(403);
    expect(res.body['message']).toBe('Order is IN_PREPARATION and can no longer be cancelled by the customer');
  });

  test("customer cannot touch another user's order", async () => {
    const order = await placeOrder('customer-2', 'k1');

    const res = await transition(order.orderId, { status: 'CANCELLED' });

    expect(res.statusCode).toBe(404);
  });

  test('staff advance an order without a reason', async () => {
    const order = await placeOrder('customer-1', 'k1');

    const res = await transition(order.orderId, { status: 'IN_PREPARATION' }, { userId: 'staff-1', role: 'staff' });

    expect(res.statusCode).toBe(200);
    expect(res.body['history']).toEqual([
      { status: 'PLACED', at: '2026-03-01T12:00:00.000Z' },
      { status: 'IN_PREPARATION', at: '2026-03-01T12:00:00.000Z' },
    ]);
  });

  test('skipping a state → 409 INVALID_TRANSITION', async () => {
    const order = await placeOrder('customer-1', 'k1');

    const res = await transition(order.orderId, { status: 'DELIVERED' }, { userId: 'staff-1', role: 'staff' });

    expect(res.statusCode).toBe(409);
    expect(res.body).toMatchObject({
      error: 'INVALID_TRANSITION',
      details: { from: 'PLACED', to: 'DELIVERED', allowed: ['IN_PREPARATION', 'CANCELLED'] },
    });
  });

  test('stale expectedStatus → 409 CONFLICT', async () => {
    const order = await placeOrder('customer-1', 'k1');
    await h.services.stateMachine.transition(order.orderId, 'IN_PREPARATION');

    const res = await transition(
      order.orderId,
      { status: 'READY', expectedStatus: 'PLACED' },
      { userId: 'staff-1', role: 'staff' }
    );

    expect(res.statusCode).toBe(409);
    expect(res.body['error']).toBe('CONFLICT');
  });

  test('unknown target status → 400', async () => {
    const order = await placeOrder('customer-1', 'k1');

    const res = await transition(order.orderId, { status: 'SHIPPED' }, { userId: 'staff-1', role: 'staff' });

    expect(res.statusCode).toBe(400);
    expect(res.body['message']).toBe('status must be one of PLACED, IN_PREPARATION, READY, DELIVERED, CANCELLED');
  });
});

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

describe('GET /orders/stats', () => {
  test('customers are refused', async () => {
    const res = await callHandler(orderStatsHandler, makeEvent());

    expect(res.statusCode).toBe(403);
  });

  test('defaults to the last 30 days', async () => {
    const order = await placeOrder('customer-1', 'k1');
    for (const status of ['IN_PREPARATION', 'READY', 'DELIVERED'] as const) {
      await h.services.stateMachine.transition(order.orderId, status);
    }
    await placeOrder('customer-2', 'k2');

    const res = await callHandler(orderStatsHandler, makeEvent({ role: 'staff' }));

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      from: '2026-01-30T12:00:00.000Z',
      to: '2026-03-01T12:00:00.000Z',
      totalOrders: 2,
      byStatus: { PLACED: 1, IN_PREPARATION: 0, READY: 0, DELIVERED: 1, CANCELLED: 0 },
      revenue: 2199,
      averageOrderValue: 2199,
    });
  });

  test('from after to → 400', async () => {
    const res = await callHandler(
      orderStatsHandler,
      makeEvent({ role: 'staff', query: { from: '2026-03-02T00:00:00.000Z', to: '2026-03-01T00:00:00.000Z' } })
    );

    expect(res.statusCode).toBe(400);
    expect(res.body['message']).toBe('from must not be after to');
  });
});
