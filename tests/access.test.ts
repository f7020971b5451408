import { callerFrom, canViewOrder, decideTransition } from '../src/access';
import { deadlineFor } from '../src/deadline';
import type { Order } from '../src/types';
import { TestClock } from './support/inMemory';
import { makeEvent } from './support/lambda';

const ORDER: Order = {
  orderId: 'order-1',
  userId: 'customer-1',
  idempotencyKey: 'key-1',
  cartVersion: 1,
  lines: [],
  total: 0,
  status: 'PLACED',
  createdAt: '2026-03-01T12:00:00.000Z',
  history: [{ status: 'PLACED', at: '2026-03-01T12:00:00.000Z' }],
  version: 1,
};

describe('callerFrom', () => {
  test('reads the authorizer claims', () => {
    expect(callerFrom(makeEvent({ userId: 'staff-1', role: 'staff' }))).toEqual({ userId: 'staff-1', role: 'staff' });
  });

  test('no authorizer means no caller', () => {
    expect(callerFrom(makeEvent({ userId: null }))).toBeNull();
  });
});

test('customers only view their own orders', () => {
  expect(canViewOrder({ userId: 'customer-1', role: 'customer' }, ORDER)).toBe(true);
  expect(canViewOrder({ userId: 'customer-2', role: 'customer' }, ORDER)).toBe(false);
  expect(canViewOrder({ userId: 'staff-1', role: 'staff' }, ORDER)).toBe(true);
});

describe('decideTransition', () => {
  const customer = { userId: 'customer-1', role: 'customer' as const };

  test('staff are unrestricted', () => {
    expect(decideTransition({ userId: 'staff-1', role: 'staff' }, ORDER, 'DELIVERED')).toEqual({ allowed: true });
  });

  test('customer cancel of a PLACED order is pinned to PLACED', () => {
    expect(decideTransition(customer, ORDER, 'CANCELLED')).toEqual({ allowed: true, expectedStatus: 'PLACED' });
  });

  test('customer cancel of a READY order is refused', () => {
    expect(decideTransition(customer, { ...ORDER, status: 'READY' }, 'CANCELLED')).toEqual({
      allowed: false,
      reason: 'Order is READY and can no longer be cancelled by the customer',
    });
  });
});

describe('deadlineFor', () => {
  const clock = new TestClock();
  const start = clock.now().getTime();

  test('uses the request timeout when the invocation has more time left', () => {
    const context = { getRemainingTimeInMillis: () => 30_000 };
    expect(deadlineFor(context, 5000, clock)).toBe(start + 5000);
  });

  test('keeps a response margin when the invocation is nearly out of time', () => {
    const context = { getRemainingTimeInMillis: () => 1000 };
    expect(deadlineFor(context, 5000, clock)).toBe(start + 750);
  });
});
