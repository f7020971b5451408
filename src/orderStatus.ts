/**
 * Order status lifecycle.
 *
 * ```
 * PLACED ──▶ IN_PREPARATION ──▶ READY ──▶ DELIVERED
 *    │              │
 *    └──────────────┴──▶ CANCELLED
 * ```
 *
 * DELIVERED and CANCELLED are terminal. History is append-only: every
 * successful transition adds exactly one record and nothing is rewritten.
 */

import type { Clock } from './clock';
import { systemClock } from './clock';
import { assertWithinDeadline } from './deadline';
import { conflict, notFound, OrderingError } from './errors';
import { log } from './logger';
import type { OrderRepository } from './repository';
import { ORDER_STATUSES } from './types';
import type { Order, OrderStatus, TransitionRecord } from './types';

export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  PLACED: ['IN_PREPARATION', 'CANCELLED'],
  IN_PREPARATION: ['READY', 'CANCELLED'],
  READY: ['DELIVERED'],
  DELIVERED: [],
  CANCELLED: [],
};

export const INITIAL_STATUS: OrderStatus = 'PLACED';

export function validTransitions(from: OrderStatus): readonly OrderStatus[] {
  return ORDER_TRANSITIONS[from];
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0;
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some(status => status === value);
}

export function assertTransition(from: OrderStatus, to: OrderStatus): void {
  if (!canTransition(from, to)) {
    const allowed = validTransitions(from);
    throw new OrderingError(
      'INVALID_TRANSITION',
      allowed.length === 0
        ? `Order is ${from}, which is terminal`
        : `Cannot move order from ${from} to ${to}; allowed: ${allowed.join(', ')}`,
      { from, to, allowed: [...allowed] }
    );
  }
}

export interface TransitionOptions {
  /** Absolute deadline, epoch ms. */
  deadline?: number | undefined;
  /** Fail with CONFLICT unless the order is currently in this status. */
  expectedStatus?: OrderStatus | undefined;
  reason?: string | undefined;
}

export class OrderStateMachine {
  constructor(
    private readonly orders: OrderRepository,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Moves an order to `target`, appending `(target, now)` to its history. The
   * write is conditioned on the status and version that were read, so of two
   * racing calls exactly one applies and the other fails with CONFLICT.
   */
  async transition(orderId: string, target: OrderStatus, options: TransitionOptions = {}): Promise<Order> {
    const order = await this.orders.getOrder(orderId);
    if (!order) {
      throw notFound(`Order ${orderId} not found`, { orderId });
    }

    if (options.expectedStatus !== undefined && order.status !== options.expectedStatus) {
      throw conflict(`Order ${orderId} is ${order.status}, expected ${options.expectedStatus}`, {
        orderId,
        status: order.status,
        expectedStatus: options.expectedStatus,
      });
    }

    assertTransition(order.status, target);
    assertWithinDeadline(options.deadline, this.clock, 'order transition');

    const record: TransitionRecord = {
      status: target,
      at: this.clock.now().toISOString(),
      ...(options.reason !== undefined ? { reason: options.reason } : {}),
    };

    const updated = await this.orders.appendTransition(orderId, record, {
      status: order.status,
      version: order.version,
    });

    log({ level: 'info', action: 'order.transition', orderId, userId: order.userId, from: order.status, to: target });
    return updated;
  }
}
