import { randomUUID } from 'crypto';
import { getMenuItems } from './catalog';
import type { CatalogStore } from './catalog';
import type { Clock } from './clock';
import { systemClock } from './clock';
import { assertWithinDeadline } from './deadline';
import { conflict, isOrderingError, OrderingError } from './errors';
import { errorMessage, log } from './logger';
import { INITIAL_STATUS } from './orderStatus';
import { calculatePricing } from './pricing';
import type { CartRepository, OrderRepository } from './repository';
import type { Order } from './types';

/** Reason recorded on an order cancelled because its cart moved mid-checkout. */
export const CART_CHANGED = 'CART_CHANGED';

export interface CheckoutOptions {
  idempotencyKey: string;
  notes?: string | undefined;
  /** Absolute deadline, epoch ms. */
  deadline?: number | undefined;
}

export interface CheckoutResult {
  order: Order;
  /** false when an earlier checkout's order was returned instead. */
  created: boolean;
}

function isCompensated(order: Order): boolean {
  const last = order.history[order.history.length - 1];
  return order.status === 'CANCELLED' && last?.reason === CART_CHANGED;
}

/**
 * Turns a user's cart into an order.
 *
 * The order is written first and the cart cleared second. A crash between
 * the two leaves an order next to a full cart; the next checkout for that
 * cart (same idempotency key, or the same cart version) finds the order,
 * finishes the clear and returns it instead of creating a duplicate.
 */
export class CheckoutCoordinator {
  constructor(
    private readonly carts: CartRepository,
    private readonly orders: OrderRepository,
    private readonly catalog: CatalogStore,
    private readonly clock: Clock = systemClock,
  ) {}

  async checkout(userId: string, options: CheckoutOptions): Promise<CheckoutResult> {
    const start = this.clock.now().getTime();
    const { idempotencyKey } = options;

    log({ level: 'info', action: 'checkout.start', userId, idempotencyKey });

    // 1. Replay of an earlier request with the same key
    const replayed = await this.orders.getOrderByIdempotencyKey(userId, idempotencyKey);
    if (replayed) {
      if (isCompensated(replayed)) {
        throw conflict('Cart changed during checkout; retry with a new idempotency key', {
          orderId: replayed.orderId,
        });
      }
      await this.finishInterruptedClear(replayed);
      log({ level: 'info', action: 'checkout.duplicate', userId, orderId: replayed.orderId, durationMs: this.elapsed(start) });
      return { order: replayed, created: false };
    }

    // 2. Load cart
    const cart = await this.carts.getCart(userId);
    if (!cart || cart.items.length === 0) {
      throw new OrderingError('EMPTY_CART', 'Cart is empty', { userId });
    }

    // 3. Stale cart: an order already exists for this exact cart state
    const stale = await this.orders.getOrderByCartVersion(userId, cart.version);
    if (stale) {
      await this.adoptKey(stale, idempotencyKey);
      await this.finishInterruptedClear(stale);
      log({ level: 'info', action: 'checkout.recovered', userId, orderId: stale.orderId, durationMs: this.elapsed(start) });
      return { order: stale, created: false };
    }

    // 4. Re-check every item against the current catalog
    const menu = await getMenuItems(this.catalog, cart.items.map(item => item.itemId));
    const unavailable = [
      ...new Set(cart.items.map(item => item.itemId).filter(itemId => !menu.get(itemId)?.available)),
    ];
    if (unavailable.length > 0) {
      throw new OrderingError('ITEM_UNAVAILABLE', `Items no longer available: ${unavailable.join(', ')}`, {
        itemIds: unavailable,
      });
    }

    // 5. Price at the catalog's current prices; the order keeps these forever
    const pricing = calculatePricing(cart.items, menu);
    const createdAt = this.clock.now().toISOString();

    const order: Order = {
      orderId: randomUUID(),
      userId,
      idempotencyKey,
      cartVersion: cart.version,
      lines: pricing.lines,
      total: pricing.total,
      status: INITIAL_STATUS,
      ...(options.notes !== undefined ? { notes: options.notes } : {}),
      createdAt,
      history: [{ status: INITIAL_STATUS, at: createdAt }],
      version: 1,
    };

    assertWithinDeadline(options.deadline, this.clock, 'order creation');

    // 6. Persist the order before touching the cart
    const result = await this.orders.createOrder(order);
    if (!result.created) {
      // A concurrent request for the same key or cart version won the race
      await this.adoptKey(result.order, idempotencyKey);
      log({ level: 'info', action: 'checkout.duplicate', userId, orderId: result.order.orderId, durationMs: this.elapsed(start) });
      return result;
    }

    // 7. Clear the cart, but only the version the order was built from
    try {
      await this.carts.saveCart({ userId, items: [], version: cart.version + 1, updatedAt: createdAt }, cart.version);
    } catch (err) {
      if (isOrderingError(err, 'CONFLICT')) {
        await this.compensate(order);
        throw conflict('Cart changed during checkout; review the cart and retry', {
          userId,
          orderId: order.orderId,
        });
      }
      throw err;
    }

    log({ level: 'info', action: 'checkout.complete', userId, orderId: order.orderId, total: order.total, durationMs: this.elapsed(start) });
    return { order, created: true };
  }

  /** Clears the cart left behind by `order`'s checkout, if it is still at that version. */
  private async finishInterruptedClear(order: Order): Promise<void> {
    const cart = await this.carts.getCart(order.userId);
    if (!cart || cart.version !== order.cartVersion || cart.items.length === 0) return;

    try {
      await this.carts.saveCart(
        { userId: order.userId, items: [], version: cart.version + 1, updatedAt: this.clock.now().toISOString() },
        cart.version
      );
      log({ level: 'info', action: 'checkout.cart_cleared', userId: order.userId, orderId: order.orderId });
    } catch (err) {
      if (!isOrderingError(err, 'CONFLICT')) throw err;
      // The user changed the cart meanwhile; their new items stay.
      log({ level: 'warn', action: 'checkout.cart_moved', userId: order.userId, orderId: order.orderId });
    }
  }

  /** Binds `idempotencyKey` to an order created under another key, so replays return it. */
  private async adoptKey(order: Order, idempotencyKey: string): Promise<void> {
    if (order.idempotencyKey === idempotencyKey) return;
    const linked = await this.orders.linkIdempotencyKey(order.userId, idempotencyKey, order.orderId);
    log({ level: 'info', action: 'checkout.key_linked', userId: order.userId, orderId: order.orderId, idempotencyKey, linked });
  }

  /** Cancels an order whose cart changed between read and clear. */
  private async compensate(order: Order): Promise<void> {
    try {
      await this.orders.appendTransition(
        order.orderId,
        { status: 'CANCELLED', at: this.clock.now().toISOString(), reason: CART_CHANGED },
        { status: order.status, version: order.version }
      );
      log({ level: 'warn', action: 'checkout.compensated', userId: order.userId, orderId: order.orderId });
    } catch (err) {
      log({ level: 'error', action: 'checkout.compensation_failed', userId: order.userId, orderId: order.orderId, error: errorMessage(err) });
      throw err;
    }
  }

  private elapsed(start: number): number {
    return this.clock.now().getTime() - start;
  }
}
