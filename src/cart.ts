import { randomUUID } from 'crypto';
import { getMenuItems } from './catalog';
import type { CatalogStore } from './catalog';
import type { Clock } from './clock';
import { systemClock } from './clock';
import { DEFAULT_MAX_LINE_QUANTITY } from './config';
import { isOrderingError, notFound, OrderingError } from './errors';
import { log } from './logger';
import { optionsKey } from './pricing';
import type { CartRepository } from './repository';
import type { Cart, CartItem, CartSummary, CartSummaryLine, OptionSelection } from './types';

export interface CartManagerOptions {
  clock?: Clock;
  maxLineQuantity?: number;
}

/** One requested line of a whole-cart replacement. */
export interface CartEntry {
  itemId: string;
  quantity: number;
  options?: OptionSelection | undefined;
  note?: string | undefined;
}

export function emptyCart(userId: string, clock: Clock = systemClock): Cart {
  return { userId, items: [], version: 0, updatedAt: clock.now().toISOString() };
}

/**
 * Per-user cart. Every mutation is a compare-and-set on the cart version, so
 * two concurrent requests from the same user cannot both apply against the
 * same snapshot: the loser fails with CONFLICT.
 */
export class CartManager {
  private readonly clock: Clock;
  private readonly maxLineQuantity: number;

  constructor(
    private readonly carts: CartRepository,
    private readonly catalog: CatalogStore,
    options: CartManagerOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.maxLineQuantity = options.maxLineQuantity ?? DEFAULT_MAX_LINE_QUANTITY;
  }

  async getCart(userId: string): Promise<Cart> {
    return (await this.carts.getCart(userId)) ?? emptyCart(userId, this.clock);
  }

  async addItem(
    userId: string,
    itemId: string,
    quantity: number,
    options: OptionSelection = {},
    note?: string,
  ): Promise<Cart> {
    this.assertQuantity(quantity, 1);

    const menuItem = await this.catalog.getMenuItem(itemId);
    if (!menuItem) {
      throw notFound(`Menu item ${itemId} not found`, { itemId });
    }
    if (!menuItem.available) {
      throw new OrderingError('ITEM_UNAVAILABLE', `Menu item '${menuItem.name}' is not available`, {
        itemIds: [itemId],
      });
    }

    const cart = await this.getCart(userId);
    const key = optionsKey(options);
    const existing = cart.items.find(item => item.itemId === itemId && optionsKey(item.options) === key);

    let items: CartItem[];
    if (existing) {
      const merged = existing.quantity + quantity;
      this.assertQuantity(merged, 1);
      items = cart.items.map(item =>
        item === existing
          ? { ...item, quantity: merged, ...(note !== undefined ? { note } : {}) }
          : item
      );
    } else {
      items = [
        ...cart.items,
        {
          lineId: randomUUID(),
          itemId,
          quantity,
          options: { ...options },
          ...(note !== undefined ? { note } : {}),
        },
      ];
    }

    return this.write(cart, items);
  }

  /** Sets a line's quantity; 0 removes the line. */
  async updateQuantity(userId: string, lineId: string, quantity: number): Promise<Cart> {
    this.assertQuantity(quantity, 0);

    const cart = await this.getCart(userId);
    const line = this.findLine(cart, lineId);

    const items =
      quantity === 0
        ? cart.items.filter(item => item !== line)
        : cart.items.map(item => (item === line ? { ...item, quantity } : item));

    return this.write(cart, items);
  }

  async removeItem(userId: string, lineId: string): Promise<Cart> {
    const cart = await this.getCart(userId);
    const line = this.findLine(cart, lineId);
    return this.write(cart, cart.items.filter(item => item !== line));
  }

  async clear(userId: string): Promise<Cart> {
    const cart = await this.getCart(userId);
    if (cart.items.length === 0) return cart;
    return this.write(cart, []);
  }

  /**
   * Replaces every line in one versioned write. Entries for the same item and
   * option set merge; lines that survive keep their lineId.
   */
  async replaceItems(userId: string, entries: readonly CartEntry[]): Promise<Cart> {
    for (const entry of entries) this.assertQuantity(entry.quantity, 1);

    const menu = await getMenuItems(this.catalog, entries.map(entry => entry.itemId));
    const missing = [...new Set(entries.map(entry => entry.itemId).filter(itemId => !menu.has(itemId)))];
    if (missing.length > 0) {
      throw notFound(`Menu items not found: ${missing.join(', ')}`, { itemIds: missing });
    }
    const unavailable = [...new Set(entries.map(entry => entry.itemId).filter(itemId => !menu.get(itemId)?.available))];
    if (unavailable.length > 0) {
      throw new OrderingError('ITEM_UNAVAILABLE', `Items not available: ${unavailable.join(', ')}`, {
        itemIds: unavailable,
      });
    }

    const cart = await this.getCart(userId);
    const lines = new Map<string, CartItem>();
    for (const entry of entries) {
      const options = entry.options ?? {};
      const key = `${entry.itemId}|${optionsKey(options)}`;
      const merged = lines.get(key);
      if (merged) {
        const quantity = merged.quantity + entry.quantity;
        this.assertQuantity(quantity, 1);
        lines.set(key, { ...merged, quantity, ...(entry.note !== undefined ? { note: entry.note } : {}) });
        continue;
      }
      const previous = cart.items.find(item => item.itemId === entry.itemId && optionsKey(item.options) === optionsKey(options));
      lines.set(key, {
        lineId: previous?.lineId ?? randomUUID(),
        itemId: entry.itemId,
        quantity: entry.quantity,
        options: { ...options },
        ...(entry.note !== undefined ? { note: entry.note } : {}),
      });
    }

    if (lines.size === 0 && cart.items.length === 0) return cart;
    return this.write(cart, [...lines.values()]);
  }

  /**
   * Drops lines whose menu item no longer exists and returns the refreshed
   * summary. Unavailable items stay, flagged in the summary.
   */
  async sync(userId: string): Promise<CartSummary> {
    const cart = await this.getCart(userId);
    const menu = await getMenuItems(this.catalog, cart.items.map(item => item.itemId));
    const kept = cart.items.filter(item => menu.has(item.itemId));

    if (kept.length < cart.items.length) {
      const removed = cart.items.filter(item => !menu.has(item.itemId)).map(item => item.lineId);
      await this.write(cart, kept);
      log({ level: 'info', action: 'cart.synced', userId, removedLineIds: removed });
    }
    return this.getCartSummary(userId);
  }

  /** Cart priced at the catalog's current prices, for display only. */
  async getCartSummary(userId: string): Promise<CartSummary> {
    const cart = await this.getCart(userId);
    const menu = await getMenuItems(this.catalog, cart.items.map(item => item.itemId));

    const lines: CartSummaryLine[] = cart.items.map(item => {
      const menuItem = menu.get(item.itemId);
      const unitPrice = menuItem?.unitPrice ?? 0;
      return {
        ...item,
        name: menuItem?.name ?? item.itemId,
        unitPrice,
        available: menuItem?.available ?? false,
        subtotal: unitPrice * item.quantity,
      };
    });

    return {
      userId,
      version: cart.version,
      lines,
      itemCount: lines.reduce((sum, line) => sum + line.quantity, 0),
      total: lines.reduce((sum, line) => sum + line.subtotal, 0),
      hasUnavailableItems: lines.some(line => !line.available),
    };
  }

  private findLine(cart: Cart, lineId: string): CartItem {
    const line = cart.items.find(item => item.lineId === lineId);
    if (!line) {
      throw notFound(`Cart line ${lineId} not found`, { lineId });
    }
    return line;
  }

  private assertQuantity(quantity: number, min: number): void {
    if (!Number.isInteger(quantity) || quantity < min || quantity > this.maxLineQuantity) {
      throw new OrderingError(
        'INVALID_QUANTITY',
        `Quantity must be an integer between ${min} and ${this.maxLineQuantity}`,
        { quantity, min, max: this.maxLineQuantity }
      );
    }
  }

  private async write(cart: Cart, items: CartItem[]): Promise<Cart> {
    const next: Cart = {
      userId: cart.userId,
      items,
      version: cart.version + 1,
      updatedAt: this.clock.now().toISOString(),
    };

    try {
      await this.carts.saveCart(next, cart.version);
    } catch (err) {
      if (isOrderingError(err, 'CONFLICT')) {
        log({ level: 'warn', action: 'cart.conflict', userId: cart.userId, expectedVersion: cart.version });
      }
      throw err;
    }
    return next;
  }
}
