import type { CartItem, MenuItem, OptionSelection, OrderLine } from './types';

export interface PricingResult {
  lines: OrderLine[];
  total: number;
}

/**
 * Prices cart lines at the catalog's current unit price. `menu` must hold an
 * entry for every line's itemId; the caller checks availability first.
 */
export function calculatePricing(items: readonly CartItem[], menu: ReadonlyMap<string, MenuItem>): PricingResult {
  const lines: OrderLine[] = items.map(item => {
    const menuItem = menu.get(item.itemId);
    if (!menuItem) {
      throw new Error(`No catalog entry supplied for item ${item.itemId}`);
    }
    return {
      itemId: item.itemId,
      name: menuItem.name,
      options: { ...item.options },
      ...(item.note !== undefined ? { note: item.note } : {}),
      unitPrice: menuItem.unitPrice,
      quantity: item.quantity,
      lineTotal: menuItem.unitPrice * item.quantity,
    };
  });

  const total = lines.reduce((sum, line) => sum + line.lineTotal, 0);

  return { lines, total };
}

/** Order-insensitive identity of an option set, used to merge cart lines. */
export function optionsKey(options: OptionSelection): string {
  return JSON.stringify(Object.keys(options).sort().map(group => [group, options[group]]));
}
