export type OrderStatus = 'PLACED' | 'IN_PREPARATION' | 'READY' | 'DELIVERED' | 'CANCELLED';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'PLACED',
  'IN_PREPARATION',
  'READY',
  'DELIVERED',
  'CANCELLED',
];

export interface MenuItem {
  itemId: string;
  name: string;
  unitPrice: number; // cents, positive integer
  categoryId: string;
  available: boolean;
}

/** Option-group name → chosen value, e.g. `{ size: 'large', milk: 'oat' }`. */
export type OptionSelection = Record<string, string>;

export interface CartItem {
  lineId: string;
  itemId: string;
  quantity: number; // integer >= 1
  options: OptionSelection;
  note?: string | undefined;
}

export interface Cart {
  userId: string;
  items: CartItem[];
  version: number;   // 0 until the cart is first written
  updatedAt: string; // ISO 8601 timestamp
}

export interface OrderLine {
  itemId: string;
  name: string;
  options: OptionSelection;
  note?: string | undefined;
  unitPrice: number; // cents, captured at checkout
  quantity: number;
  lineTotal: number; // unitPrice * quantity
}

export interface TransitionRecord {
  status: OrderStatus;
  at: string; // ISO 8601 timestamp
  reason?: string | undefined;
}

export interface Order {
  orderId: string;        // UUID, generated server-side
  userId: string;
  idempotencyKey: string;
  cartVersion: number;    // cart version the order was created from
  lines: OrderLine[];
  total: number;          // sum of lineTotals, cents
  status: OrderStatus;
  notes?: string | undefined;
  createdAt: string;      // ISO 8601 timestamp
  history: TransitionRecord[];
  version: number;        // bumped on every transition
}

export interface CartSummaryLine extends CartItem {
  name: string;
  unitPrice: number; // current catalog price, 0 when the item is gone
  available: boolean;
  subtotal: number;
}

export interface CartSummary {
  userId: string;
  version: number;
  lines: CartSummaryLine[];
  itemCount: number;
  total: number;
  hasUnavailableItems: boolean;
}

export type OrderCountsByStatus = Record<OrderStatus, number>;

export interface OrderStats {
  from: string;
  to: string;
  totalOrders: number;
  byStatus: OrderCountsByStatus;
  revenue: number;           // sum of DELIVERED totals, cents
  averageOrderValue: number; // cents, rounded
}

export type Role = 'customer' | 'staff';

export interface Caller {
  userId: string;
  role: Role;
}

export interface ErrorResponse {
  error: string;
  message: string;
  details?: Record<string, unknown> | undefined;
}
