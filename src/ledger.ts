import { notFound } from './errors';
import type { ListOptions, OrderRepository, StatusListOptions } from './repository';
import { ORDER_STATUSES } from './types';
import type { Order, OrderCountsByStatus, OrderStats, OrderStatus } from './types';

export interface StatsRange {
  from: string; // ISO 8601, inclusive
  to: string;   // ISO 8601, inclusive
}

/** Read-only projections over persisted orders. */
export class OrderLedger {
  constructor(private readonly orders: OrderRepository) {}

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.orders.getOrder(orderId);
    if (!order) {
      throw notFound(`Order ${orderId} not found`, { orderId });
    }
    return order;
  }

  listOrdersByUser(userId: string, options?: ListOptions): Promise<Order[]> {
    return this.orders.listOrdersByUser(userId, options);
  }

  listOrdersByStatus(status: OrderStatus, options?: StatusListOptions): Promise<Order[]> {
    return this.orders.listOrdersByStatus(status, options);
  }

  /** Counts by current status; revenue counts DELIVERED orders only. */
  async getOrderStats(range: StatsRange): Promise<OrderStats> {
    const perStatus = await Promise.all(
      ORDER_STATUSES.map(status => this.orders.listOrdersByStatus(status, range))
    );

    const byStatus: OrderCountsByStatus = { PLACED: 0, IN_PREPARATION: 0, READY: 0, DELIVERED: 0, CANCELLED: 0 };
    ORDER_STATUSES.forEach((status, i) => {
      byStatus[status] = perStatus[i]?.length ?? 0;
    });

    const delivered = perStatus[ORDER_STATUSES.indexOf('DELIVERED')] ?? [];
    const revenue = delivered.reduce((sum, order) => sum + order.total, 0);

    return {
      from: range.from,
      to: range.to,
      totalOrders: perStatus.reduce((sum, orders) => sum + orders.length, 0),
      byStatus,
      revenue,
      averageOrderValue: delivered.length > 0 ? Math.round(revenue / delivered.length) : 0,
    };
  }
}
