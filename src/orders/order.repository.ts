import { Injectable } from '@nestjs/common';
import { Order, OrderState } from './order.types';

export const ORDER_REPOSITORY = Symbol('ORDER_REPOSITORY');

export interface OrderListFilter {
  merchantId?: string;
  state?: OrderState;
  limit?: number;
}

export interface OrderRepository {
  findById(orderId: string): Promise<Order | null>;
  save(order: Order): Promise<Order>;
  list(filter?: OrderListFilter): Promise<Order[]>;
}

/** Process-local order store. Callers serialize writes per order. */
@Injectable()
export class InMemoryOrderRepository implements OrderRepository {
  private readonly orders = new Map<string, Order>();

  async findById(orderId: string) {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  async save(order: Order) {
    this.orders.set(order.orderId, structuredClone(order));
    return order;
  }

  async list(filter: OrderListFilter = {}) {
    const limit = filter.limit ?? 100;
    return [...this.orders.values()]
      .filter((order) => !filter.merchantId || order.merchantId === filter.merchantId)
      .filter((order) => !filter.state || order.state === filter.state)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .slice(0, limit)
      .map((order) => structuredClone(order));
  }
}
