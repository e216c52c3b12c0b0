import type { Money } from '../domain/value-objects';

export type OrderStatus = 'created' | 'paid' | 'shipped' | 'delivered' | 'cancelled';

export const ORDER_STATUSES: readonly OrderStatus[] = ['created', 'paid', 'shipped', 'delivered', 'cancelled'];

/** Allowed next statuses for each status */
export const ORDER_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  created: ['paid', 'cancelled'],
  paid: ['shipped', 'cancelled'],
  shipped: ['delivered'],
  delivered: [],
  cancelled: [],
};

export interface OrderItem {
  id: string;
  productId: string;
  quantity: number;
  /** Price captured when the order was placed */
  unitPrice: Money;
}

export interface Order {
  id: string;
  userId: string;
  status: OrderStatus;
  items: OrderItem[];
  total: Money;
  createdAt: string;
  updatedAt: string;
}

export interface OrderTransitionEvent {
  orderId: string;
  from: OrderStatus;
  to: OrderStatus;
  timestamp: number;
}

export interface PlaceOrderInput {
  userId: string;
}

export interface PlacedOrder {
  orderId: string;
  total: Money;
  itemCount: number;
}

/** Who is asking for a status change: the order's owner, or an administrator */
export type OrderActor = { kind: 'user'; userId: string } | { kind: 'admin' };

// ───── Read Models ─────

export interface OrderItemReadModel {
  id: string;
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface OrderReadModel {
  id: string;
  userId: string;
  status: OrderStatus;
  items: OrderItemReadModel[];
  totalAmount: number;
  currency: string;
  createdAt: string;
  updatedAt: string;
}
