import { InvalidOrderTransitionError } from '../domain/errors';
import { logger } from '../observability/logger';
import { ORDER_STATUSES, ORDER_TRANSITIONS, OrderStatus, OrderTransitionEvent } from './types';

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some((s) => s === value);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/**
 * Validate an order status change. Throws on anything the transition table
 * does not allow, including staying in the same status.
 */
export function transitionOrder(orderId: string, from: OrderStatus, to: OrderStatus): OrderTransitionEvent {
  if (!canTransition(from, to)) {
    logger.warn({ orderId, from, to }, 'Invalid order transition attempted');
    throw new InvalidOrderTransitionError(from, to);
  }

  const event: OrderTransitionEvent = { orderId, from, to, timestamp: Date.now() };
  logger.debug(event, 'Order transition validated');
  return event;
}
