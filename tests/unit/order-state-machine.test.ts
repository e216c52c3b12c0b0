import { InvalidOrderTransitionError } from '../../src/domain/errors';
import { canTransition, isOrderStatus, transitionOrder } from '../../src/orders/order-state-machine';

describe('order state machine', () => {
  describe('transitionOrder', () => {
    it('should allow created -> paid', () => {
      const event = transitionOrder('order-1', 'created', 'paid');
      expect(event.orderId).toBe('order-1');
      expect(event.from).toBe('created');
      expect(event.to).toBe('paid');
    });

    it('should allow paid -> shipped -> delivered', () => {
      expect(transitionOrder('order-1', 'paid', 'shipped').to).toBe('shipped');
      expect(transitionOrder('order-1', 'shipped', 'delivered').to).toBe('delivered');
    });

    it('should allow cancelling a created or paid order', () => {
      expect(transitionOrder('order-1', 'created', 'cancelled').to).toBe('cancelled');
      expect(transitionOrder('order-1', 'paid', 'cancelled').to).toBe('cancelled');
    });

    it('should reject created -> shipped (skips payment)', () => {
      expect(() => transitionOrder('order-1', 'created', 'shipped')).toThrow(InvalidOrderTransitionError);
    });

    it('should reject cancelling a shipped order', () => {
      expect(() => transitionOrder('order-1', 'shipped', 'cancelled')).toThrow('Cannot move order from shipped to cancelled');
    });

    it('should reject staying in the same status', () => {
      expect(() => transitionOrder('order-1', 'paid', 'paid')).toThrow(InvalidOrderTransitionError);
    });

    it('should treat delivered and cancelled as final', () => {
      expect(canTransition('delivered', 'cancelled')).toBe(false);
      expect(canTransition('cancelled', 'created')).toBe(false);
      expect(canTransition('cancelled', 'paid')).toBe(false);
    });
  });

  describe('isOrderStatus', () => {
    it('should recognise known statuses only', () => {
      expect(isOrderStatus('shipped')).toBe(true);
      expect(isOrderStatus('refunded')).toBe(false);
      expect(isOrderStatus('')).toBe(false);
    });
  });
});
