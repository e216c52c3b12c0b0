/**
 * Cart Interactors
 *
 * Stock is not reserved here; it is checked and taken only when an order
 * is placed from the cart.
 */

import { v4 as uuidv4 } from 'uuid';

import type { UnitOfWork, UnitOfWorkScope } from '../database/unit-of-work';
import { NotFoundError, ValidationError } from '../domain/errors';
import { logger } from '../observability/logger';
import type { AddToCartInput, Cart, RemoveFromCartInput, UpdateCartItemInput } from './types';

const log = logger.child({ component: 'cart' });

async function getOrCreateCart(scope: UnitOfWorkScope, userId: string): Promise<Cart> {
  const existing = await scope.carts.findByUserId(userId);
  if (existing) return existing;

  const now = new Date().toISOString();
  log.info({ userId }, 'New cart created');
  return { id: uuidv4(), userId, items: [], createdAt: now, updatedAt: now };
}

function assertQuantity(quantity: number, min: number): void {
  if (!Number.isInteger(quantity) || quantity < min) {
    throw new ValidationError(`Quantity must be an integer >= ${min}`);
  }
}

export class AddToCartInteractor {
  constructor(private readonly uow: UnitOfWork) {}

  async execute(input: AddToCartInput): Promise<Cart> {
    const quantity = input.quantity ?? 1;
    assertQuantity(quantity, 1);

    return this.uow.run(async (scope) => {
      if (!(await scope.products.findById(input.productId))) {
        throw new NotFoundError('product', input.productId);
      }

      const cart = await getOrCreateCart(scope, input.userId);
      const existing = cart.items.find((i) => i.productId === input.productId);
      if (existing) {
        existing.quantity += quantity;
      } else {
        cart.items.push({ id: uuidv4(), productId: input.productId, quantity });
      }
      cart.updatedAt = new Date().toISOString();

      await scope.carts.save(cart);
      await scope.commit();

      log.info(
        { userId: input.userId, productId: input.productId, quantity: existing?.quantity ?? quantity },
        existing ? 'Cart item quantity updated' : 'Item added to cart',
      );
      return cart;
    });
  }
}

export class UpdateCartItemInteractor {
  constructor(private readonly uow: UnitOfWork) {}

  /** A quantity of 0 removes the line */
  async execute(input: UpdateCartItemInput): Promise<Cart> {
    assertQuantity(input.quantity, 0);

    return this.uow.run(async (scope) => {
      const cart = await scope.carts.findByUserId(input.userId);
      const item = cart?.items.find((i) => i.productId === input.productId);
      if (!cart || !item) {
        throw new NotFoundError('cart_item', input.productId);
      }

      if (input.quantity === 0) {
        cart.items = cart.items.filter((i) => i !== item);
      } else {
        item.quantity = input.quantity;
      }
      cart.updatedAt = new Date().toISOString();

      await scope.carts.save(cart);
      await scope.commit();
      return cart;
    });
  }
}

export class RemoveFromCartInteractor {
  constructor(private readonly uow: UnitOfWork) {}

  /** Removing a product that is not in the cart is a no-op */
  async execute(input: RemoveFromCartInput): Promise<void> {
    await this.uow.run(async (scope) => {
      const cart = await scope.carts.findByUserId(input.userId);
      if (!cart || !cart.items.some((i) => i.productId === input.productId)) return;

      cart.items = cart.items.filter((i) => i.productId !== input.productId);
      cart.updatedAt = new Date().toISOString();
      await scope.carts.save(cart);
      await scope.commit();

      log.info({ userId: input.userId, productId: input.productId }, 'Item removed from cart');
    });
  }
}

export class ClearCartInteractor {
  constructor(private readonly uow: UnitOfWork) {}

  async execute(userId: string): Promise<void> {
    await this.uow.run(async (scope) => {
      const cart = await scope.carts.findByUserId(userId);
      if (!cart) return;

      await scope.carts.save({ ...cart, items: [], updatedAt: new Date().toISOString() });
      await scope.commit();
      log.info({ userId }, 'Cart cleared');
    });
  }
}
