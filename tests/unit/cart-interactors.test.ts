import {
  AddToCartInteractor,
  ClearCartInteractor,
  RemoveFromCartInteractor,
  UpdateCartItemInteractor,
} from '../../src/cart/cart-interactors';
import { CartQueries } from '../../src/cart/cart-queries';
import type { Database } from '../../src/database/schema';
import { KyselyUnitOfWork } from '../../src/database/unit-of-work';
import { NotFoundError, ValidationError } from '../../src/domain/errors';
import { createTestDatabase, insertCategory, insertProduct, insertUser, readCartLines } from '../helpers/test-db';

describe('cart interactors', () => {
  let db: Database;
  let addItem: AddToCartInteractor;
  let updateItem: UpdateCartItemInteractor;
  let removeItem: RemoveFromCartInteractor;
  let clearCart: ClearCartInteractor;
  let queries: CartQueries;

  beforeEach(async () => {
    db = await createTestDatabase();
    const uow = new KyselyUnitOfWork(db);
    addItem = new AddToCartInteractor(uow);
    updateItem = new UpdateCartItemInteractor(uow);
    removeItem = new RemoveFromCartInteractor(uow);
    clearCart = new ClearCartInteractor(uow);
    queries = new CartQueries(db, 'USD');

    await insertUser(db, 'alice');
    await insertCategory(db, 'cat-1');
    await insertProduct(db, { id: 'prod-a', name: 'Kettle', categoryId: 'cat-1', priceCents: 4550, stock: 1 });
    await insertProduct(db, { id: 'prod-b', name: 'Apron', categoryId: 'cat-1', priceCents: 1999, stock: 10 });
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('AddToCartInteractor', () => {
    it('should create the cart on first use with a default quantity of 1', async () => {
      const cart = await addItem.execute({ userId: 'alice', productId: 'prod-a' });
      expect(cart.userId).toBe('alice');
      expect(cart.items.map((i) => [i.productId, i.quantity])).toEqual([['prod-a', 1]]);
      expect(await readCartLines(db, 'alice')).toEqual([['prod-a', 1]]);
    });

    it('should add to the quantity of an existing line', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 2 });
      await addItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 3 });
      expect(await readCartLines(db, 'alice')).toEqual([['prod-b', 5]]);
    });

    it('should not check stock when adding', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a', quantity: 4 });
      expect(await readCartLines(db, 'alice')).toEqual([['prod-a', 4]]);
    });

    it('should reject an unknown product', async () => {
      await expect(addItem.execute({ userId: 'alice', productId: 'nope' })).rejects.toThrow(NotFoundError);
      expect(await readCartLines(db, 'alice')).toEqual([]);
    });

    it.each([0, -1, 1.5])('should reject a quantity of %p', async (quantity) => {
      await expect(addItem.execute({ userId: 'alice', productId: 'prod-a', quantity })).rejects.toThrow(
        ValidationError,
      );
    });
  });

  describe('UpdateCartItemInteractor', () => {
    it('should set the quantity of a line', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 2 });
      await updateItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 7 });
      expect(await readCartLines(db, 'alice')).toEqual([['prod-b', 7]]);
    });

    it('should remove the line when the quantity is 0', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a' });
      await addItem.execute({ userId: 'alice', productId: 'prod-b' });
      await updateItem.execute({ userId: 'alice', productId: 'prod-a', quantity: 0 });
      expect(await readCartLines(db, 'alice')).toEqual([['prod-b', 1]]);
    });

    it('should report a product that is not in the cart', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a' });
      await expect(updateItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 1 })).rejects.toThrow(
        'cart item not found: prod-b',
      );
    });

    it('should report a missing cart', async () => {
      await expect(updateItem.execute({ userId: 'alice', productId: 'prod-a', quantity: 1 })).rejects.toThrow(
        NotFoundError,
      );
    });
  });

  describe('RemoveFromCartInteractor', () => {
    it('should remove the line', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a' });
      await removeItem.execute({ userId: 'alice', productId: 'prod-a' });
      expect(await readCartLines(db, 'alice')).toEqual([]);
    });

    it('should do nothing for a product that is not in the cart', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a' });
      await removeItem.execute({ userId: 'alice', productId: 'prod-b' });
      await removeItem.execute({ userId: 'nobody', productId: 'prod-b' });
      expect(await readCartLines(db, 'alice')).toEqual([['prod-a', 1]]);
    });
  });

  describe('ClearCartInteractor', () => {
    it('should remove every line', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a' });
      await addItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 3 });
      await clearCart.execute('alice');
      expect(await readCartLines(db, 'alice')).toEqual([]);
    });
  });

  describe('CartQueries.getCart', () => {
    it('should return an empty cart for a user without one', async () => {
      expect(await queries.getCart('alice')).toEqual({
        id: null,
        userId: 'alice',
        items: [],
        totalItems: 0,
        totalAmount: 0,
        currency: 'USD',
      });
    });

    it('should price each line and total the cart', async () => {
      await addItem.execute({ userId: 'alice', productId: 'prod-a', quantity: 2 });
      await addItem.execute({ userId: 'alice', productId: 'prod-b', quantity: 3 });

      const cart = await queries.getCart('alice');

      expect(cart.totalItems).toBe(5);
      expect(cart.totalAmount).toBe(150.97);
      expect(cart.items.map((i) => ({ name: i.productName, unit: i.unitPrice, line: i.lineTotal }))).toEqual([
        { name: 'Apron', unit: 19.99, line: 59.97 },
        { name: 'Kettle', unit: 45.5, line: 91 },
      ]);
    });
  });
});
