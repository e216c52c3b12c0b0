/**
 * Unit of Work
 *
 * Opens one database transaction and hands out repositories bound to it.
 * Work is kept only on an explicit commit(); every other way out of a scope
 * (a thrown error, or returning without committing) rolls the transaction back.
 */

import type { ControlledTransaction } from 'kysely';

import { CartRepository } from '../cart/cart-repository';
import { CategoryRepository } from '../catalog/category-repository';
import { ProductRepository } from '../catalog/product-repository';
import { logger } from '../observability/logger';
import { OrderRepository } from '../orders/order-repository';
import { PasswordResetTokenRepository, UserRepository } from '../users/user-repository';
import type { Database, DatabaseSchema } from './schema';

const log = logger.child({ component: 'unit-of-work' });

export type AfterCommitHook = () => void | Promise<void>;

export interface UnitOfWorkScope {
  readonly users: UserRepository;
  readonly resetTokens: PasswordResetTokenRepository;
  readonly categories: CategoryRepository;
  readonly products: ProductRepository;
  readonly carts: CartRepository;
  readonly orders: OrderRepository;
  readonly isActive: boolean;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Run once the transaction has committed; dropped on rollback */
  afterCommit(hook: AfterCommitHook): void;
}

export interface UnitOfWork {
  begin(): Promise<UnitOfWorkScope>;
  run<T>(work: (scope: UnitOfWorkScope) => Promise<T>): Promise<T>;
}

class KyselyUnitOfWorkScope implements UnitOfWorkScope {
  readonly users: UserRepository;
  readonly resetTokens: PasswordResetTokenRepository;
  readonly categories: CategoryRepository;
  readonly products: ProductRepository;
  readonly carts: CartRepository;
  readonly orders: OrderRepository;

  private state: 'active' | 'committed' | 'rolled_back' = 'active';
  private hooks: AfterCommitHook[] = [];

  constructor(private readonly trx: ControlledTransaction<DatabaseSchema>) {
    this.users = new UserRepository(trx);
    this.resetTokens = new PasswordResetTokenRepository(trx);
    this.categories = new CategoryRepository(trx);
    this.products = new ProductRepository(trx);
    this.carts = new CartRepository(trx);
    this.orders = new OrderRepository(trx);
  }

  get isActive(): boolean {
    return this.state === 'active';
  }

  async commit(): Promise<void> {
    this.assertActive('commit');
    try {
      await this.trx.commit().execute();
    } catch (err) {
      this.state = 'rolled_back';
      this.hooks = [];
      throw err;
    }
    this.state = 'committed';
    log.debug('Transaction committed');

    const hooks = this.hooks;
    this.hooks = [];
    for (const hook of hooks) {
      try {
        await hook();
      } catch (err) {
        log.warn({ err }, 'After-commit hook failed');
      }
    }
  }

  async rollback(): Promise<void> {
    this.assertActive('rollback');
    this.state = 'rolled_back';
    this.hooks = [];
    await this.trx.rollback().execute();
    log.debug('Transaction rolled back');
  }

  afterCommit(hook: AfterCommitHook): void {
    this.assertActive('register an after-commit hook on');
    this.hooks.push(hook);
  }

  private assertActive(action: string): void {
    if (this.state !== 'active') {
      throw new Error(`Cannot ${action} a unit of work that is already ${this.state.replace('_', ' ')}`);
    }
  }
}

export class KyselyUnitOfWork implements UnitOfWork {
  constructor(private readonly db: Database) {}

  async begin(): Promise<UnitOfWorkScope> {
    const trx = await this.db.startTransaction().execute();
    return new KyselyUnitOfWorkScope(trx);
  }

  async run<T>(work: (scope: UnitOfWorkScope) => Promise<T>): Promise<T> {
    const scope = await this.begin();
    let result: T;
    try {
      result = await work(scope);
    } catch (err) {
      if (scope.isActive) {
        try {
          await scope.rollback();
        } catch (rollbackErr) {
          log.error({ err: rollbackErr }, 'Rollback failed');
        }
      }
      throw err;
    }
    if (scope.isActive) {
      await scope.rollback();
    }
    return result;
  }
}
