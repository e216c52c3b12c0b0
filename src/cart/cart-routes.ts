import { FastifyInstance } from 'fastify';

import { currentUserId, Guard } from '../http/guards';
import { createParser } from '../http/validation';
import type {
  AddToCartInteractor,
  ClearCartInteractor,
  RemoveFromCartInteractor,
  UpdateCartItemInteractor,
} from './cart-interactors';
import type { CartQueries } from './cart-queries';

export interface CartRouteDeps {
  queries: CartQueries;
  addItem: AddToCartInteractor;
  updateItem: UpdateCartItemInteractor;
  removeItem: RemoveFromCartInteractor;
  clear: ClearCartInteractor;
  requireUser: Guard;
}

const parseAddItem = createParser<{ productId: string; quantity?: number }>({
  type: 'object',
  properties: {
    productId: { type: 'string', minLength: 1 },
    quantity: { type: 'integer', minimum: 1, nullable: true },
  },
  required: ['productId'],
  additionalProperties: false,
});

const parseUpdateItem = createParser<{ quantity: number }>({
  type: 'object',
  properties: { quantity: { type: 'integer', minimum: 0 } },
  required: ['quantity'],
  additionalProperties: false,
});

const parseProductParams = createParser<{ productId: string }>({
  type: 'object',
  properties: { productId: { type: 'string', minLength: 1 } },
  required: ['productId'],
});

export function registerCartRoutes(app: FastifyInstance, deps: CartRouteDeps): void {
  const { queries } = deps;
  const preHandler = deps.requireUser;

  app.get('/cart', { preHandler }, async (req, reply) => {
    return reply.send(await queries.getCart(currentUserId(req)));
  });

  app.post('/cart/items', { preHandler }, async (req, reply) => {
    const userId = currentUserId(req);
    const body = parseAddItem(req.body);
    await deps.addItem.execute({ userId, productId: body.productId, quantity: body.quantity });
    return reply.status(201).send(await queries.getCart(userId));
  });

  app.patch('/cart/items/:productId', { preHandler }, async (req, reply) => {
    const userId = currentUserId(req);
    const { productId } = parseProductParams(req.params);
    const { quantity } = parseUpdateItem(req.body);
    await deps.updateItem.execute({ userId, productId, quantity });
    return reply.send(await queries.getCart(userId));
  });

  app.delete('/cart/items/:productId', { preHandler }, async (req, reply) => {
    const { productId } = parseProductParams(req.params);
    await deps.removeItem.execute({ userId: currentUserId(req), productId });
    return reply.status(204).send();
  });

  app.delete('/cart', { preHandler }, async (req, reply) => {
    await deps.clear.execute(currentUserId(req));
    return reply.status(204).send();
  });
}
