/**
 * Domain Errors
 *
 * Every failure the API reports on purpose derives from DomainError and
 * carries a machine code plus the HTTP status it maps to at the boundary.
 */

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends DomainError {
  readonly code = 'validation_error';
  readonly statusCode = 400;
}

export class EmptyCartError extends DomainError {
  readonly code = 'empty_cart';
  readonly statusCode = 400;

  constructor() {
    super('Cart is empty');
  }
}

export class InvalidCredentialsError extends DomainError {
  readonly code = 'invalid_credentials';
  readonly statusCode = 401;

  constructor() {
    super('Invalid credentials');
  }
}

export class InvalidTokenError extends DomainError {
  readonly code = 'invalid_token';
  readonly statusCode = 401;

  constructor() {
    super('Invalid token');
  }
}

export class ExpiredTokenError extends DomainError {
  readonly code = 'expired_token';
  readonly statusCode = 401;

  constructor() {
    super('Token has expired');
  }
}

export class ForbiddenError extends DomainError {
  readonly code = 'forbidden';
  readonly statusCode = 403;

  constructor() {
    super('Forbidden');
  }
}

export type EntityKind = 'user' | 'product' | 'category' | 'order' | 'cart_item';

export class NotFoundError extends DomainError {
  readonly code = 'not_found';
  readonly statusCode = 404;

  constructor(readonly entity: EntityKind, readonly identifier: string) {
    super(`${entity.replace('_', ' ')} not found: ${identifier}`, { entity, identifier });
  }
}

export class ConflictError extends DomainError {
  readonly code = 'conflict';
  readonly statusCode = 409;
}

export class InsufficientStockError extends DomainError {
  readonly code = 'insufficient_stock';
  readonly statusCode = 409;

  constructor(
    readonly productId: string,
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      `Insufficient stock for product ${productId}: requested ${requested}, available ${available}`,
      { productId, requested, available },
    );
  }
}

export class InvalidOrderTransitionError extends DomainError {
  readonly code = 'invalid_transition';
  readonly statusCode = 409;

  constructor(readonly from: string, readonly to: string) {
    super(`Cannot move order from ${from} to ${to}`, { from, to });
  }
}

export class TooManyRequestsError extends DomainError {
  readonly code = 'rate_limited';
  readonly statusCode = 429;

  constructor(readonly retryAfterMs: number) {
    super('Too many attempts, try again later', { retryAfterMs });
  }
}
