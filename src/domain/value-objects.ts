import { ValidationError } from './errors';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PASSWORD_SPECIALS = '!@#$%^&*()_+-=[]{}|;:,.<>?';

// ───── Email ─────────────────────────────────────────────────

export class Email {
  private constructor(readonly value: string) {}

  static parse(raw: string): Email {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.length > 254 || !EMAIL_PATTERN.test(trimmed)) {
      throw new ValidationError(`Invalid email format: ${raw}`);
    }
    return new Email(trimmed.toLowerCase());
  }

  toString(): string {
    return this.value;
  }
}

// ───── Password ──────────────────────────────────────────────

export class Password {
  private constructor(readonly value: string) {}

  /** At least 8 characters with upper, lower, digit and special */
  static parse(raw: string): Password {
    const strong =
      raw.length >= 8 &&
      /[A-Z]/.test(raw) &&
      /[a-z]/.test(raw) &&
      /[0-9]/.test(raw) &&
      [...raw].some((c) => PASSWORD_SPECIALS.includes(c));

    if (!strong) {
      throw new ValidationError(
        'Password must be at least 8 characters long and contain uppercase, lowercase, digit, and special character',
      );
    }
    return new Password(raw);
  }

  toString(): string {
    return '***';
  }
}

// ───── Money ─────────────────────────────────────────────────

/**
 * Non-negative amount held as integer cents.
 */
export class Money {
  private constructor(
    readonly cents: number,
    readonly currency: string,
  ) {}

  static fromCents(cents: number, currency = 'USD'): Money {
    if (!Number.isInteger(cents) || cents < 0) {
      throw new ValidationError(`Invalid money value: ${cents / 100}`);
    }
    return new Money(cents, currency);
  }

  /** Rounds to the nearest cent */
  static fromAmount(amount: number, currency = 'USD'): Money {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError(`Invalid money value: ${amount}`);
    }
    return new Money(Math.round(amount * 100), currency);
  }

  static zero(currency = 'USD'): Money {
    return new Money(0, currency);
  }

  add(other: Money): Money {
    if (this.currency !== other.currency) {
      throw new ValidationError('Cannot add different currencies');
    }
    return new Money(this.cents + other.cents, this.currency);
  }

  multiply(quantity: number): Money {
    return Money.fromCents(this.cents * quantity, this.currency);
  }

  get amount(): number {
    return this.cents / 100;
  }

  toString(): string {
    return `${(this.cents / 100).toFixed(2)} ${this.currency}`;
  }
}

// ───── Pagination ────────────────────────────────────────────

export const MAX_PAGE_SIZE = 100;

export class Pagination {
  private constructor(
    readonly page: number,
    readonly pageSize: number,
  ) {}

  static of(page: number, pageSize: number): Pagination {
    if (!Number.isInteger(page) || page < 1) throw new ValidationError('Page must be >= 1');
    if (!Number.isInteger(pageSize) || pageSize < 1) throw new ValidationError('Page size must be >= 1');
    if (pageSize > MAX_PAGE_SIZE) throw new ValidationError(`Page size must be <= ${MAX_PAGE_SIZE}`);
    return new Pagination(page, pageSize);
  }

  get offset(): number {
    return (this.page - 1) * this.pageSize;
  }

  get limit(): number {
    return this.pageSize;
  }

  totalPages(total: number): number {
    return Math.ceil(total / this.pageSize);
  }
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export function paginate<T>(items: T[], total: number, pagination: Pagination): PaginatedResult<T> {
  return {
    items,
    total,
    page: pagination.page,
    pageSize: pagination.pageSize,
    totalPages: pagination.totalPages(total),
  };
}
