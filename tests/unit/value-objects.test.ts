import { ValidationError } from '../../src/domain/errors';
import { Email, Money, Pagination, paginate, Password } from '../../src/domain/value-objects';

describe('Email', () => {
  it('should trim and lower-case the address', () => {
    expect(Email.parse('  Jane.Doe@Example.COM ').value).toBe('jane.doe@example.com');
  });

  it('should reject malformed addresses', () => {
    expect(() => Email.parse('not-an-email')).toThrow(ValidationError);
    expect(() => Email.parse('a@b')).toThrow(ValidationError);
    expect(() => Email.parse('   ')).toThrow(ValidationError);
  });

  it('should reject addresses longer than 254 characters', () => {
    const local = 'a'.repeat(250);
    expect(() => Email.parse(`${local}@example.com`)).toThrow(ValidationError);
  });
});

describe('Password', () => {
  it('should accept a password with upper, lower, digit and special characters', () => {
    expect(Password.parse('Str0ng!pass').value).toBe('Str0ng!pass');
  });

  it.each(['Sh0rt!', 'alllower1!', 'ALLUPPER1!', 'NoDigits!!', 'NoSpecial12'])('should reject %s', (raw) => {
    expect(() => Password.parse(raw)).toThrow(ValidationError);
  });

  it('should not reveal the password when stringified', () => {
    expect(String(Password.parse('Str0ng!pass'))).toBe('***');
  });
});

describe('Money', () => {
  it('should round amounts to whole cents', () => {
    expect(Money.fromAmount(12.5).cents).toBe(1250);
    expect(Money.fromAmount(0.1 + 0.2).cents).toBe(30);
    expect(Money.fromAmount(19.999).cents).toBe(2000);
  });

  it('should add and multiply without drift', () => {
    const total = Money.fromAmount(0.1).multiply(3).add(Money.fromAmount(0.2));
    expect(total.cents).toBe(50);
    expect(total.amount).toBe(0.5);
  });

  it('should render with two decimals and the currency', () => {
    expect(Money.fromCents(1250, 'EUR').toString()).toBe('12.50 EUR');
    expect(Money.zero().toString()).toBe('0.00 USD');
  });

  it('should refuse to add different currencies', () => {
    expect(() => Money.fromCents(100, 'USD').add(Money.fromCents(100, 'EUR'))).toThrow(
      'Cannot add different currencies',
    );
  });

  it('should reject negative and fractional-cent values', () => {
    expect(() => Money.fromAmount(-1)).toThrow(ValidationError);
    expect(() => Money.fromCents(-5)).toThrow(ValidationError);
    expect(() => Money.fromCents(10.5)).toThrow(ValidationError);
    expect(() => Money.fromAmount(Number.NaN)).toThrow(ValidationError);
  });
});

describe('Pagination', () => {
  it('should compute offset and limit', () => {
    const p = Pagination.of(3, 20);
    expect(p.offset).toBe(40);
    expect(p.limit).toBe(20);
  });

  it('should round total pages up', () => {
    expect(Pagination.of(1, 20).totalPages(41)).toBe(3);
    expect(Pagination.of(1, 20).totalPages(40)).toBe(2);
  });

  it('should reject out-of-range values', () => {
    expect(() => Pagination.of(0, 10)).toThrow('Page must be >= 1');
    expect(() => Pagination.of(1, 0)).toThrow('Page size must be >= 1');
    expect(() => Pagination.of(1, 101)).toThrow('Page size must be <= 100');
  });

  it('should build an empty page for no results', () => {
    expect(paginate([], 0, Pagination.of(1, 10))).toEqual({
      items: [],
      total: 0,
      page: 1,
      pageSize: 10,
      totalPages: 0,
    });
  });
});
