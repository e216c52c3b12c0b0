import Ajv, { JSONSchemaType } from 'ajv';

import { ValidationError } from '../domain/errors';

const ajv = new Ajv({ allErrors: true, coerceTypes: true });

export type Parser<T> = (data: unknown) => T;

/**
 * Compile a schema once into a parser for request bodies, queries or params.
 * Query strings are coerced in place, so `?page=2` arrives as a number.
 */
export function createParser<T>(schema: JSONSchemaType<T>): Parser<T> {
  const validate = ajv.compile(schema);
  return (data) => {
    const input = data ?? {};
    if (!validate(input)) {
      throw new ValidationError(ajv.errorsText(validate.errors, { dataVar: 'request' }), {
        errors: validate.errors ?? [],
      });
    }
    return input;
  };
}

// ───── Shared schemas ─────

export interface IdParams {
  id: string;
}

export const parseIdParams = createParser<IdParams>({
  type: 'object',
  properties: { id: { type: 'string', minLength: 1 } },
  required: ['id'],
});

export interface PageQuery {
  page?: number;
  pageSize?: number;
}

export const parsePageQuery = createParser<PageQuery>({
  type: 'object',
  properties: {
    page: { type: 'integer', minimum: 1, nullable: true },
    pageSize: { type: 'integer', minimum: 1, maximum: 100, nullable: true },
  },
  required: [],
});
