import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

const schemaOf = (validate: (value: unknown) => unknown): StandardSchemaV1<unknown, string> => ({
  '~standard': {
    version: 1,
    vendor: 'test',
    validate: (value) => {
      const result = validate(value);
      return result as StandardSchemaV1.Result<string>;
    },
  },
});

describe('validator', () => {
  it('returns the parsed value for a matching zod schema', async () => {
    const schema = z.object({ name: z.string(), version: z.string() });
    const [err, parsed] = await validator({ name: 'secret-name', version: 'v1', extra: true }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ name: 'secret-name', version: 'v1' });
  });

  it('returns a ValidationError with issues when the shape does not match', async () => {
    const schema = z.object({ name: z.string() });
    const [err, parsed] = await validator({ name: 42 }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.issues[0]?.path).toEqual(['name']);
  });

  it('returns error when sync validation throws', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => {
        throw new Error('oops');
      }),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when async validation rejects', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => Promise.reject(new Error('oops'))),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating async data');
  });

  it('returns error when validation yields a non-object', async () => {
    const [err, value] = await validator('test', schemaOf(() => null));

    expect(value).toBeNull();
    expect(err?.message).toBe('error validation result of wrong type');
  });

  it('resolves async validation results', async () => {
    const [err, value] = await validator(
      'test',
      schemaOf((input) => Promise.resolve({ value: input })),
    );

    expect(err).toBeNull();
    expect(value).toBe('test');
  });
});
