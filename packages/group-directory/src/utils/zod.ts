import { z } from 'zod/v4';
import { Redacted } from './redacted';

/**
 * Codec between a JSON text and the value described by `schema`. Decoding
 * rejects malformed JSON as a regular zod issue; encoding throws whatever
 * `JSON.stringify` throws (circular structures, bigint values).
 */
export const json = <S extends z.core.$ZodType>(schema: S) =>
  z.codec(z.string(), schema, {
    decode: (text, ctx) => {
      try {
        return JSON.parse(text);
      } catch (error) {
        ctx.issues.push({
          code: 'invalid_format',
          format: 'json',
          input: text,
          message: error instanceof Error ? error.message : 'Invalid JSON',
        });
        return z.NEVER;
      }
    },
    encode: (value) => JSON.stringify(value),
  });

export const redacted = <S extends z.core.$ZodType>(schema: S) =>
  z.codec(schema, z.instanceof(Redacted<z.output<S>>), {
    decode: (value) => new Redacted(value),
    encode: (wrapped) => wrapped.value,
  });

export const postgresUrl = (description: string) =>
  z
    .url()
    .transform((value) => new URL(value))
    .refine(
      (url) => url.protocol === 'postgresql:' || url.protocol === 'postgres:',
      'The supplied URL must be using `postgresql:` protocol',
    )
    .describe(description);
