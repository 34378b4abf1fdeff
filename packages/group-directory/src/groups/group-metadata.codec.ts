import { z } from 'zod/v4';
import { json } from '../utils/zod';
import { SerializationError } from './groups.errors';
import type { GroupMetadata } from './groups.types';

const StringRecordSchema = z.record(z.string(), z.string());

/**
 * Checked as a record of strings, then passed through as the same object. Zod
 * rebuilds record output by assignment, which loses an own `__proto__` key.
 */
export const GroupMetadataSchema = z.custom<GroupMetadata>(
  (value) => StringRecordSchema.safeParse(value).success,
  { message: 'Expected an object with string values' },
);

export const groupMetadataCodec = json(GroupMetadataSchema);

/**
 * Encoding a flat string-to-string mapping always succeeds. Anything else a
 * caller sneaks past the type system (non-string values, cycles) surfaces as a
 * `SerializationError`.
 */
export function encodeGroupMetadata(metadata: GroupMetadata): string {
  try {
    return z.encode(groupMetadataCodec, metadata);
  } catch (error) {
    throw new SerializationError('Group metadata could not be encoded', error);
  }
}

export function decodeGroupMetadata(encoded: string): GroupMetadata {
  const result = z.safeDecode(groupMetadataCodec, encoded);
  if (!result.success) {
    throw new SerializationError(
      `Stored group metadata could not be decoded: ${z.prettifyError(result.error)}`,
      result.error,
    );
  }
  return result.data;
}
