import { z } from 'zod';
import { isHex, type Hex } from 'viem';

export type OpenEnum<T extends readonly string[]> = T[number] | 'unknown';

function isMember<T extends readonly string[]>(values: T, value: string): value is T[number] {
  const known: readonly string[] = values;
  return known.includes(value);
}

/**
 * Decode a string into one of `values`, or 'unknown' when the service sends
 * a variant this SDK does not list yet.
 */
export function openEnum<T extends readonly [string, ...string[]]>(values: T) {
  return z.string().transform((value): OpenEnum<T> => (isMember(values, value) ? value : 'unknown'));
}

export const HexSchema = z.custom<Hex>(
  (value) => typeof value === 'string' && isHex(value, { strict: true }),
  { message: 'Expected a 0x-prefixed hex string' },
);

/** Free-form JSON object the SDK passes through untouched. */
export const JsonObjectSchema = z.record(z.unknown());
export type JsonObject = z.infer<typeof JsonObjectSchema>;

export interface PageParams {
  page?: number;
  perPage?: number;
}
