/**
 * Inline pre-validation for SDK method parameters.
 *
 * Catches malformed addresses and hex values before a request is built, so
 * the caller gets a VALIDATION error without a network round trip.
 * Addresses are checked for format only (0x + 40 hex chars); checksum casing
 * is left to the service.
 */

import { isAddress as isHexAddress, isHex, pad, toHex, type Address, type Hex } from 'viem';
import { TenderlyError } from './error.js';

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && isHexAddress(value, { strict: false });
}

/**
 * @throws TenderlyError with code INVALID_ADDRESS if `value` is not an address
 */
export function assertAddress(value: unknown, field: string): Address {
  if (!isAddress(value)) {
    throw TenderlyError.validation(
      `"${field}" must be a 0x-prefixed 20-byte hex address`,
      'INVALID_ADDRESS',
    );
  }
  return value;
}

export function assertHex(value: unknown, field: string): Hex {
  if (typeof value !== 'string' || !isHex(value, { strict: true })) {
    throw TenderlyError.validation(`"${field}" must be a 0x-prefixed hex string`);
  }
  return value;
}

export function assertNonEmpty(ids: readonly string[], field: string): void {
  if (ids.length === 0) {
    throw TenderlyError.validation(`"${field}" must contain at least one id`);
  }
  if (ids.some((id) => id.length === 0)) {
    throw TenderlyError.validation(`"${field}" must not contain empty ids`);
  }
}

export type Quantity = bigint | number | string;

/**
 * Encode a quantity (wei, seconds, block count) as a minimal hex string.
 * Strings may be decimal or already 0x-prefixed.
 */
export function toQuantity(value: Quantity, field = 'value'): Hex {
  if (typeof value === 'string') {
    if (isHex(value, { strict: true }) && value.length > 2) return toHex(BigInt(value));
    if (!/^\d+$/.test(value)) {
      throw TenderlyError.validation(`"${field}" must be a decimal or hex integer string`);
    }
    return toHex(BigInt(value));
  }
  if (typeof value === 'number' && (!Number.isSafeInteger(value) || value < 0)) {
    throw TenderlyError.validation(`"${field}" must be a non-negative safe integer`);
  }
  if (value < 0) {
    throw TenderlyError.validation(`"${field}" must not be negative`);
  }
  return toHex(value);
}

/** Left-pad a slot or storage value to a 32-byte word. */
export function toStorageWord(value: string, field: string): Hex {
  const hex = assertHex(value, field);
  if (hex.length - 2 > 64) {
    throw TenderlyError.validation(`"${field}" must fit in 32 bytes`);
  }
  return pad(hex, { size: 32 });
}
