import { describe, it, expect } from 'vitest';
import { assertAddress, assertHex, isAddress, toQuantity, toStorageWord } from '../validation.js';
import { TenderlyError } from '../error.js';

describe('isAddress', () => {
  it.each([
    '0x0000000000000000000000000000000000000000',
    '0xd8da6bf26964af9d7eed9e03e53415d37aa96045',
    '0xD8DA6BF26964AF9D7EED9E03E53415D37AA96045',
    '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
    // mixed case with a wrong checksum is still well-formed
    '0xa0B86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
  ])('accepts %s', (address) => {
    expect(isAddress(address)).toBe(true);
  });

  it.each([
    ['missing prefix', 'd8da6bf26964af9d7eed9e03e53415d37aa96045'],
    ['uppercase prefix', '0Xd8da6bf26964af9d7eed9e03e53415d37aa96045'],
    ['too short', '0xd8da6bf26964af9d7eed9e03e53415d37aa9604'],
    ['too long', '0xd8da6bf26964af9d7eed9e03e53415d37aa960455'],
    ['non-hex character', '0xg8da6bf26964af9d7eed9e03e53415d37aa96045'],
    ['empty', ''],
  ])('rejects %s', (_label, address) => {
    expect(isAddress(address)).toBe(false);
  });

  it('should reject non-strings', () => {
    expect(isAddress(undefined)).toBe(false);
    expect(isAddress(42)).toBe(false);
  });
});

describe('assertAddress', () => {
  it('should return the address unchanged', () => {
    const address = '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48';
    expect(assertAddress(address, 'to')).toBe(address);
  });

  it('should throw a VALIDATION error naming the field', () => {
    let caught: unknown;
    try {
      assertAddress('0x1234', 'wallet');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TenderlyError);
    expect(caught).toMatchObject({
      kind: 'VALIDATION',
      code: 'INVALID_ADDRESS',
      status: 0,
      message: '"wallet" must be a 0x-prefixed 20-byte hex address',
    });
  });
});

describe('assertHex', () => {
  it('should accept empty calldata', () => {
    expect(assertHex('0x', 'input')).toBe('0x');
  });

  it('should reject strings without prefix', () => {
    expect(() => assertHex('abcd', 'input')).toThrow('"input" must be a 0x-prefixed hex string');
  });
});

describe('toQuantity', () => {
  it('should encode numbers and bigints as minimal hex', () => {
    expect(toQuantity(0)).toBe('0x0');
    expect(toQuantity(3600)).toBe('0xe10');
    expect(toQuantity(1_000_000_000_000_000_000n)).toBe('0xde0b6b3a7640000');
  });

  it('should accept decimal and hex strings', () => {
    expect(toQuantity('255')).toBe('0xff');
    expect(toQuantity('0x00ff')).toBe('0xff');
  });

  it('should reject negative, fractional and malformed values', () => {
    expect(() => toQuantity(-1)).toThrow(TenderlyError);
    expect(() => toQuantity(-1n)).toThrow(TenderlyError);
    expect(() => toQuantity(1.5)).toThrow(TenderlyError);
    expect(() => toQuantity('1.5')).toThrow(TenderlyError);
    expect(() => toQuantity('0x')).toThrow(TenderlyError);
  });
});

describe('toStorageWord', () => {
  it('should left-pad to 32 bytes', () => {
    expect(toStorageWord('0x1', 'slot')).toBe(`0x${'0'.repeat(63)}1`);
  });

  it('should reject values wider than 32 bytes', () => {
    expect(() => toStorageWord(`0x${'f'.repeat(65)}`, 'value')).toThrow('"value" must fit in 32 bytes');
  });
});
