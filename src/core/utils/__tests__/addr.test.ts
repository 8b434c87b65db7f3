import { describe, it, expect } from 'vitest';
import { isAddress, isAddressEq } from '../addr';
import { isHash66 } from '../hash';

// Helpers
const aChecksummed = '0x36615Cf349d7F6344891B1e7CA7C72883F5dc049';
const aLower = aChecksummed.toLowerCase();
const bChecksummed = '0x52908400098527886E0F7030069857D2E4169EE7';
const bLower = bChecksummed.toLowerCase();

describe('utils/addr.isHash66', () => {
  it('returns true for 0x-prefixed 32-byte (66-char) strings', () => {
    expect(isHash66('0x' + 'a'.repeat(64))).toBe(true);
    expect(isHash66('0x' + 'A'.repeat(64))).toBe(true);
  });

  it('returns false for non-66 length or missing 0x', () => {
    expect(isHash66(undefined)).toBe(false);
    expect(isHash66('')).toBe(false);
    expect(isHash66('0x' + 'a'.repeat(63))).toBe(false);
    expect(isHash66('0x' + 'a'.repeat(65))).toBe(false);
    expect(isHash66('a'.repeat(64))).toBe(false); // no 0x
  });
});

describe('utils/addr.isAddress', () => {
  it('accepts 20-byte hex in any case', () => {
    expect(isAddress(aChecksummed)).toBe(true);
    expect(isAddress(aLower)).toBe(true);
  });

  it('rejects other lengths and non-strings', () => {
    expect(isAddress('0x' + '11'.repeat(19))).toBe(false);
    expect(isAddress('0x' + '11'.repeat(32))).toBe(false);
    expect(isAddress(42)).toBe(false);
  });
});

describe('utils/addr.isAddressEq', () => {
  it('treats casing as equal', () => {
    expect(isAddressEq(aChecksummed, `0x${aLower.slice(2)}`)).toBe(true);
    expect(isAddressEq(bChecksummed, `0x${bLower.slice(2)}`)).toBe(true);
  });

  it('different addresses are not equal', () => {
    expect(isAddressEq(aChecksummed, bChecksummed)).toBe(false);
  });
});
