import { describe, it, expect } from 'vitest';
import { crc32 } from '@utils/crc32';

describe('crc32', () => {
  it('matches the IEEE check value', () => {
    expect(crc32(new TextEncoder().encode('123456789'))).toBe(0xCBF43926);
  });

  it('chains across chunks', () => {
    const all = new TextEncoder().encode('123456789');
    expect(crc32(all.subarray(4), crc32(all.subarray(0, 4)))).toBe(0xCBF43926);
  });

  it('is zero for no input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });
});
