import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { RegisterFile, STACK_DEPTH } from '@core/cpu/registers';
import { EmulatorFault } from '@core/errors';

describe('RegisterFile', () => {
  it('starts at PC 0x200 with an empty stack', () => {
    const r = new RegisterFile();
    expect(r.snapshot()).toEqual({ v: new Array(16).fill(0), i: 0, pc: 0x200, sp: 0, stack: [] });
  });

  it('round-trips V registers modulo 256', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 15 }), fc.integer({ min: 0, max: 0xFFFF }), (x, value) => {
        const r = new RegisterFile();
        r.setV(x, value);
        return r.getV(x) === (value & 0xFF);
      }),
    );
  });

  it('masks I to 16 bits', () => {
    const r = new RegisterFile();
    r.setI(0x1FFFF);
    expect(r.getI()).toBe(0xFFFF);
  });

  it('wraps PC advances inside 4 KiB', () => {
    const r = new RegisterFile();
    r.pc = 0xFFE;
    r.advancePc();
    expect(r.pc).toBe(0x000);
    r.pc = 0xFFC;
    r.advancePc(2);
    expect(r.pc).toBe(0x000);
  });

  it('holds 16 return addresses and rejects a 17th', () => {
    const r = new RegisterFile();
    for (let k = 0; k < STACK_DEPTH; k++) r.push(0x200 + k * 2);
    expect(r.sp).toBe(16);
    let fault: unknown = null;
    try { r.push(0x300); } catch (e) { fault = e; }
    expect(fault).toBeInstanceOf(EmulatorFault);
    expect(fault instanceof EmulatorFault && fault.kind).toBe('StackOverflow');
    expect(r.sp).toBe(16);
  });

  it('pops in LIFO order and underflows when empty', () => {
    const r = new RegisterFile();
    r.push(0x202);
    r.push(0x304);
    expect(r.stackSnapshot()).toEqual([0x202, 0x304]);
    expect(r.pop()).toBe(0x304);
    expect(r.pop()).toBe(0x202);
    expect(() => r.pop()).toThrowError('return with an empty call stack');
  });
});
