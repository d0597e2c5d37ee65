import type { Byte, CPUState, Nibble, Word } from './types';
import { EmulatorFault, hex } from '@core/errors';
import { MEMORY_SIZE, PROGRAM_START } from '@core/memory/memory';

export const STACK_DEPTH = 16;
export const FLAG_REGISTER = 0xF;
export const INSTRUCTION_SIZE = 2;

export class RegisterFile {
  private v = new Uint8Array(16);
  private i: Word = 0;
  private programCounter: Word = PROGRAM_START;
  private stack = new Uint16Array(STACK_DEPTH);
  private stackPointer = 0;

  getV(x: Nibble): Byte { return this.v[x & 0xF]; }
  setV(x: Nibble, value: number): void { this.v[x & 0xF] = value & 0xFF; }

  getI(): Word { return this.i; }
  setI(value: number): void { this.i = value & 0xFFFF; }

  get pc(): Word { return this.programCounter; }
  set pc(value: Word) { this.programCounter = value & 0xFFFF; }

  // Moves past `count` instruction words, wrapping inside the address space
  advancePc(count = 1): void {
    this.programCounter = (this.programCounter + INSTRUCTION_SIZE * count) % MEMORY_SIZE;
  }

  get sp(): Byte { return this.stackPointer; }

  push(addr: Word): void {
    if (this.stackPointer >= STACK_DEPTH) {
      throw new EmulatorFault('StackOverflow', `call stack full (${STACK_DEPTH} entries) pushing 0x${hex(addr, 3)}`);
    }
    this.stack[this.stackPointer++] = addr & 0xFFFF;
  }

  pop(): Word {
    if (this.stackPointer === 0) {
      throw new EmulatorFault('StackUnderflow', 'return with an empty call stack');
    }
    return this.stack[--this.stackPointer];
  }

  stackSnapshot(): Word[] {
    return Array.from(this.stack.subarray(0, this.stackPointer));
  }

  snapshot(): CPUState {
    return {
      v: Array.from(this.v),
      i: this.i,
      pc: this.programCounter,
      sp: this.stackPointer,
      stack: this.stackSnapshot(),
    };
  }
}
