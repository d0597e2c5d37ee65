import type { Byte, CPUState, Instruction, Nibble, StepOutcome, Word } from './types';
import { decode } from './decode';
import { FLAG_REGISTER, INSTRUCTION_SIZE } from './registers';
import { EmulatorFault, hex } from '@core/errors';
import { MEMORY_SIZE, PROGRAM_START, fontGlyphAddress } from '@core/memory/memory';
import type { Machine } from '@core/system/machine';

export type RandomByte = () => Byte;
export type TraceHook = (pc: Word, opcode: Word, instruction: Instruction) => void;

export const mathRandomByte: RandomByte = () => Math.floor(Math.random() * 0x100);

export interface CPUOptions {
  random?: RandomByte;
}

/**
 * Fetch/decode/execute over a Machine. Pure state transitions: pacing belongs to the scheduler.
 *
 * Pinned behaviours where interpreters historically differ:
 * - 8xy6/8xyE shift Vx in place; Vy is ignored.
 * - Fx55/Fx65 leave I unchanged.
 * - Flag results are written to VF after the arithmetic result, so VF holds the flag even for x = F.
 * - Writes through Fx33/Fx55 below 0x200 fault with AddressOutOfRange.
 */
export class CPU {
  private random: RandomByte;
  private traceHook: TraceHook | null = null;
  private pendingKeyWait: { pc: Word; register: Nibble } | null = null;

  constructor(private machine: Machine, opts: CPUOptions = {}) {
    this.random = opts.random ?? mathRandomByte;
  }

  get state(): CPUState { return this.machine.registers.snapshot(); }

  setTraceHook(fn: TraceHook | null): void { this.traceHook = fn; }

  isWaitingForKey(): boolean { return this.pendingKeyWait !== null; }

  step(): StepOutcome {
    if (this.pendingKeyWait) return { kind: 'waitingForKey', ...this.pendingKeyWait };
    const { registers, memory } = this.machine;
    const pc = registers.pc;
    try {
      const opcode = memory.readWord(pc);
      const instruction = decode(opcode);
      if (this.traceHook) this.traceHook(pc, opcode, instruction);
      if (instruction.kind === 'ldVxK') {
        this.pendingKeyWait = { pc, register: instruction.x };
        return { kind: 'waitingForKey', pc, register: instruction.x };
      }
      this.execute(instruction);
      return { kind: 'executed', pc, opcode, instruction };
    } catch (e) {
      if (e instanceof EmulatorFault) throw e.at(pc);
      throw e;
    }
  }

  // Completes a pending Fx0A with the key that was pressed
  resumeWithKey(key: number): void {
    const wait = this.pendingKeyWait;
    if (!wait) throw new Error('resumeWithKey() called without a pending key wait');
    const { registers } = this.machine;
    registers.setV(wait.register, key & 0xF);
    registers.advancePc();
    this.pendingKeyWait = null;
  }

  private execute(ins: Instruction): void {
    const { registers: r, memory, display, keypad, timers } = this.machine;
    switch (ins.kind) {
      case 'cls':
        display.clear();
        break;
      case 'ret':
        r.pc = r.pop();
        return;
      case 'sys':
        break;
      case 'jp':
        r.pc = ins.addr;
        return;
      case 'call':
        r.push((r.pc + INSTRUCTION_SIZE) % MEMORY_SIZE);
        r.pc = ins.addr;
        return;
      case 'seImm':
        this.skipIf(r.getV(ins.x) === ins.kk);
        return;
      case 'sneImm':
        this.skipIf(r.getV(ins.x) !== ins.kk);
        return;
      case 'seReg':
        this.skipIf(r.getV(ins.x) === r.getV(ins.y));
        return;
      case 'sneReg':
        this.skipIf(r.getV(ins.x) !== r.getV(ins.y));
        return;
      case 'ldImm':
        r.setV(ins.x, ins.kk);
        break;
      case 'addImm':
        r.setV(ins.x, r.getV(ins.x) + ins.kk);
        break;
      case 'ldReg':
        r.setV(ins.x, r.getV(ins.y));
        break;
      case 'or':
        r.setV(ins.x, r.getV(ins.x) | r.getV(ins.y));
        break;
      case 'and':
        r.setV(ins.x, r.getV(ins.x) & r.getV(ins.y));
        break;
      case 'xor':
        r.setV(ins.x, r.getV(ins.x) ^ r.getV(ins.y));
        break;
      case 'addReg': {
        const sum = r.getV(ins.x) + r.getV(ins.y);
        this.setWithFlag(ins.x, sum, sum > 0xFF);
        break;
      }
      case 'sub': {
        const vx = r.getV(ins.x), vy = r.getV(ins.y);
        this.setWithFlag(ins.x, vx - vy, vx > vy);
        break;
      }
      case 'subn': {
        const vx = r.getV(ins.x), vy = r.getV(ins.y);
        this.setWithFlag(ins.x, vy - vx, vy > vx);
        break;
      }
      case 'shr': {
        const vx = r.getV(ins.x);
        this.setWithFlag(ins.x, vx >> 1, (vx & 0x01) !== 0);
        break;
      }
      case 'shl': {
        const vx = r.getV(ins.x);
        this.setWithFlag(ins.x, vx << 1, (vx & 0x80) !== 0);
        break;
      }
      case 'ldI':
        r.setI(ins.addr);
        break;
      case 'jpV0':
        r.pc = ins.addr + r.getV(0);
        return;
      case 'rnd':
        r.setV(ins.x, this.random() & ins.kk);
        break;
      case 'drw': {
        const rows = memory.readBlock(r.getI(), ins.n);
        const collision = display.drawSprite(r.getV(ins.x), r.getV(ins.y), rows);
        r.setV(FLAG_REGISTER, collision ? 1 : 0);
        break;
      }
      case 'skp':
        this.skipIf(keypad.isPressed(r.getV(ins.x) & 0xF));
        return;
      case 'sknp':
        this.skipIf(!keypad.isPressed(r.getV(ins.x) & 0xF));
        return;
      case 'ldVxDt':
        r.setV(ins.x, timers.getDelay());
        break;
      case 'ldVxK':
        // Handled by step(): the instruction suspends until resumeWithKey()
        throw new Error('Fx0A must be completed through resumeWithKey()');
      case 'ldDtVx':
        timers.setDelay(r.getV(ins.x));
        break;
      case 'ldStVx':
        timers.setSound(r.getV(ins.x));
        break;
      case 'addI':
        r.setI(r.getI() + r.getV(ins.x));
        break;
      case 'ldF':
        r.setI(fontGlyphAddress(r.getV(ins.x)));
        break;
      case 'ldB': {
        const v = r.getV(ins.x);
        this.store(r.getI(), [Math.floor(v / 100), Math.floor(v / 10) % 10, v % 10]);
        break;
      }
      case 'ldIVx': {
        const values: number[] = [];
        for (let i = 0; i <= ins.x; i++) values.push(r.getV(i));
        this.store(r.getI(), values);
        break;
      }
      case 'ldVxI': {
        const values = memory.readBlock(r.getI(), ins.x + 1);
        values.forEach((v, i) => r.setV(i, v));
        break;
      }
      default: {
        const unreachable: never = ins;
        throw new Error(`unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
    r.advancePc();
  }

  private skipIf(condition: boolean): void {
    this.machine.registers.advancePc(condition ? 2 : 1);
  }

  private setWithFlag(x: Nibble, value: number, flag: boolean): void {
    const r = this.machine.registers;
    r.setV(x, value);
    r.setV(FLAG_REGISTER, flag ? 1 : 0);
  }

  // Program writes never reach the interpreter area below 0x200
  private store(addr: Word, bytes: number[]): void {
    if (addr < PROGRAM_START) {
      throw new EmulatorFault('AddressOutOfRange', `write to reserved interpreter area at 0x${hex(addr, 3)}`);
    }
    this.machine.memory.load(Uint8Array.from(bytes), addr);
  }
}
