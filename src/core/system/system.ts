import { CPU, type RandomByte } from '@core/cpu/cpu';
import type { StepOutcome } from '@core/cpu/types';
import { hex } from '@core/errors';
import { parseProgram, type Program } from '@core/rom/rom';
import { formatInstruction } from '@utils/disasm';
import { readEnvFlag } from './config';
import { createMachine, type Machine } from './machine';

export interface SystemOptions {
  random?: RandomByte;
  // Log every executed instruction; defaults to TRACE_CPU=1
  trace?: boolean;
}

export class Chip8System {
  readonly machine: Machine;
  readonly cpu: CPU;

  constructor(program: Program | Uint8Array, opts: SystemOptions = {}) {
    const image = program instanceof Uint8Array ? parseProgram(program) : program;
    this.machine = createMachine();
    this.machine.memory.load(image.bytes, image.origin);
    this.machine.registers.pc = image.origin;
    this.cpu = new CPU(this.machine, { random: opts.random });
    if (opts.trace ?? readEnvFlag('TRACE_CPU')) {
      this.cpu.setTraceHook((pc, opcode, instruction) => {
        const r = this.machine.registers;
        // eslint-disable-next-line no-console
        console.log(`[cpu] ${hex(pc, 4)}  ${hex(opcode, 4)}  ${formatInstruction(instruction).padEnd(16)} I=${hex(r.getI(), 4)} SP=${r.sp}`);
      });
    }
  }

  get memory() { return this.machine.memory; }
  get registers() { return this.machine.registers; }
  get display() { return this.machine.display; }
  get keypad() { return this.machine.keypad; }
  get timers() { return this.machine.timers; }

  stepInstruction(): StepOutcome {
    return this.cpu.step();
  }

  resumeWithKey(key: number): void {
    this.cpu.resumeWithKey(key);
  }

  tickTimers(): void {
    this.machine.timers.tick();
  }
}
