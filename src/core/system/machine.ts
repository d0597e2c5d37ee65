import { Memory } from '@core/memory/memory';
import { RegisterFile } from '@core/cpu/registers';
import { Display } from '@core/display/display';
import { Keypad } from '@core/input/keypad';
import { Timers } from '@core/timers/timers';

// All mutable machine state, owned by one engine instance and passed by reference
export interface Machine {
  memory: Memory;
  registers: RegisterFile;
  display: Display;
  keypad: Keypad;
  timers: Timers;
}

export function createMachine(): Machine {
  return {
    memory: new Memory(),
    registers: new RegisterFile(),
    display: new Display(),
    keypad: new Keypad(),
    timers: new Timers(),
  };
}
