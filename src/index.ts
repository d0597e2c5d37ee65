export { EmulatorFault, formatFault, isEmulatorFault, type FaultKind } from '@core/errors';
export { Memory, MEMORY_SIZE, PROGRAM_START, MAX_PROGRAM_SIZE, fontGlyphAddress } from '@core/memory/memory';
export { RegisterFile, STACK_DEPTH } from '@core/cpu/registers';
export { Display, DISPLAY_WIDTH, DISPLAY_HEIGHT, type DisplayView } from '@core/display/display';
export { Keypad } from '@core/input/keypad';
export { Timers, TIMER_RATE_HZ } from '@core/timers/timers';
export { decode } from '@core/cpu/decode';
export { CPU, type RandomByte, type TraceHook } from '@core/cpu/cpu';
export type { Instruction, InstructionKind, StepOutcome, CPUState } from '@core/cpu/types';
export { parseProgram, loadProgramFile, type Program } from '@core/rom/rom';
export { Chip8System, type SystemOptions } from '@core/system/system';
export {
  Scheduler,
  type AudioSink,
  type FrameReady,
  type SchedulerHooks,
  type SchedulerState,
  type SchedulerStats,
} from '@core/system/scheduler';
export { DEFAULT_CONFIG, ConfigError, configFromEnv, resolveConfig, type EngineConfig } from '@core/system/config';
export { runProgram, type KeyEvent, type RunOptions, type RunResult } from '@core/harness/headless';
export { disassemble, disassembleProgram, formatInstruction, formatLine } from '@utils/disasm';
