export type FaultKind =
  | 'AddressOutOfRange'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'UnknownOpcode'
  | 'ProgramTooLarge';

// Every fault is fatal: the scheduler halts and the engine must be recreated.
export class EmulatorFault extends Error {
  readonly kind: FaultKind;
  // Address of the instruction being executed when the fault was raised, when known
  readonly pc: number | undefined;

  constructor(kind: FaultKind, message: string, pc?: number) {
    super(message);
    this.name = 'EmulatorFault';
    this.kind = kind;
    this.pc = pc;
  }

  // Copy of this fault attributed to the instruction at `pc`
  at(pc: number): EmulatorFault {
    if (this.pc !== undefined) return this;
    return new EmulatorFault(this.kind, this.message, pc);
  }
}

export const isEmulatorFault = (e: unknown): e is EmulatorFault => e instanceof EmulatorFault;

export function formatFault(fault: EmulatorFault): string {
  const where = fault.pc !== undefined ? ` at 0x${hex(fault.pc, 3)}` : '';
  return `${fault.kind}${where}: ${fault.message}`;
}

export const hex = (value: number, width: number): string =>
  value.toString(16).toUpperCase().padStart(width, '0');
