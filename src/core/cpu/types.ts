export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Nibble = number; // 0..15

export interface CPUState {
  v: number[]; // V0..VF
  i: Word;
  pc: Word;
  sp: Byte; // number of occupied stack entries
  stack: Word[]; // occupied entries, bottom first
}

// One variant per documented instruction pattern
export type Instruction =
  | { kind: 'cls' }
  | { kind: 'ret' }
  | { kind: 'sys'; addr: Word }
  | { kind: 'jp'; addr: Word }
  | { kind: 'call'; addr: Word }
  | { kind: 'seImm'; x: Nibble; kk: Byte }
  | { kind: 'sneImm'; x: Nibble; kk: Byte }
  | { kind: 'seReg'; x: Nibble; y: Nibble }
  | { kind: 'ldImm'; x: Nibble; kk: Byte }
  | { kind: 'addImm'; x: Nibble; kk: Byte }
  | { kind: 'ldReg'; x: Nibble; y: Nibble }
  | { kind: 'or'; x: Nibble; y: Nibble }
  | { kind: 'and'; x: Nibble; y: Nibble }
  | { kind: 'xor'; x: Nibble; y: Nibble }
  | { kind: 'addReg'; x: Nibble; y: Nibble }
  | { kind: 'sub'; x: Nibble; y: Nibble }
  | { kind: 'shr'; x: Nibble; y: Nibble }
  | { kind: 'subn'; x: Nibble; y: Nibble }
  | { kind: 'shl'; x: Nibble; y: Nibble }
  | { kind: 'sneReg'; x: Nibble; y: Nibble }
  | { kind: 'ldI'; addr: Word }
  | { kind: 'jpV0'; addr: Word }
  | { kind: 'rnd'; x: Nibble; kk: Byte }
  | { kind: 'drw'; x: Nibble; y: Nibble; n: Nibble }
  | { kind: 'skp'; x: Nibble }
  | { kind: 'sknp'; x: Nibble }
  | { kind: 'ldVxDt'; x: Nibble }
  | { kind: 'ldVxK'; x: Nibble }
  | { kind: 'ldDtVx'; x: Nibble }
  | { kind: 'ldStVx'; x: Nibble }
  | { kind: 'addI'; x: Nibble }
  | { kind: 'ldF'; x: Nibble }
  | { kind: 'ldB'; x: Nibble }
  | { kind: 'ldIVx'; x: Nibble }
  | { kind: 'ldVxI'; x: Nibble };

export type InstructionKind = Instruction['kind'];

export type StepOutcome =
  | { kind: 'executed'; pc: Word; opcode: Word; instruction: Instruction }
  // Fx0A: PC stays on the instruction until resumeWithKey() completes it
  | { kind: 'waitingForKey'; pc: Word; register: Nibble };
