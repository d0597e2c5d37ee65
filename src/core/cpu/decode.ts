import type { Instruction, Word } from './types';
import { EmulatorFault, hex } from '@core/errors';

const unknown = (opcode: Word): never => {
  throw new EmulatorFault('UnknownOpcode', `unknown opcode ${hex(opcode, 4)}`);
};

// Splits a 16-bit instruction word into its variant and operands
export function decode(opcode: Word): Instruction {
  const op = opcode & 0xFFFF;
  const x = (op >> 8) & 0xF;
  const y = (op >> 4) & 0xF;
  const n = op & 0xF;
  const kk = op & 0xFF;
  const addr = op & 0xFFF;

  switch (op >> 12) {
    case 0x0:
      if (op === 0x00E0) return { kind: 'cls' };
      if (op === 0x00EE) return { kind: 'ret' };
      return { kind: 'sys', addr };
    case 0x1: return { kind: 'jp', addr };
    case 0x2: return { kind: 'call', addr };
    case 0x3: return { kind: 'seImm', x, kk };
    case 0x4: return { kind: 'sneImm', x, kk };
    case 0x5:
      if (n === 0x0) return { kind: 'seReg', x, y };
      return unknown(op);
    case 0x6: return { kind: 'ldImm', x, kk };
    case 0x7: return { kind: 'addImm', x, kk };
    case 0x8:
      switch (n) {
        case 0x0: return { kind: 'ldReg', x, y };
        case 0x1: return { kind: 'or', x, y };
        case 0x2: return { kind: 'and', x, y };
        case 0x3: return { kind: 'xor', x, y };
        case 0x4: return { kind: 'addReg', x, y };
        case 0x5: return { kind: 'sub', x, y };
        case 0x6: return { kind: 'shr', x, y };
        case 0x7: return { kind: 'subn', x, y };
        case 0xE: return { kind: 'shl', x, y };
        default: return unknown(op);
      }
    case 0x9:
      if (n === 0x0) return { kind: 'sneReg', x, y };
      return unknown(op);
    case 0xA: return { kind: 'ldI', addr };
    case 0xB: return { kind: 'jpV0', addr };
    case 0xC: return { kind: 'rnd', x, kk };
    case 0xD: return { kind: 'drw', x, y, n };
    case 0xE:
      if (kk === 0x9E) return { kind: 'skp', x };
      if (kk === 0xA1) return { kind: 'sknp', x };
      return unknown(op);
    default: // 0xF
      switch (kk) {
        case 0x07: return { kind: 'ldVxDt', x };
        case 0x0A: return { kind: 'ldVxK', x };
        case 0x15: return { kind: 'ldDtVx', x };
        case 0x18: return { kind: 'ldStVx', x };
        case 0x1E: return { kind: 'addI', x };
        case 0x29: return { kind: 'ldF', x };
        case 0x33: return { kind: 'ldB', x };
        case 0x55: return { kind: 'ldIVx', x };
        case 0x65: return { kind: 'ldVxI', x };
        default: return unknown(op);
      }
  }
}
