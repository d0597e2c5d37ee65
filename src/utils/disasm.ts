import type { Instruction, Word } from '@core/cpu/types';
import { decode } from '@core/cpu/decode';
import { isEmulatorFault, hex } from '@core/errors';
import { PROGRAM_START } from '@core/memory/memory';

const V = (x: number) => `V${hex(x, 1)}`;
const B = (kk: number) => `0x${hex(kk, 2)}`;
const A = (addr: number) => `0x${hex(addr, 3)}`;

// Mnemonics follow the common "LD Vx, byte" notation
export function formatInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case 'cls': return 'CLS';
    case 'ret': return 'RET';
    case 'sys': return `SYS ${A(ins.addr)}`;
    case 'jp': return `JP ${A(ins.addr)}`;
    case 'call': return `CALL ${A(ins.addr)}`;
    case 'seImm': return `SE ${V(ins.x)}, ${B(ins.kk)}`;
    case 'sneImm': return `SNE ${V(ins.x)}, ${B(ins.kk)}`;
    case 'seReg': return `SE ${V(ins.x)}, ${V(ins.y)}`;
    case 'ldImm': return `LD ${V(ins.x)}, ${B(ins.kk)}`;
    case 'addImm': return `ADD ${V(ins.x)}, ${B(ins.kk)}`;
    case 'ldReg': return `LD ${V(ins.x)}, ${V(ins.y)}`;
    case 'or': return `OR ${V(ins.x)}, ${V(ins.y)}`;
    case 'and': return `AND ${V(ins.x)}, ${V(ins.y)}`;
    case 'xor': return `XOR ${V(ins.x)}, ${V(ins.y)}`;
    case 'addReg': return `ADD ${V(ins.x)}, ${V(ins.y)}`;
    case 'sub': return `SUB ${V(ins.x)}, ${V(ins.y)}`;
    case 'shr': return `SHR ${V(ins.x)}`;
    case 'subn': return `SUBN ${V(ins.x)}, ${V(ins.y)}`;
    case 'shl': return `SHL ${V(ins.x)}`;
    case 'sneReg': return `SNE ${V(ins.x)}, ${V(ins.y)}`;
    case 'ldI': return `LD I, ${A(ins.addr)}`;
    case 'jpV0': return `JP V0, ${A(ins.addr)}`;
    case 'rnd': return `RND ${V(ins.x)}, ${B(ins.kk)}`;
    case 'drw': return `DRW ${V(ins.x)}, ${V(ins.y)}, ${ins.n}`;
    case 'skp': return `SKP ${V(ins.x)}`;
    case 'sknp': return `SKNP ${V(ins.x)}`;
    case 'ldVxDt': return `LD ${V(ins.x)}, DT`;
    case 'ldVxK': return `LD ${V(ins.x)}, K`;
    case 'ldDtVx': return `LD DT, ${V(ins.x)}`;
    case 'ldStVx': return `LD ST, ${V(ins.x)}`;
    case 'addI': return `ADD I, ${V(ins.x)}`;
    case 'ldF': return `LD F, ${V(ins.x)}`;
    case 'ldB': return `LD B, ${V(ins.x)}`;
    case 'ldIVx': return `LD [I], ${V(ins.x)}`;
    case 'ldVxI': return `LD ${V(ins.x)}, [I]`;
  }
}

// Words that decode to nothing are shown as data
export function disassemble(opcode: Word): string {
  try {
    return formatInstruction(decode(opcode));
  } catch (e) {
    if (isEmulatorFault(e) && e.kind === 'UnknownOpcode') return `.word 0x${hex(opcode & 0xFFFF, 4)}`;
    throw e;
  }
}

export interface DisasmLine {
  addr: Word;
  bytes: number[];
  text: string;
}

export function disassembleProgram(bytes: Uint8Array, origin: Word = PROGRAM_START): DisasmLine[] {
  const out: DisasmLine[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    if (i + 1 >= bytes.length) {
      out.push({ addr: origin + i, bytes: [bytes[i]], text: `.byte 0x${hex(bytes[i], 2)}` });
      break;
    }
    const word = (bytes[i] << 8) | bytes[i + 1];
    out.push({ addr: origin + i, bytes: [bytes[i], bytes[i + 1]], text: disassemble(word) });
  }
  return out;
}

// "0200  6A02  LD VA, 0x02"
export function formatLine(line: DisasmLine): string {
  const raw = line.bytes.map((b) => hex(b, 2)).join('').padEnd(4, ' ');
  return `${hex(line.addr, 4)}  ${raw}  ${line.text}`;
}
