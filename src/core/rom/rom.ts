import fs from 'node:fs';
import type { Word } from '@core/cpu/types';
import { EmulatorFault } from '@core/errors';
import { MAX_PROGRAM_SIZE, PROGRAM_START } from '@core/memory/memory';

export interface Program {
  bytes: Uint8Array;
  origin: Word;
}

// Contents are copied verbatim; only the size is checked
export function parseProgram(buffer: Uint8Array): Program {
  if (buffer.length > MAX_PROGRAM_SIZE) {
    throw new EmulatorFault(
      'ProgramTooLarge',
      `program is ${buffer.length} bytes; at most ${MAX_PROGRAM_SIZE} fit above 0x200`,
    );
  }
  return { bytes: buffer.slice(), origin: PROGRAM_START };
}

export function loadProgramFile(filePath: string): Program {
  return parseProgram(new Uint8Array(fs.readFileSync(filePath)));
}
