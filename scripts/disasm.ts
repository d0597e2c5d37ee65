#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { parseProgram } from '@core/rom/rom'
import { disassembleProgram, formatLine } from '@utils/disasm'

// Prints a linear listing of a ROM: tsx scripts/disasm.ts game.ch8
function main() {
  const rom = process.argv[2]
  if (!rom || !fs.existsSync(rom)) { console.error(`ROM not found: ${rom ?? '(none)'}`); process.exit(2) }
  const program = parseProgram(new Uint8Array(fs.readFileSync(rom)))
  for (const line of disassembleProgram(program.bytes, program.origin)) console.log(formatLine(line))
}

main()
