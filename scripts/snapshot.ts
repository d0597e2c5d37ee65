#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { formatFault, hex } from '@core/errors'
import { runProgram } from '@core/harness/headless'
import { configFromEnv } from '@core/system/config'
import { displayToPng, writePng } from '@host/node/png'

// Runs a ROM headless for a while and writes the final display as a PNG.
//   tsx scripts/snapshot.ts --rom=game.ch8 [--seconds=2] [--out=out/snap.png] [--scale=8] [--seed=1]

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM') || ''
  let seconds = parseFloat(getEnv('SNAP_SECONDS') || '2')
  let out = getEnv('SNAP_OUT') || 'out/snapshot.png'
  let scale = parseInt(getEnv('SNAP_SCALE') || '8', 10)
  let seed = -1
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--seconds=')) seconds = parseFloat(a.slice(10))
    else if (a.startsWith('--out=')) out = a.slice(6)
    else if (a.startsWith('--scale=')) scale = parseInt(a.slice(8), 10)
    else if (a.startsWith('--seed=')) seed = parseInt(a.slice(7), 10)
    else if (!a.startsWith('-')) rom = a
  }
  if (!Number.isFinite(seconds) || seconds <= 0) seconds = 2
  if (!Number.isInteger(scale) || scale < 1) scale = 8
  return { rom, seconds, out, scale, seed }
}

// Deterministic byte source for reproducible snapshots of games that use RND
function lcg(seed: number): () => number {
  let s = seed >>> 0
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0
    return s >>> 24
  }
}

async function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom || '(none)'}`); process.exit(2) }
  const image = new Uint8Array(fs.readFileSync(args.rom))
  const res = runProgram(image, {
    seconds: args.seconds,
    config: configFromEnv(),
    random: args.seed >= 0 ? lcg(args.seed) : undefined,
  })
  console.log(`[snapshot] ${path.basename(args.rom)}: ${res.reason} after ${res.elapsedMs.toFixed(0)}ms, ${res.steps} instructions, ${res.frames} frames, crc=${hex(res.frameCrc, 8)}`)
  if (res.fault) console.log(`[snapshot] ${formatFault(res.fault)}`)
  await writePng(args.out, displayToPng(res.system.display, args.scale))
  console.log(`[snapshot] wrote ${args.out}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
