// PRG binary: 2-byte little-endian load address followed by the program bytes.

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { CompilationResult } from '../assembler/compiler.js';
import type { MemoryImage } from '../assembler/memory.js';
import { hiLo } from '../assembler/operand.js';

export interface PrgRange {
  start: number;
  finish: number;
}

export function toPrg(memory: MemoryImage, range: PrgRange): Uint8Array {
  const { hi, lo } = hiLo(range.start);
  const body = memory.slice(range.start, range.finish);
  const prg = new Uint8Array(body.length + 2);
  prg[0] = lo;
  prg[1] = hi;
  prg.set(body, 2);
  return prg;
}

export function resultToPrg(result: CompilationResult): Uint8Array {
  return toPrg(result.memory, result);
}

export function writePrg(path: string, result: CompilationResult): Uint8Array {
  const prg = resultToPrg(result);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, prg);
  return prg;
}
