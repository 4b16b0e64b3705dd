/**
 * Two-pass compilation driver
 *
 * Runs a program once in the discovery phase, where labels are collected and
 * forward references are answered with a placeholder, then once more in the
 * final phase with every address known.
 */

import { type Breakpoint, CompilationContext, type PassStats, type Watch } from './context.js';
import { Emitter } from './emitter.js';
import { PassMismatchError } from './errors.js';
import { DEFAULT_PLACEHOLDER, type LabelDrift, type Reference } from './labels.js';
import type { MemoryImage } from './memory.js';
import type { Processor } from './processor.js';

export type Program = (asm: Emitter) => void;

export interface AssemblerOptions {
  start?: number;       // Default: $1000
  end?: number;         // Last byte to serialize; default: last written byte
  placeholder?: number; // Default: 12345
  verbose?: boolean;
  memory?: MemoryImage;
  processor?: Processor;
  owner?: string;
}

export const DEFAULT_OPTIONS = {
  start: 0x1000,
  placeholder: DEFAULT_PLACEHOLDER,
  verbose: false,
} as const;

export interface CompilationResult {
  memory: MemoryImage;
  labels: Map<string, number>;
  references: Reference[];
  breakpoints: Breakpoint[];
  watches: Watch[];
  start: number;
  finish: number;
  entrypoint: number | undefined;
  passes: { discovery: PassStats; final: PassStats };
  /** Bytes of `start..finish`; unwritten cells are zero. */
  bytes: Uint8Array;
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, '0');
}

function comparePasses(discovery: PassStats, final: PassStats, drift: LabelDrift[]): void {
  const problems: string[] = [];
  if (discovery.instructions !== final.instructions) {
    problems.push(`${discovery.instructions} vs ${final.instructions} instructions`);
  }
  if (discovery.bytes !== final.bytes) {
    problems.push(`${discovery.bytes} vs ${final.bytes} bytes`);
  }
  if (discovery.endPc !== final.endPc) {
    problems.push(`program ends at $${hex(discovery.endPc)} vs $${hex(final.endPc)}`);
  }
  for (const { name, discovery: before, final: after } of drift) {
    problems.push(`label '${name}' moved from $${hex(before)} to $${hex(after)}`);
  }
  if (problems.length > 0) {
    throw new PassMismatchError(problems.join(', '));
  }
}

export class Assembler {
  private readonly options: AssemblerOptions;

  constructor(private readonly program: Program, options: AssemblerOptions = {}) {
    // A supplied processor carries its own start address
    const start = options.processor === undefined ? (options.start ?? DEFAULT_OPTIONS.start) : options.start;
    this.options = { ...options, start };
  }

  assemble(): CompilationResult {
    const verbose = this.options.verbose ?? DEFAULT_OPTIONS.verbose;
    const context = new CompilationContext({
      ...this.options,
      placeholder: this.options.placeholder ?? DEFAULT_OPTIONS.placeholder,
    });
    const asm = new Emitter(context);

    // Pass 1: collect labels
    this.program(asm);
    const discovery = context.endPass();
    if (verbose) {
      console.log(
        `Discovery: ${discovery.instructions} instructions, ${discovery.bytes} bytes, ` +
          `${context.labels.references().length} forward references`,
      );
    }

    // Pass 2: emit with real addresses
    context.beginFinal();
    this.program(asm);
    const final = context.endPass();
    comparePasses(discovery, final, context.labels.drift());

    const { memory, processor } = context;
    const start = memory.start ?? processor.start;
    const written = memory.writtenRange();
    const finish = memory.finish ?? Math.max(written?.to ?? start - 1, start - 1);

    if (verbose) {
      console.log(`Final: ${final.instructions} instructions, ${final.bytes} bytes, $${hex(start)} - $${hex(finish)}`);
    }

    return {
      memory,
      labels: new Map(context.labels.entries()),
      references: context.labels.references(),
      breakpoints: [...context.breakpoints],
      watches: [...context.watches],
      start,
      finish,
      entrypoint: context.entrypoint,
      passes: { discovery, final },
      bytes: memory.slice(start, finish),
    };
  }
}

export function compile(program: Program, options: AssemblerOptions = {}): CompilationResult {
  return new Assembler(program, options).assemble();
}
