/**
 * Compilation context
 *
 * The state one compilation owns: cursor, memory image, label table, the
 * current phase and the stack of owners that memory writes are attributed
 * to. Components and emitters share one context instead of reaching into
 * each other.
 */

import { AssemblyError } from './errors.js';
import { LabelTable, DEFAULT_PLACEHOLDER } from './labels.js';
import { MemoryImage } from './memory.js';
import type { AddressingMode } from './opcodes.js';
import type { OperandValue } from './operand.js';
import { Phase } from './phase.js';
import { Processor } from './processor.js';

export const DEFAULT_OWNER = 'main';

export type BreakpointType = 'breakonpc' | 'breakmem' | 'breakraster';

export interface Breakpoint {
  type: BreakpointType;
  params: string;
}

export interface Watch {
  label: string;
  address: string; // hex, no prefix
}

export interface PassStats {
  instructions: number;
  bytes: number;
  endPc: number;
}

export interface ContextOptions {
  start?: number;
  end?: number;
  placeholder?: number;
  memory?: MemoryImage;
  processor?: Processor;
  owner?: string;
  verbose?: boolean;
}

export class CompilationContext {
  readonly processor: Processor;
  readonly memory: MemoryImage;
  readonly labels: LabelTable;
  readonly breakpoints: Breakpoint[] = [];
  readonly watches: Watch[] = [];
  entrypoint: number | undefined;
  readonly verbose: boolean;

  private _phase: Phase = Phase.DISCOVERY;
  private owners: string[];
  private instructions = 0;
  private bytes = 0;

  constructor(options: ContextOptions = {}) {
    this.processor = options.processor ?? new Processor({ start: options.start });
    this.memory = options.memory ?? new MemoryImage({ start: options.start, end: options.end });
    this.labels = new LabelTable(this, options.placeholder ?? DEFAULT_PLACEHOLDER);
    this.owners = [options.owner ?? DEFAULT_OWNER];
    this.verbose = options.verbose ?? false;
  }

  get phase(): Phase {
    return this._phase;
  }

  get final(): boolean {
    return this._phase === Phase.FINAL;
  }

  get pc(): number {
    return this.processor.current();
  }

  get owner(): string {
    return this.owners[this.owners.length - 1];
  }

  /**
   * Attribute every memory write made by `body` to `owner`.
   * The previous owner is restored however `body` exits.
   */
  withOwner<T>(owner: string, body: () => T): T {
    this.owners.push(owner);
    try {
      return body();
    } finally {
      this.owners.pop();
    }
  }

  resolve(name: string): OperandValue {
    return this.labels.resolve(name);
  }

  pinnedMode(pc: number): AddressingMode | undefined {
    return this.labels.pinnedMode(pc);
  }

  pinMode(pc: number, mode: AddressingMode): void {
    this.labels.pinMode(pc, mode);
  }

  /** Write one byte at the cursor and advance it. */
  emitByte(value: number): void {
    this.memory.write(this.pc, value, this.owner);
    this.processor.advance();
    this.bytes++;
  }

  /** Write one byte at an explicit address; the cursor does not move. */
  storeByte(address: number, value: number): void {
    this.memory.write(address, value, this.owner);
    this.bytes++;
  }

  countInstruction(): void {
    this.instructions++;
  }

  /** Statistics of the pass that just ran; counters restart for the next one. */
  endPass(): PassStats {
    const stats = { instructions: this.instructions, bytes: this.bytes, endPc: this.pc };
    this.instructions = 0;
    this.bytes = 0;
    return stats;
  }

  /** Switch to the final pass and rewind the cursor. Happens once. */
  beginFinal(): void {
    if (this._phase === Phase.FINAL) {
      throw new AssemblyError('Compilation is already in its final pass');
    }
    this._phase = Phase.FINAL;
    this.processor.reset();
  }
}
