/**
 * Emitter
 *
 * The surface assembly programs are written against. Every instruction goes
 * through the table-driven `emit`; the data helpers (`byte`, `fill`,
 * `variable`, `set`, ...) are built on top of it.
 */

import {
  type AddressingFlags,
  type IndexRegister,
  isIndexRegister,
  resolveAddressing,
} from './addressing.js';
import type { BreakpointType, CompilationContext } from './context.js';
import { ArityError } from './errors.js';
import { type Mnemonic, isImpliedOnly } from './opcodes.js';
import { type Operand, type OperandValue, add, evaluate, hi, isExpression, lo } from './operand.js';
import type { Phase } from './phase.js';

export type EmitOptions = AddressingFlags;

export type EmitArgument = Operand | EmitOptions;

export type Register = 'A' | 'X' | 'Y';

export interface SetOptions {
  with?: Register;
  load?: boolean;
  hi?: boolean;
  length?: number;
  zeropage?: boolean;
}

export interface CopyOptions {
  with?: Register;
  zeropage?: boolean;
}

export interface VariableOptions {
  length?: number;
  double?: boolean;
}

export interface SetupOptions {
  start: number;
  end?: number;
  entry?: number;
}

export type FillGenerator = (index: number) => number;

const LOAD: Record<Register, Mnemonic> = { A: 'LDA', X: 'LDX', Y: 'LDY' };
const STORE: Record<Register, Mnemonic> = { A: 'STA', X: 'STX', Y: 'STY' };

function isEmitOptions(value: EmitArgument): value is EmitOptions {
  return typeof value === 'object' && !isExpression(value);
}

function hex(value: number): string {
  return value.toString(16);
}

/** Map text to screen codes: characters from '@' upwards move down by 64. */
export function screenCodes(text: string): number[] {
  return [...text].map((ch) => {
    const code = ch.charCodeAt(0);
    return code < 64 ? code : code - 64;
  });
}

export class Emitter {
  constructor(readonly context: CompilationContext) {}

  get pc(): number {
    return this.context.pc;
  }

  get phase(): Phase {
    return this.context.phase;
  }

  /**
   * Encode one instruction at the cursor and return the number of bytes written.
   *
   *   emit('RTS')
   *   emit('LDA', 0x42)
   *   emit('STA', 'screen', 'X')
   *   emit('LDA', 'pointer', 'Y', { zeropage: true, indirect: true })
   */
  emit(mnemonic: Mnemonic, ...args: EmitArgument[]): number {
    const last = args[args.length - 1];
    const flags: EmitOptions = last !== undefined && isEmitOptions(last) ? last : {};
    const operands = args.filter((arg): arg is Operand => !isEmitOptions(arg));

    if (operands.length !== args.length - (last !== undefined && isEmitOptions(last) ? 1 : 0)) {
      throw new ArityError(`${mnemonic}: options must be the last argument`);
    }
    if (operands.length > 2) {
      throw new ArityError(`${mnemonic} takes an operand and an optional index register, got ${operands.length} operands`);
    }
    const [operand, second] = operands;
    let index: IndexRegister | undefined;
    if (second !== undefined) {
      if (!isIndexRegister(second)) {
        throw new ArityError(`${mnemonic}: index register must be X or Y`);
      }
      index = second;
    }
    if (operand !== undefined && isImpliedOnly(mnemonic)) {
      throw new ArityError(`${mnemonic} takes no operand`);
    }

    const { bytes } = resolveAddressing(mnemonic, operand, index, flags, this.context);
    for (const value of bytes) {
      this.context.emitByte(value);
    }
    this.context.countInstruction();
    return bytes.length;
  }

  label(name: string, address?: number): number {
    return this.context.labels.define(name, address);
  }

  labelDouble(name: string): void {
    this.context.labels.defineDouble(name);
  }

  resolve(name: string): number {
    return this.context.labels.resolve(name).value;
  }

  l(name: string): number {
    return this.resolve(name);
  }

  evaluate(operand: Operand): OperandValue {
    return evaluate(operand, this.context);
  }

  org(address: number): void {
    this.context.processor.jump(address);
  }

  /** Point the program at `start` (cursor at `entry`) and bound the serialized range. */
  setup(options: SetupOptions): void {
    const { processor, memory } = this.context;
    processor.setStart(options.start);
    processor.jump(options.entry ?? options.start);
    if (options.end !== undefined) {
      memory.setRange(options.start, options.end);
    } else {
      memory.start = options.start;
    }
    if (!this.context.final && this.context.entrypoint === undefined) {
      this.context.entrypoint = this.pc;
    }
  }

  /** Mark the cursor as the program's entry point. */
  entrypoint(): void {
    this.context.entrypoint = this.pc;
  }

  withOwner<T>(owner: string, body: () => T): T {
    return this.context.withOwner(owner, body);
  }

  subroutine(name: string, body: () => void): void {
    this.label(name);
    body();
    this.emit('RTS');
  }

  nop(count = 1): void {
    for (let i = 0; i < count; i++) {
      this.emit('NOP');
    }
  }

  // --- data ---

  byte(...values: Operand[]): number {
    for (const operand of values) {
      const { value, pending } = this.evaluate(operand);
      this.context.emitByte(pending ? value & 0xff : value);
    }
    return values.length;
  }

  /** 16-bit little-endian words. */
  word(...values: Operand[]): number {
    for (const operand of values) {
      this.byte(lo(operand), hi(operand));
    }
    return values.length * 2;
  }

  /**
   * fill(length)                zeros at the cursor
   * fill(length, data)          `data` at the cursor; a value above 255 is an address to zero-fill
   * fill(length, address, data) `data` at `address`
   * A trailing generator computes each byte from its index.
   * The cursor only moves when filling at the cursor.
   */
  fill(length: number, ...args: (number | FillGenerator)[]): void {
    const last = args[args.length - 1];
    const generator = typeof last === 'function' ? last : undefined;
    const positional = args.filter((arg): arg is number => typeof arg === 'number');
    if (positional.length !== args.length - (generator ? 1 : 0)) {
      throw new ArityError('fill: generator must be the last argument');
    }

    let address: number;
    let data: number;
    if (positional.length === 0) {
      address = this.pc;
      data = 0;
    } else if (positional.length === 1) {
      const [value] = positional;
      [address, data] = value > 255 ? [value, 0] : [this.pc, value];
    } else if (positional.length === 2) {
      [address, data] = positional;
    } else {
      throw new ArityError(`fill takes at most an address and a data byte, got ${positional.length} values`);
    }

    const atCursor = address === this.pc;
    for (let i = 0; i < length; i++) {
      this.context.storeByte(address + i, generator ? generator(i) : data);
    }
    if (atCursor) {
      this.context.processor.advance(length);
    }
  }

  /** Label followed by `length` copies of `initial`, or a lo/hi pair for `double`. */
  variable(name: string, initial = 0, options: VariableOptions = {}): void {
    this.label(name);
    if (options.double) {
      const split = this.evaluate(lo(initial));
      this.label(`${name}_lo`);
      this.context.emitByte(split.value);
      this.label(`${name}_hi`);
      this.context.emitByte(this.evaluate(hi(initial)).value);
      return;
    }
    for (let i = 0; i < (options.length ?? 1); i++) {
      this.context.emitByte(initial);
    }
  }

  data(name: string, bytes: Operand[]): void {
    this.label(name);
    this.byte(...bytes);
  }

  text(name: string, text: string): void {
    this.data(name, screenCodes(text));
  }

  // --- register helpers ---

  /** Load `value` into a register (A by default) and store it to `target` (`length` consecutive bytes). */
  set(target: Operand, value?: Operand, options: SetOptions = {}): void {
    const register = options.with ?? 'A';
    const base = options.hi ? add(target, 1) : target;
    const flags: EmitOptions = { zeropage: options.zeropage };
    if (value !== undefined && options.load !== false) {
      this.emit(LOAD[register], value);
    }
    for (let i = 0; i < (options.length ?? 1); i++) {
      this.emit(STORE[register], i === 0 ? base : add(base, i), flags);
    }
  }

  /** Store the 16-bit value `what` as a lo/hi pointer at `target`. */
  address(target: Operand, what: Operand, options: Omit<SetOptions, 'hi' | 'length'> = {}): void {
    this.set(target, lo(what), options);
    this.set(target, hi(what), { ...options, hi: true });
  }

  copy(from: Operand, to: Operand, options: CopyOptions = {}): void {
    const register = options.with ?? 'A';
    const flags: EmitOptions = { zeropage: options.zeropage };
    this.emit(LOAD[register], from, flags);
    this.emit(STORE[register], to, flags);
  }

  // --- debugger metadata (final pass only) ---

  breakPc(): void {
    this.addBreakpoint('breakonpc', hex(this.pc));
  }

  breakMem(address: number, condition: string): void {
    this.addBreakpoint('breakmem', `${hex(address)}${condition}`);
  }

  breakRaster(line: number): void {
    this.addBreakpoint('breakraster', String(line));
  }

  watch(what?: string | number): void {
    if (!this.context.final) return;
    if (typeof what === 'string') {
      this.context.watches.push({ label: what, address: hex(this.resolve(what)) });
      return;
    }
    const address = what ?? this.pc;
    this.context.watches.push({ label: `addr_${hex(address)}`, address: hex(address) });
  }

  private addBreakpoint(type: BreakpointType, params: string): void {
    if (!this.context.final) return;
    this.context.breakpoints.push({ type, params });
  }
}
