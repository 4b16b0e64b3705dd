// Program cursor: the address the next byte is written to, plus the
// register snapshot a program starts with.

import { AddressRangeError } from './errors.js';

export interface ProcessorConfig {
  start?: number; // Default: $1000
  a?: number;
  x?: number;
  y?: number;
  s?: number;
}

export interface ProcessorStatus {
  pc: number;
  a: number;
  x: number;
  y: number;
  s: number;
}

export const DEFAULT_PROCESSOR_CONFIG: Required<ProcessorConfig> = {
  start: 0x1000,
  a: 0,
  x: 0,
  y: 0,
  s: 0,
};

function checkAddress(address: number): number {
  if (!Number.isInteger(address) || address < 0 || address > 0xffff) {
    throw new AddressRangeError(address);
  }
  return address;
}

export class Processor {
  private _start: number;
  private pc: number;
  private a: number;
  private x: number;
  private y: number;
  private s: number;

  constructor(config: ProcessorConfig = {}) {
    const defaults = DEFAULT_PROCESSOR_CONFIG;
    this._start = checkAddress(config.start ?? defaults.start);
    this.pc = this._start;
    this.a = config.a ?? defaults.a;
    this.x = config.x ?? defaults.x;
    this.y = config.y ?? defaults.y;
    this.s = config.s ?? defaults.s;
  }

  get start(): number {
    return this._start;
  }

  setStart(address: number): void {
    this._start = checkAddress(address);
  }

  current(): number {
    return this.pc;
  }

  // Cursor moves never fail; an out-of-range cursor is caught by the memory write
  advance(count = 1): void {
    this.pc += count;
  }

  jump(address: number): void {
    this.pc = address;
  }

  reset(): void {
    this.pc = this._start;
  }

  status(): ProcessorStatus {
    return { pc: this.pc, a: this.a, x: this.x, y: this.y, s: this.s };
  }
}
