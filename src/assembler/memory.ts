// Memory image for the assembler
// 64KB address space; every written cell remembers who wrote it so that
// two independently generated regions cannot silently overlap.

import { AddressRangeError, ByteRangeError, ConfigError, OwnershipConflictError } from './errors.js';

export const ADDRESS_SPACE = 0x10000;

export interface MemoryConfig {
  start?: number; // First byte to serialize
  end?: number;   // Last byte to serialize
}

export interface MemoryCell {
  value: number;
  owner: string;
}

export interface OwnerRun {
  owner: string;
  from: number;
  to: number;
}

function isAddress(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < ADDRESS_SPACE;
}

export class MemoryImage {
  private readonly cells = new Array<MemoryCell | undefined>(ADDRESS_SPACE);
  // Serialized range; an unset bound falls back to the program start / last written byte
  start: number | undefined;
  finish: number | undefined;

  constructor(config: MemoryConfig = {}) {
    if (config.start !== undefined && !isAddress(config.start)) {
      throw new ConfigError(`Invalid memory start ${config.start}`);
    }
    if (config.end !== undefined && !isAddress(config.end)) {
      throw new ConfigError(`Invalid memory end ${config.end}`);
    }
    this.start = config.start;
    this.finish = config.end;
  }

  setRange(start: number, finish: number): void {
    if (!isAddress(start) || !isAddress(finish) || finish < start) {
      throw new ConfigError(`Invalid memory range ${start}..${finish}`);
    }
    this.start = start;
    this.finish = finish;
  }

  write(address: number, value: number, owner: string): void {
    if (!isAddress(address)) {
      throw new AddressRangeError(address);
    }
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new ByteRangeError(value);
    }
    const existing = this.cells[address];
    if (existing && existing.owner !== owner) {
      throw new OwnershipConflictError(address, existing.owner, owner);
    }
    this.cells[address] = { value, owner };
  }

  read(address: number): number | undefined {
    return this.cells[address]?.value;
  }

  entry(address: number): MemoryCell | undefined {
    const cell = this.cells[address];
    return cell ? { ...cell } : undefined;
  }

  ownerOf(address: number): string | undefined {
    return this.cells[address]?.owner;
  }

  /** Lowest and highest written address, or undefined when nothing was written. */
  writtenRange(): { from: number; to: number } | undefined {
    let from = -1;
    let to = -1;
    for (let address = 0; address < ADDRESS_SPACE; address++) {
      if (this.cells[address]) {
        if (from < 0) from = address;
        to = address;
      }
    }
    return from < 0 ? undefined : { from, to };
  }

  /** Bytes of `start..finish` inclusive; unwritten cells read as zero. */
  slice(start: number, finish: number): Uint8Array {
    const bytes = new Uint8Array(Math.max(0, finish - start + 1));
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = this.cells[start + i]?.value ?? 0;
    }
    return bytes;
  }

  /** Contiguous runs of cells written by the same owner, in address order. */
  ownerRuns(): OwnerRun[] {
    const runs: OwnerRun[] = [];
    let current: OwnerRun | undefined;
    for (let address = 0; address < ADDRESS_SPACE; address++) {
      const cell = this.cells[address];
      if (!cell) {
        current = undefined;
        continue;
      }
      if (current && current.owner === cell.owner && current.to === address - 1) {
        current.to = address;
      } else {
        current = { owner: cell.owner, from: address, to: address };
        runs.push(current);
      }
    }
    return runs;
  }
}
