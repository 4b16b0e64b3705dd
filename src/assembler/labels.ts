/**
 * Label table and reference tracker
 *
 * Labels map names to 16-bit addresses. During discovery an unknown name
 * resolves to a placeholder and the lookup is recorded as a reference; in
 * the final pass every name must be known.
 */

import { AddressRangeError, ConfigError, DuplicateLabelError, UndefinedLabelError } from './errors.js';
import type { AddressingMode } from './opcodes.js';
import type { OperandValue } from './operand.js';
import { Phase } from './phase.js';

// Large enough to select the absolute family of modes, never a zero-page address
export const DEFAULT_PLACEHOLDER = 12345;

export interface Reference {
  name: string;
  address: number;
  /** Addressing mode chosen for the instruction at `address` while the name was unknown. */
  mode?: AddressingMode;
}

export interface LabelDrift {
  name: string;
  discovery: number;
  final: number;
}

/** What the table needs to know about the running compilation. */
export interface LabelSession {
  readonly phase: Phase;
  readonly pc: number;
}

function checkAddress(address: number): number {
  if (!Number.isInteger(address) || address < 0 || address > 0xffff) {
    throw new AddressRangeError(address);
  }
  return address;
}

export class LabelTable {
  private labels = new Map<string, number>();
  private refs: Reference[] = [];
  private pins = new Map<number, AddressingMode>();
  private drifts: LabelDrift[] = [];
  readonly placeholder: number;

  constructor(private readonly session: LabelSession, placeholder: number = DEFAULT_PLACEHOLDER) {
    if (!Number.isInteger(placeholder) || placeholder < 0x100 || placeholder > 0xffff) {
      throw new ConfigError(`Placeholder ${placeholder} must lie in 256..65535`);
    }
    this.placeholder = placeholder;
  }

  define(name: string, address: number = this.session.pc): number {
    checkAddress(address);
    const existing = this.labels.get(name);
    if (existing !== undefined) {
      if (this.session.phase === Phase.DISCOVERY) {
        throw new DuplicateLabelError(name);
      }
      if (existing !== address) {
        this.drifts.push({ name, discovery: existing, final: address });
      }
    }
    this.labels.set(name, address);
    return address;
  }

  /** Define `name_lo` at the cursor and `name_hi` one byte after it. */
  defineDouble(name: string): void {
    this.define(`${name}_lo`);
    this.define(`${name}_hi`, this.session.pc + 1);
  }

  resolve(name: string): OperandValue {
    const address = this.labels.get(name);
    if (address !== undefined) {
      return { value: address, pending: false };
    }
    if (this.session.phase === Phase.FINAL) {
      throw new UndefinedLabelError(name);
    }
    const pc = this.session.pc;
    if (!this.refs.some((r) => r.name === name && r.address === pc)) {
      this.refs.push({ name, address: pc });
    }
    return { value: this.placeholder, pending: true };
  }

  /** Record the mode a pending operand was encoded with at `address`. */
  pinMode(address: number, mode: AddressingMode): void {
    this.pins.set(address, mode);
    for (const reference of this.refs) {
      if (reference.address === address) reference.mode = mode;
    }
  }

  pinnedMode(address: number): AddressingMode | undefined {
    return this.pins.get(address);
  }

  has(name: string): boolean {
    return this.labels.has(name);
  }

  get(name: string): number | undefined {
    return this.labels.get(name);
  }

  entries(): [string, number][] {
    return [...this.labels.entries()];
  }

  references(): Reference[] {
    return this.refs.map((r) => ({ ...r }));
  }

  /** Labels whose final-pass address differs from the discovery-pass address. */
  drift(): LabelDrift[] {
    return [...this.drifts];
  }
}
