/**
 * 6502 Instruction Table
 *
 * Maps (mnemonic, addressing mode) to opcode byte, instruction length and
 * base cycle count. The table itself lives in opcodes.json and is validated
 * once when this module loads.
 */

import table from './opcodes.json' with { type: 'json' };
import { AssemblyError, UnknownInstructionError } from './errors.js';

export const MNEMONICS = [
  'ADC', 'AND', 'ASL', 'BCC', 'BCS', 'BEQ', 'BIT', 'BMI',
  'BNE', 'BPL', 'BRK', 'BVC', 'BVS', 'CLC', 'CLD', 'CLI',
  'CLV', 'CMP', 'CPX', 'CPY', 'DEC', 'DEX', 'DEY', 'EOR',
  'INC', 'INX', 'INY', 'JMP', 'JSR', 'LDA', 'LDX', 'LDY',
  'LSR', 'NOP', 'ORA', 'PHA', 'PHP', 'PLA', 'PLP', 'ROL',
  'ROR', 'RTI', 'RTS', 'SBC', 'SEC', 'SED', 'SEI', 'STA',
  'STX', 'STY', 'TAX', 'TAY', 'TSX', 'TXA', 'TXS', 'TYA',
] as const;

export type Mnemonic = (typeof MNEMONICS)[number];

export enum AddressingMode {
  IMPLIED = 'implied',             // no operand
  IMMEDIATE = 'immediate',         // #$xx
  ZERO_PAGE = 'zeropage',          // $xx
  ZERO_PAGE_X = 'zeropage_x',      // $xx,X
  ZERO_PAGE_Y = 'zeropage_y',      // $xx,Y
  ABSOLUTE = 'absolute',           // $xxxx
  ABSOLUTE_X = 'absolute_x',       // $xxxx,X
  ABSOLUTE_Y = 'absolute_y',       // $xxxx,Y
  INDIRECT = 'indirect',           // ($xxxx)
  INDEXED_INDIRECT = 'indirect_x', // ($xx,X)
  INDIRECT_INDEXED = 'indirect_y', // ($xx),Y
  RELATIVE = 'relative',           // branch target
}

export interface InstructionDescriptor {
  readonly mnemonic: Mnemonic;
  readonly mode: AddressingMode;
  readonly opcode: number;
  readonly length: 1 | 2 | 3;
  readonly cycles: number;
}

interface RawDescriptor {
  opcode: string;
  length: number;
  cycles: number;
}

const MNEMONIC_SET: ReadonlySet<string> = new Set(MNEMONICS);
const MODE_BY_NAME = new Map<string, AddressingMode>(
  Object.values(AddressingMode).map((mode) => [mode, mode]),
);

export function isMnemonic(name: string): name is Mnemonic {
  return MNEMONIC_SET.has(name);
}

function toLength(value: number, where: string): 1 | 2 | 3 {
  if (value === 1 || value === 2 || value === 3) return value;
  throw new AssemblyError(`Invalid instruction length ${value} for ${where}`);
}

function loadTable(raw: Record<string, Record<string, RawDescriptor>>) {
  const byMnemonic = new Map<Mnemonic, Map<AddressingMode, InstructionDescriptor>>();
  const byOpcode = new Map<number, InstructionDescriptor>();

  for (const [name, modes] of Object.entries(raw)) {
    if (!isMnemonic(name)) {
      throw new AssemblyError(`Unknown mnemonic in instruction table: ${name}`);
    }
    const entries = new Map<AddressingMode, InstructionDescriptor>();
    for (const [modeName, entry] of Object.entries(modes)) {
      const mode = MODE_BY_NAME.get(modeName);
      if (mode === undefined) {
        throw new AssemblyError(`Unknown addressing mode in instruction table: ${name} ${modeName}`);
      }
      const opcode = Number(entry.opcode);
      if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xff) {
        throw new AssemblyError(`Invalid opcode ${entry.opcode} for ${name} ${modeName}`);
      }
      const existing = byOpcode.get(opcode);
      if (existing) {
        throw new AssemblyError(
          `Opcode ${entry.opcode} used by both ${existing.mnemonic} ${existing.mode} and ${name} ${modeName}`,
        );
      }
      const descriptor: InstructionDescriptor = Object.freeze({
        mnemonic: name,
        mode,
        opcode,
        length: toLength(entry.length, `${name} ${modeName}`),
        cycles: entry.cycles,
      });
      entries.set(mode, descriptor);
      byOpcode.set(opcode, descriptor);
    }
    byMnemonic.set(name, entries);
  }

  for (const mnemonic of MNEMONICS) {
    if (!byMnemonic.has(mnemonic)) {
      throw new AssemblyError(`Instruction table has no entry for ${mnemonic}`);
    }
  }

  return { byMnemonic, byOpcode };
}

const { byMnemonic, byOpcode } = loadTable(table);

/**
 * Look up the encoding of a mnemonic in a given addressing mode.
 * Throws UnknownInstructionError when the pair does not exist.
 */
export function lookup(mnemonic: Mnemonic, mode: AddressingMode): InstructionDescriptor {
  const descriptor = byMnemonic.get(mnemonic)?.get(mode);
  if (!descriptor) {
    throw new UnknownInstructionError(mnemonic, mode);
  }
  return descriptor;
}

export function hasMode(mnemonic: Mnemonic, mode: AddressingMode): boolean {
  return byMnemonic.get(mnemonic)?.has(mode) ?? false;
}

export function modesOf(mnemonic: Mnemonic): AddressingMode[] {
  return [...(byMnemonic.get(mnemonic)?.keys() ?? [])];
}

// Branches are the only instructions with a relative variant, and it is their only variant
export function isBranch(mnemonic: Mnemonic): boolean {
  return hasMode(mnemonic, AddressingMode.RELATIVE);
}

export function isImpliedOnly(mnemonic: Mnemonic): boolean {
  const modes = byMnemonic.get(mnemonic);
  return modes !== undefined && modes.size === 1 && modes.has(AddressingMode.IMPLIED);
}

export function descriptorForOpcode(opcode: number): InstructionDescriptor | undefined {
  return byOpcode.get(opcode);
}

export function allDescriptors(): InstructionDescriptor[] {
  return [...byOpcode.values()].sort((a, b) => a.opcode - b.opcode);
}
