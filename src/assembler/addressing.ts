/**
 * Addressing-mode resolver
 *
 * Decides which addressing mode an instruction is encoded with from its
 * operand value, optional index register and the zeropage/indirect flags,
 * and produces the instruction bytes.
 */

import { BranchOutOfRangeError, IllegalAddressingError } from './errors.js';
import { AddressingMode, type InstructionDescriptor, type Mnemonic, hasMode, isBranch, lookup } from './opcodes.js';
import { type EvaluationScope, type Operand, evaluate, hiLo, isBytePart } from './operand.js';

export type IndexRegister = 'X' | 'Y';

export interface AddressingFlags {
  zeropage?: boolean;
  indirect?: boolean;
}

export interface EncodedInstruction {
  descriptor: InstructionDescriptor;
  bytes: number[];
}

export function isIndexRegister(value: unknown): value is IndexRegister {
  return value === 'X' || value === 'Y';
}

/**
 * Select the addressing mode for a non-branch instruction with an operand.
 * Values below 256 pick the immediate or zero-page indexed form only where
 * the mnemonic has one; `indirect` without an index is always the absolute
 * indirect form.
 */
export function selectMode(
  mnemonic: Mnemonic,
  value: number,
  index: IndexRegister | undefined,
  flags: AddressingFlags = {},
): AddressingMode {
  const { zeropage = false, indirect = false } = flags;

  if (index === undefined) {
    if (indirect) return AddressingMode.INDIRECT;
    if (zeropage) return AddressingMode.ZERO_PAGE;
    if (value < 256 && hasMode(mnemonic, AddressingMode.IMMEDIATE)) return AddressingMode.IMMEDIATE;
    return AddressingMode.ABSOLUTE;
  }

  if (indirect) {
    if (zeropage || value < 256) {
      return index === 'X' ? AddressingMode.INDEXED_INDIRECT : AddressingMode.INDIRECT_INDEXED;
    }
    throw new IllegalAddressingError(mnemonic, `indirect ${index}-indexed operand must be a zero-page address, got ${value}`);
  }

  const zeroPageIndexed = index === 'X' ? AddressingMode.ZERO_PAGE_X : AddressingMode.ZERO_PAGE_Y;
  if (zeropage || (value < 256 && hasMode(mnemonic, zeroPageIndexed))) {
    return zeroPageIndexed;
  }
  return index === 'X' ? AddressingMode.ABSOLUTE_X : AddressingMode.ABSOLUTE_Y;
}

/**
 * Signed displacement byte for a branch at `pc` to `target`.
 * Out-of-range displacements only fail when `checkRange` is set.
 */
export function branchOffset(mnemonic: Mnemonic, pc: number, target: number, checkRange: boolean): number {
  const displacement = target - (pc + 2);
  if (checkRange && (displacement > 127 || displacement < -128)) {
    throw new BranchOutOfRangeError(mnemonic, pc, target, displacement);
  }
  return displacement < 0 ? (256 + displacement) & 0xff : displacement & 0xff;
}

/**
 * Opcode followed by 0, 1 or 2 (little-endian) operand bytes.
 * Pending operands carry placeholder arithmetic and are masked to fit.
 */
export function encode(descriptor: InstructionDescriptor, value: number, pending: boolean): number[] {
  switch (descriptor.length) {
    case 1:
      return [descriptor.opcode];
    case 2:
      return [descriptor.opcode, pending ? value & 0xff : value];
    case 3: {
      const { hi, lo } = hiLo(pending ? value & 0xffff : value);
      return [descriptor.opcode, lo, hi];
    }
  }
}

export interface AddressingScope extends EvaluationScope {
  /** Branch displacements are only range checked in the final pass. */
  readonly final: boolean;
  pinnedMode(pc: number): AddressingMode | undefined;
  pinMode(pc: number, mode: AddressingMode): void;
}

/**
 * Resolve the addressing mode of one instruction and encode it.
 *
 * Label operands are resolved through the scope first. A pending operand
 * is treated as a full address unless it is a byte part, since placeholder
 * arithmetic can land anywhere. It pins the mode it was encoded with, and
 * the final pass reuses the pinned mode so both passes produce the same
 * instruction length.
 */
export function resolveAddressing(
  mnemonic: Mnemonic,
  operand: Operand | undefined,
  index: IndexRegister | undefined,
  flags: AddressingFlags,
  scope: AddressingScope,
): EncodedInstruction {
  if (operand === undefined) {
    const descriptor = lookup(mnemonic, AddressingMode.IMPLIED);
    return { descriptor, bytes: encode(descriptor, 0, false) };
  }

  const pc = scope.pc;
  const { value, pending } = evaluate(operand, scope);

  if (isBranch(mnemonic)) {
    if (index !== undefined) {
      throw new IllegalAddressingError(mnemonic, 'branches take a target address, not an indexed operand');
    }
    const descriptor = lookup(mnemonic, AddressingMode.RELATIVE);
    return { descriptor, bytes: [descriptor.opcode, branchOffset(mnemonic, pc, value, scope.final && !pending)] };
  }

  const pinned = scope.final ? scope.pinnedMode(pc) : undefined;
  const selectable = pending && !isBytePart(operand) ? Math.max(value, 0x100) : value;
  const mode = pinned ?? selectMode(mnemonic, selectable, index, flags);
  const descriptor = lookup(mnemonic, mode);
  if (pending) {
    scope.pinMode(pc, mode);
  }
  return { descriptor, bytes: encode(descriptor, value, pending) };
}
