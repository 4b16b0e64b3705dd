import { describe, it, expect } from 'vitest';
import { branchOffset, encode, resolveAddressing, selectMode } from '../../src/assembler/addressing.js';
import { CompilationContext } from '../../src/assembler/context.js';
import { AddressingMode, lookup } from '../../src/assembler/opcodes.js';
import { sub } from '../../src/assembler/operand.js';
import {
  BranchOutOfRangeError,
  IllegalAddressingError,
  ValueRangeError,
} from '../../src/assembler/errors.js';

describe('selectMode', () => {
  it('should choose between immediate, zero page and absolute without an index', () => {
    expect(selectMode('LDA', 0x42, undefined)).toBe(AddressingMode.IMMEDIATE);
    expect(selectMode('LDA', 0x42, undefined, { zeropage: true })).toBe(AddressingMode.ZERO_PAGE);
    expect(selectMode('LDA', 0x1234, undefined)).toBe(AddressingMode.ABSOLUTE);
    expect(selectMode('JMP', 0x1234, undefined, { indirect: true })).toBe(AddressingMode.INDIRECT);
  });

  it('should choose zero-page indexed modes for small values', () => {
    expect(selectMode('LDA', 0x10, 'X')).toBe(AddressingMode.ZERO_PAGE_X);
    expect(selectMode('LDX', 0x10, 'Y')).toBe(AddressingMode.ZERO_PAGE_Y);
    expect(selectMode('LDA', 0x1234, 'X', { zeropage: true })).toBe(AddressingMode.ZERO_PAGE_X);
  });

  it('should fall back to absolute forms the mnemonic lacks a short form for', () => {
    expect(selectMode('JMP', 0x10, undefined)).toBe(AddressingMode.ABSOLUTE);
    expect(selectMode('LDA', 0x80, 'Y')).toBe(AddressingMode.ABSOLUTE_Y);
    expect(selectMode('LDX', 0x80, 'Y')).toBe(AddressingMode.ZERO_PAGE_Y);
  });

  it('should prefer the indirect form over immediate for small pointers', () => {
    expect(selectMode('JMP', 0x10, undefined, { indirect: true })).toBe(AddressingMode.INDIRECT);
  });

  it('should choose indirect indexed modes', () => {
    expect(selectMode('LDA', 0x10, 'X', { indirect: true })).toBe(AddressingMode.INDEXED_INDIRECT);
    expect(selectMode('LDA', 0x10, 'Y', { indirect: true })).toBe(AddressingMode.INDIRECT_INDEXED);
    expect(selectMode('LDA', 0x10, 'Y', { zeropage: true, indirect: true })).toBe(AddressingMode.INDIRECT_INDEXED);
  });

  it('should choose absolute indexed modes for large values', () => {
    expect(selectMode('LDA', 0x1234, 'X')).toBe(AddressingMode.ABSOLUTE_X);
    expect(selectMode('LDA', 0x1234, 'Y')).toBe(AddressingMode.ABSOLUTE_Y);
  });

  it('should reject indirect indexing of a non-zero-page address', () => {
    expect(() => selectMode('LDA', 0x1234, 'Y', { indirect: true })).toThrow(IllegalAddressingError);
  });
});

describe('branchOffset', () => {
  const pc = 0x1000;

  it('should accept the largest forward displacement', () => {
    expect(branchOffset('BNE', pc, pc + 2 + 127, true)).toBe(0x7f);
  });

  it('should reject one byte further forward', () => {
    expect(() => branchOffset('BNE', pc, pc + 2 + 128, true)).toThrow(BranchOutOfRangeError);
    expect(() => branchOffset('BNE', pc, pc + 2 + 128, true)).toThrow(
      'Branch out of range: 128 (BNE at $1000 to $1082)',
    );
  });

  it('should accept the largest backward displacement', () => {
    expect(branchOffset('BEQ', pc, pc + 2 - 128, true)).toBe(0x80);
  });

  it('should reject one byte further backward', () => {
    expect(() => branchOffset('BEQ', pc, pc + 2 - 129, true)).toThrow(BranchOutOfRangeError);
  });

  it('should store negative displacements as 256 + d', () => {
    expect(branchOffset('BNE', pc, pc - 1, true)).toBe(256 - 3);
  });

  it('should not range check when told not to', () => {
    expect(branchOffset('BNE', pc, pc + 2 + 128, false)).toBe(0x80);
  });
});

describe('encode', () => {
  it('should emit opcode and little-endian operand bytes', () => {
    expect(encode(lookup('RTS', AddressingMode.IMPLIED), 0, false)).toEqual([0x60]);
    expect(encode(lookup('LDA', AddressingMode.IMMEDIATE), 0x42, false)).toEqual([0xa9, 0x42]);
    expect(encode(lookup('STA', AddressingMode.ABSOLUTE), 0xd020, false)).toEqual([0x8d, 0x20, 0xd0]);
  });

  it('should mask pending operands to fit', () => {
    expect(encode(lookup('LDA', AddressingMode.IMMEDIATE), 12345, true)).toEqual([0xa9, 0x39]);
    expect(encode(lookup('STA', AddressingMode.ABSOLUTE), 12345 + 0x10000, true)).toEqual([0x8d, 0x39, 0x30]);
  });

  it('should reject a known operand that does not fit 16 bits', () => {
    expect(() => encode(lookup('STA', AddressingMode.ABSOLUTE), 0x10000, false)).toThrow(ValueRangeError);
  });
});

describe('resolveAddressing', () => {
  it('should encode an instruction without operand as implied', () => {
    const context = new CompilationContext();
    const { descriptor, bytes } = resolveAddressing('RTS', undefined, undefined, {}, context);
    expect(descriptor.mode).toBe(AddressingMode.IMPLIED);
    expect(bytes).toEqual([0x60]);
  });

  it('should keep the mode chosen for a pending operand in the final pass', () => {
    const context = new CompilationContext();
    const discovery = resolveAddressing('LDA', 'zp', undefined, {}, context);
    expect(discovery.descriptor.mode).toBe(AddressingMode.ABSOLUTE);
    expect(discovery.bytes).toEqual([0xad, 0x39, 0x30]);
    expect(context.pinnedMode(0x1000)).toBe(AddressingMode.ABSOLUTE);

    context.labels.define('zp', 0x80);
    context.beginFinal();
    const final = resolveAddressing('LDA', 'zp', undefined, { zeropage: true }, context);
    expect(final.descriptor.mode).toBe(AddressingMode.ABSOLUTE);
    expect(final.bytes).toEqual([0xad, 0x80, 0x00]);
  });

  it('should treat pending label arithmetic as a full address', () => {
    const context = new CompilationContext();
    const { descriptor, bytes } = resolveAddressing('LDA', sub('end', 'begin'), 'X', {}, context);
    expect(descriptor.mode).toBe(AddressingMode.ABSOLUTE_X);
    expect(bytes).toEqual([0xbd, 0x00, 0x00]);
    expect(context.pinnedMode(0x1000)).toBe(AddressingMode.ABSOLUTE_X);
  });

  it('should select freely when the operand is known in discovery', () => {
    const context = new CompilationContext();
    context.labels.define('zp', 0x80);
    const { bytes } = resolveAddressing('LDA', 'zp', undefined, { zeropage: true }, context);
    expect(bytes).toEqual([0xa5, 0x80]);
    expect(context.pinnedMode(0x1000)).toBeUndefined();
  });

  it('should reject an indexed branch', () => {
    const context = new CompilationContext();
    expect(() => resolveAddressing('BNE', 0x1000, 'X', {}, context)).toThrow(IllegalAddressingError);
  });

  it('should only range check branches in the final pass', () => {
    const context = new CompilationContext();
    context.labels.define('far', 0x2000);
    expect(() => resolveAddressing('BNE', 'far', undefined, {}, context)).not.toThrow();
    context.beginFinal();
    expect(() => resolveAddressing('BNE', 'far', undefined, {}, context)).toThrow(
      'Branch out of range: 4094 (BNE at $1000 to $2000)',
    );
  });
});
