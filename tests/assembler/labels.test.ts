import { describe, it, expect } from 'vitest';
import { LabelTable } from '../../src/assembler/labels.js';
import { AddressingMode } from '../../src/assembler/opcodes.js';
import { Phase } from '../../src/assembler/phase.js';
import {
  ConfigError,
  DuplicateLabelError,
  UndefinedLabelError,
} from '../../src/assembler/errors.js';

function session(pc = 0x1000): { phase: Phase; pc: number } {
  return { phase: Phase.DISCOVERY, pc };
}

describe('LabelTable', () => {
  it('should define labels at the cursor or an explicit address', () => {
    const labels = new LabelTable(session());
    expect(labels.define('start')).toBe(0x1000);
    expect(labels.define('screen', 0x0400)).toBe(0x0400);
    expect(labels.get('start')).toBe(0x1000);
    expect(labels.has('screen')).toBe(true);
    expect(labels.entries()).toEqual([
      ['start', 0x1000],
      ['screen', 0x0400],
    ]);
  });

  it('should reject a second definition during discovery', () => {
    const labels = new LabelTable(session());
    labels.define('loop');
    expect(() => labels.define('loop')).toThrow(DuplicateLabelError);
    expect(() => labels.define('loop')).toThrow("Double definition of label 'loop'");
  });

  it('should answer unknown names with the placeholder during discovery', () => {
    const state = session();
    const labels = new LabelTable(state);
    expect(labels.resolve('later')).toEqual({ value: 12345, pending: true });
    expect(labels.resolve('later')).toEqual({ value: 12345, pending: true });
    state.pc = 0x1003;
    labels.resolve('later');
    expect(labels.references()).toEqual([
      { name: 'later', address: 0x1000 },
      { name: 'later', address: 0x1003 },
    ]);
  });

  it('should resolve known names without recording a reference', () => {
    const labels = new LabelTable(session());
    labels.define('here');
    expect(labels.resolve('here')).toEqual({ value: 0x1000, pending: false });
    expect(labels.references()).toEqual([]);
  });

  it('should fail on unknown names in the final pass', () => {
    const state = session();
    const labels = new LabelTable(state);
    state.phase = Phase.FINAL;
    expect(() => labels.resolve('nowhere')).toThrow(UndefinedLabelError);
    expect(() => labels.resolve('nowhere')).toThrow("Undefined label 'nowhere'");
  });

  it('should allow redefinition in the final pass and record moved labels', () => {
    const state = session();
    const labels = new LabelTable(state);
    labels.define('same');
    labels.define('moved', 0x2000);
    state.phase = Phase.FINAL;
    labels.define('same');
    labels.define('moved', 0x2001);
    expect(labels.get('moved')).toBe(0x2001);
    expect(labels.drift()).toEqual([{ name: 'moved', discovery: 0x2000, final: 0x2001 }]);
  });

  it('should define lo/hi pairs', () => {
    const labels = new LabelTable(session(0x2000));
    labels.defineDouble('pointer');
    expect(labels.get('pointer_lo')).toBe(0x2000);
    expect(labels.get('pointer_hi')).toBe(0x2001);
  });

  it('should use a configurable placeholder of at least 256', () => {
    expect(new LabelTable(session(), 0x8000).resolve('x').value).toBe(0x8000);
    expect(() => new LabelTable(session(), 255)).toThrow(ConfigError);
    expect(() => new LabelTable(session(), 0x10000)).toThrow(ConfigError);
  });

  it('should pin the mode of the instruction holding a reference', () => {
    const labels = new LabelTable(session());
    labels.resolve('target');
    labels.pinMode(0x1000, AddressingMode.ABSOLUTE);
    expect(labels.pinnedMode(0x1000)).toBe(AddressingMode.ABSOLUTE);
    expect(labels.pinnedMode(0x1001)).toBeUndefined();
    expect(labels.references()).toEqual([{ name: 'target', address: 0x1000, mode: AddressingMode.ABSOLUTE }]);
  });
});
