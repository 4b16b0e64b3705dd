import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatHexDump, main } from '../src/cli.js';

describe('CLI', () => {
  let dir: string;
  let log: MockInstance;
  let error: MockInstance;

  function source(name: string, text: string): string {
    const path = join(dir, name);
    writeFileSync(path, text);
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sixtyfive-cli-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should assemble a file next to its source', () => {
    const input = source('prog.asm', 'LDA #$42\nSTA $D020\n');
    expect(main(['node', 'sixtyfive', input])).toBe(0);
    const output = join(dir, 'prog.prg');
    expect(new Uint8Array(readFileSync(output))).toEqual(
      new Uint8Array([0x00, 0x10, 0xa9, 0x42, 0x8d, 0x20, 0xd0]),
    );
    expect(log).toHaveBeenCalledWith(`Assembled 5 bytes to ${output}`);
  });

  it('should honour the output file and start address', () => {
    const input = source('prog.asm', 'RTS\n');
    const output = join(dir, 'custom.prg');
    expect(main(['node', 'sixtyfive', input, '-o', output, '--start', '$C000'])).toBe(0);
    expect(new Uint8Array(readFileSync(output))).toEqual(new Uint8Array([0x00, 0xc0, 0x60]));
  });

  it('should write a labels file on request', () => {
    const input = source('labels.asm', 'start: RTS\n');
    expect(main(['node', 'sixtyfive', input, '--labels'])).toBe(0);
    expect(readFileSync(join(dir, 'labels.labels'), 'utf-8')).toBe('start = $1000');
  });

  it('should print a hex dump on request', () => {
    const input = source('dump.asm', 'RTS\n');
    expect(main(['node', 'sixtyfive', input, '--hex'])).toBe(0);
    expect(log).toHaveBeenCalledWith('\nHex dump:');
  });

  it('should report assembly errors and fail', () => {
    const input = source('bad.asm', 'JMP nowhere\n');
    expect(main(['node', 'sixtyfive', input])).toBe(1);
    expect(error).toHaveBeenCalledWith(`${input}: line 1, column 1: Undefined label 'nowhere'`);
    expect(existsSync(join(dir, 'bad.prg'))).toBe(false);
  });

  it('should report a missing input file', () => {
    const input = join(dir, 'missing.asm');
    expect(main(['node', 'sixtyfive', input])).toBe(1);
    expect(error).toHaveBeenCalledWith(`Error: File not found: ${input}`);
  });

  it('should print usage without arguments', () => {
    expect(main(['node', 'sixtyfive'])).toBe(1);
    expect(main(['node', 'sixtyfive', '--help'])).toBe(0);
  });

  it('should reject unknown options', () => {
    expect(main(['node', 'sixtyfive', 'prog.asm', '--fast'])).toBe(1);
    expect(error).toHaveBeenCalledWith("Error: Unknown option '--fast'");
  });
});

describe('formatHexDump', () => {
  it('should print sixteen bytes per line with their address', () => {
    const bytes = new Uint8Array(16).map((_, i) => 0x41 + i);
    expect(formatHexDump(bytes, 0x1000)).toBe(
      '1000: 41 42 43 44  45 46 47 48  49 4a 4b 4c  4d 4e 4f 50  |ABCDEFGHIJKLMNOP|',
    );
  });
});
