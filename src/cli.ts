#!/usr/bin/env node
/**
 * 6502 Assembler CLI
 *
 * Usage: sixtyfive <input.asm> [-o output.prg] [--start $1000] [--labels] [--hex]
 */

import { readFileSync, realpathSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { AssemblyError } from './assembler/errors.js';
import { formatLabels } from './output/debug.js';
import { writePrg } from './output/prg.js';
import { assembleSource } from './source/program.js';

interface CliOptions {
  inputFile: string;
  outputFile: string;
  start: number | undefined;
  labels: boolean;
  hexDump: boolean;
  verbose: boolean;
}

function parseNumber(text: string): number {
  if (text.startsWith('$')) return parseInt(text.slice(1), 16);
  if (/^0x/i.test(text)) return parseInt(text.slice(2), 16);
  return parseInt(text, 10);
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let inputFile = '';
  let outputFile = '';
  let start: number | undefined;
  let labels = false;
  let hexDump = false;
  let verbose = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-o' || arg === '--output') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: -o requires an output filename');
        return null;
      }
      outputFile = cliArgs[++i];
    } else if (arg === '--start') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: --start requires an address');
        return null;
      }
      start = parseNumber(cliArgs[++i]);
      if (Number.isNaN(start)) {
        console.error(`Error: Invalid start address '${cliArgs[i]}'`);
        return null;
      }
    } else if (arg === '--labels') {
      labels = true;
    } else if (arg === '--hex') {
      hexDump = true;
    } else if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  if (!outputFile) {
    outputFile = inputFile.replace(/\.(asm|s)$/i, '') + '.prg';
  }

  return { inputFile, outputFile, start, labels, hexDump, verbose };
}

function printUsage(): void {
  console.log(`6502 Assembler

Usage: sixtyfive <input.asm> [-o output.prg] [--start $1000] [--labels] [--hex]

Options:
  -o, --output <file>  Output file (default: <input>.prg)
  --start <address>    Load address ($hex, 0xhex or decimal; default: $1000)
  --labels             Write <output>.labels next to the output
  --hex                Print hex dump of output
  -v, --verbose        Print pass summaries
  -h, --help           Show this help message

Examples:
  sixtyfive program.asm
  sixtyfive program.asm -o game.prg --start $0801
  sixtyfive program.asm --hex`);
}

export function formatHexDump(bytes: Uint8Array, origin = 0): string {
  const lines: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += 16) {
    const hexParts: string[] = [];
    const asciiParts: string[] = [];

    for (let i = 0; i < 16; i++) {
      if (offset + i < bytes.length) {
        const byte = bytes[offset + i];
        hexParts.push(byte.toString(16).padStart(2, '0'));
        asciiParts.push(byte >= 32 && byte < 127 ? String.fromCharCode(byte) : '.');
      } else {
        hexParts.push('  ');
        asciiParts.push(' ');
      }

      // Extra space between groups of 4
      if (i === 3 || i === 7 || i === 11) {
        hexParts.push('');
      }
    }

    const address = (origin + offset).toString(16).padStart(4, '0');
    lines.push(`${address}: ${hexParts.join(' ')}  |${asciiParts.join('')}|`);
  }

  return lines.join('\n');
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some((a) => a === '-h' || a === '--help') ? 0 : 1;
  }

  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  try {
    const result = assembleSource(source, { start: options.start, verbose: options.verbose });
    const prg = writePrg(options.outputFile, result);
    console.log(`Assembled ${result.bytes.length} bytes to ${options.outputFile}`);

    if (options.labels) {
      const labelsFile = options.outputFile.replace(/\.prg$/i, '') + '.labels';
      writeFileSync(labelsFile, formatLabels(result.labels));
      console.log(`Wrote ${result.labels.size} labels to ${labelsFile}`);
    }

    if (options.hexDump) {
      console.log('\nHex dump:');
      console.log(formatHexDump(prg.subarray(2), result.start));
    }
  } catch (e) {
    if (e instanceof AssemblyError) {
      console.error(`${options.inputFile}: ${e.message}`);
      return 1;
    }
    throw e;
  }

  return 0;
}

// Run if executed directly
if (process.argv[1] !== undefined && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exit(main());
}
