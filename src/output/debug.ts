/**
 * Debug exports
 *
 * Listings produced from a finished compilation: monitor-style label, watch
 * and breakpoint files, and their JSON counterparts for debuggers that read
 * `{ Version, Segments }` documents.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { CompilationResult } from '../assembler/compiler.js';
import type { Breakpoint, Watch } from '../assembler/context.js';
import type { Reference } from '../assembler/labels.js';
import type { OwnerRun } from '../assembler/memory.js';

export type DebuggerBreakpointType = 'CpuPC' | 'Memory' | 'RasterLine';

export interface DebuggerBreakpoint {
  IsActive: boolean;
  Addr: number;
  Actions: number;
  Data: number;
  MemoryAccess?: number;
  Value?: number;
  Comparison?: number;
}

function hex(value: number): string {
  return value.toString(16);
}

function segments(segment: Record<string, unknown>): string {
  return JSON.stringify({ Version: '1', Segments: [{ Name: 'Default', ...segment }] }, null, 2);
}

export function formatLabels(labels: Map<string, number>): string {
  return [...labels].map(([name, address]) => `${name} = $${hex(address)}`).join('\n');
}

export function formatWatches(watches: Watch[]): string {
  return watches.map((w) => `${w.label} = $${w.address}`).join('\n');
}

export function formatBreakpoints(breakpoints: Breakpoint[]): string {
  return breakpoints.map((b) => `${b.type} ${b.params}`).join('\n');
}

export function formatDebuggerLabels(labels: Map<string, number>): string {
  const codeLabels = [...labels].map(([name, address]) => ({ Address: hex(address), Name: name }));
  return segments({ CodeLabels: codeLabels });
}

export function formatDebuggerWatches(watches: Watch[]): string {
  const items = watches.map((w) => ({ Label: w.label, Address: w.address, Format: 'hex8' }));
  return segments({ Watches: items });
}

function debuggerBreakpoint(breakpoint: Breakpoint): [DebuggerBreakpointType, DebuggerBreakpoint] {
  switch (breakpoint.type) {
    case 'breakonpc':
      return ['CpuPC', { IsActive: true, Addr: parseInt(breakpoint.params, 16), Actions: 2, Data: 0 }];
    case 'breakraster':
      return ['RasterLine', { IsActive: true, Addr: parseInt(breakpoint.params, 10), Actions: 2, Data: 0 }];
    case 'breakmem': {
      // params is "<hex address><condition>"
      const address = /^[0-9a-f]+/i.exec(breakpoint.params);
      return [
        'Memory',
        {
          IsActive: true,
          Addr: address ? parseInt(address[0], 16) : 0,
          Actions: 2,
          Data: 0,
          MemoryAccess: 6,
          Value: 255,
          Comparison: 2,
        },
      ];
    }
  }
}

export function formatDebuggerBreakpoints(breakpoints: Breakpoint[]): string {
  const byType = new Map<DebuggerBreakpointType, DebuggerBreakpoint[]>();
  for (const breakpoint of breakpoints) {
    const [type, item] = debuggerBreakpoint(breakpoint);
    const items = byType.get(type) ?? [];
    items.push(item);
    byType.set(type, items);
  }
  const groups = [...byType].map(([type, items]) => ({ Type: type, Items: items }));
  return segments({ Breakpoints: groups });
}

/** One line per label that was used before its definition. */
export function formatReferences(references: Reference[]): string {
  const byName = new Map<string, number[]>();
  for (const { name, address } of references) {
    byName.set(name, [...(byName.get(name) ?? []), address]);
  }
  return [...byName]
    .map(([name, addresses]) => `${name}: ${addresses.map((a) => '$' + hex(a).toUpperCase()).join(', ')}`)
    .join('\n');
}

export function formatOwnership(runs: OwnerRun[]): string {
  return runs
    .map((run) => `${run.owner}: $${hex(run.from).toUpperCase()} - $${hex(run.to).toUpperCase()}`)
    .join('\n');
}

/** Write every listing for `result` into `directory`; returns the written paths. */
export function writeDebugFiles(directory: string, basename: string, result: CompilationResult): string[] {
  const files: [string, string][] = [
    [`${basename}.labels`, formatLabels(result.labels)],
    [`${basename}.watches`, formatWatches(result.watches)],
    [`${basename}.breakpoints`, formatBreakpoints(result.breakpoints)],
    [`${basename}.json.labels`, formatDebuggerLabels(result.labels)],
    [`${basename}.json.watches`, formatDebuggerWatches(result.watches)],
    [`${basename}.json.breakpoints`, formatDebuggerBreakpoints(result.breakpoints)],
  ];
  mkdirSync(directory, { recursive: true });
  return files.map(([name, content]) => {
    const path = join(directory, name);
    writeFileSync(path, content);
    return path;
  });
}
