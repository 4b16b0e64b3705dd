/**
 * Components
 *
 * A component is a reusable piece of a program: some code, its variables,
 * its subroutines and the components it contains. Every byte a component
 * renders is owned by the component's id, so two components that end up
 * generating into the same memory fail loudly instead of overwriting each
 * other.
 */

import type { Program } from '../assembler/compiler.js';
import type { Emitter } from '../assembler/emitter.js';

export type Routine = (asm: Emitter) => void;

export interface ComponentLocation {
  start: number;
  end: number; // last byte, inclusive
}

const instanceCounts = new Map<string, number>();

function nextId(name: string): string {
  const index = instanceCounts.get(name) ?? 0;
  instanceCounts.set(name, index + 1);
  return `${name}${index}`;
}

function hex(value: number): string {
  return value.toString(16).toUpperCase();
}

export abstract class Component {
  readonly name: string;
  readonly id: string;
  readonly children: Component[] = [];
  location: ComponentLocation | undefined;

  // Ids default to the class name plus a per-class instance index: Screen0, Screen1, ...
  constructor(name?: string) {
    this.name = name ?? new.target.name;
    this.id = nextId(this.name);
  }

  add<T extends Component>(child: T): T {
    this.children.push(child);
    return child;
  }

  /** Label of one of this component's routines. */
  label(routine: string): string {
    return `${this.id}_${routine}`;
  }

  call(asm: Emitter, routine: string): void {
    asm.emit('JSR', this.label(routine));
  }

  /** Main code of the component. */
  protected build(_asm: Emitter): void {}

  /** Storage the component reserves after its code. */
  protected variables(_asm: Emitter): void {}

  /** Subroutines by name; each is rendered under its label and closed with RTS. */
  protected routines(): Record<string, Routine> {
    return {};
  }

  render(asm: Emitter): void {
    const start = asm.pc;
    asm.withOwner(this.id, () => {
      this.build(asm);
      this.variables(asm);
      const routines = this.routines();
      for (const name of Object.keys(routines).sort()) {
        asm.subroutine(this.label(name), () => routines[name](asm));
      }
    });
    const end = asm.pc - 1;

    for (const child of this.children) {
      child.render(asm);
    }

    if (asm.context.final) {
      this.location = { start, end };
      if (asm.context.verbose) {
        console.log(`Location for ${this.id}: ${hex(start)} - ${hex(end)}`);
      }
    }
  }
}

/** A program that renders `root` and everything it contains. */
export function componentProgram(root: Component): Program {
  return (asm) => root.render(asm);
}
