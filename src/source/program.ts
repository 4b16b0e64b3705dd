/**
 * Source programs
 *
 * Turns a parsed source file into a program the two-pass driver can run, so
 * textual assembly goes through exactly the same emitter as programs
 * written against the emitter API.
 */

import type { IndexRegister } from '../assembler/addressing.js';
import { type AssemblerOptions, type CompilationResult, type Program, compile } from '../assembler/compiler.js';
import { type EmitArgument, type Emitter, screenCodes } from '../assembler/emitter.js';
import { AssemblyError } from '../assembler/errors.js';
import { AddressingMode, type Mnemonic, hasMode } from '../assembler/opcodes.js';
import { type Operand, lo } from '../assembler/operand.js';
import {
  type AST,
  type ASTNode,
  type DirectiveArgument,
  type DirectiveNode,
  NodeType,
  type OperandSyntax,
  parse,
} from './parser.js';

/** An engine error annotated with the source position of the statement that raised it. */
export class SourceError extends AssemblyError {
  constructor(
    public readonly line: number,
    public readonly column: number,
    public readonly error: AssemblyError,
  ) {
    super(`line ${line}, column ${column}: ${error.message}`);
    this.name = 'SourceError';
  }
}

function defined(asm: Emitter, operand: Operand, what: string): number {
  const { value, pending } = asm.evaluate(operand);
  if (pending) {
    throw new AssemblyError(`${what} must only use labels defined above it`);
  }
  return value;
}

const ZERO_PAGE_FOR: Record<'none' | IndexRegister, AddressingMode> = {
  none: AddressingMode.ZERO_PAGE,
  X: AddressingMode.ZERO_PAGE_X,
  Y: AddressingMode.ZERO_PAGE_Y,
};

/**
 * Resolver inputs for one operand. A direct operand that is already known to
 * be below 256 is flagged zero page when the mnemonic has that form, and
 * otherwise stays absolute; anything still pending keeps the absolute form it
 * was given in discovery.
 */
function operandArguments(asm: Emitter, mnemonic: Mnemonic, syntax: OperandSyntax | undefined): EmitArgument[] {
  if (syntax === undefined) return [];
  switch (syntax.kind) {
    case 'accumulator':
      return [];
    case 'immediate':
      return [lo(syntax.value)];
    case 'direct': {
      const { value, pending } = asm.evaluate(syntax.value);
      const zeropage =
        !pending && value >= 0 && value < 256 && hasMode(mnemonic, ZERO_PAGE_FOR[syntax.index ?? 'none']);
      const args: EmitArgument[] = [syntax.value];
      if (syntax.index) args.push(syntax.index);
      if (zeropage) args.push({ zeropage });
      return args;
    }
    case 'indirect':
      return [syntax.value, { indirect: true }];
    case 'indexed-indirect':
      return [syntax.value, 'X', { zeropage: true, indirect: true }];
    case 'indirect-indexed':
      return [syntax.value, 'Y', { zeropage: true, indirect: true }];
  }
}

function directiveBytes(asm: Emitter, args: DirectiveArgument[], text: (s: string) => number[]): void {
  for (const arg of args) {
    if (arg.kind === 'string') {
      asm.byte(...text(arg.text));
    } else {
      asm.byte(arg.value);
    }
  }
}

function ascii(text: string): number[] {
  return [...text].map((ch) => ch.charCodeAt(0));
}

function runDirective(asm: Emitter, node: DirectiveNode): void {
  const values = () =>
    node.args.map((arg) => {
      if (arg.kind === 'string') {
        throw new AssemblyError(`${node.name} does not take a string`);
      }
      return arg.value;
    });

  switch (node.name) {
    case '.ORG': {
      const [address] = values();
      if (address === undefined || node.args.length !== 1) {
        throw new AssemblyError('.ORG takes exactly one address');
      }
      asm.org(defined(asm, address, '.ORG address'));
      break;
    }
    case '.BYTE':
      directiveBytes(asm, node.args, ascii);
      break;
    case '.TEXT':
      directiveBytes(asm, node.args, screenCodes);
      break;
    case '.WORD':
      asm.word(...values());
      break;
    case '.FILL': {
      const [count, data = 0] = values();
      if (count === undefined || node.args.length > 2) {
        throw new AssemblyError('.FILL takes a count and an optional byte');
      }
      const length = defined(asm, count, '.FILL count');
      for (let i = 0; i < length; i++) {
        asm.byte(data);
      }
      break;
    }
  }
}

function runStatement(asm: Emitter, node: ASTNode): void {
  switch (node.type) {
    case NodeType.LABEL:
      asm.label(node.name);
      break;
    case NodeType.ASSIGNMENT:
      asm.label(node.name, defined(asm, node.value, `Value of '${node.name}'`));
      break;
    case NodeType.INSTRUCTION:
      asm.emit(node.mnemonic, ...operandArguments(asm, node.mnemonic, node.operand));
      break;
    case NodeType.DIRECTIVE:
      runDirective(asm, node);
      break;
  }
}

export function sourceProgram(ast: AST): Program {
  return (asm) => {
    for (const node of ast.statements) {
      try {
        runStatement(asm, node);
      } catch (e) {
        if (e instanceof AssemblyError && !(e instanceof SourceError)) {
          throw new SourceError(node.line, node.column, e);
        }
        throw e;
      }
    }
  };
}

export function assembleSource(source: string, options: AssemblerOptions = {}): CompilationResult {
  return compile(sourceProgram(parse(source)), options);
}
