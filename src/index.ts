// sixtyfive - two-pass 6502 assembler

// Instruction table
export {
  AddressingMode,
  MNEMONICS,
  allDescriptors,
  descriptorForOpcode,
  hasMode,
  isBranch,
  isImpliedOnly,
  isMnemonic,
  lookup,
  modesOf,
  type InstructionDescriptor,
  type Mnemonic,
} from './assembler/opcodes.js';

// Assembler core
export { Processor, DEFAULT_PROCESSOR_CONFIG, type ProcessorConfig, type ProcessorStatus } from './assembler/processor.js';
export { MemoryImage, ADDRESS_SPACE, type MemoryCell, type MemoryConfig, type OwnerRun } from './assembler/memory.js';
export { LabelTable, DEFAULT_PLACEHOLDER, type LabelDrift, type Reference } from './assembler/labels.js';
export { Phase } from './assembler/phase.js';
export {
  add,
  evaluate,
  here,
  hi,
  hiLo,
  lo,
  ref,
  sub,
  type Expression,
  type Operand,
  type OperandValue,
} from './assembler/operand.js';
export {
  branchOffset,
  encode,
  resolveAddressing,
  selectMode,
  type AddressingFlags,
  type IndexRegister,
} from './assembler/addressing.js';
export {
  CompilationContext,
  DEFAULT_OWNER,
  type Breakpoint,
  type ContextOptions,
  type PassStats,
  type Watch,
} from './assembler/context.js';
export { Emitter, screenCodes, type EmitOptions, type SetOptions, type SetupOptions } from './assembler/emitter.js';
export {
  Assembler,
  DEFAULT_OPTIONS,
  compile,
  type AssemblerOptions,
  type CompilationResult,
  type Program,
} from './assembler/compiler.js';
export * from './assembler/errors.js';

// Components
export { Component, componentProgram, type ComponentLocation, type Routine } from './component/component.js';

// Output
export { toPrg, resultToPrg, writePrg } from './output/prg.js';
export {
  formatBreakpoints,
  formatDebuggerBreakpoints,
  formatDebuggerLabels,
  formatDebuggerWatches,
  formatLabels,
  formatOwnership,
  formatReferences,
  formatWatches,
  writeDebugFiles,
} from './output/debug.js';

// Source front end
export { Lexer, LexerError, TokenType, type Token } from './source/lexer.js';
export { Parser, ParserError, NodeType, parse, type AST, type ASTNode } from './source/parser.js';
export { SourceError, assembleSource, sourceProgram } from './source/program.js';
export { main as runCli } from './cli.js';
