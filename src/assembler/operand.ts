/**
 * Operand expressions
 *
 * An operand is a number, a label name, or a small expression tree over
 * labels (`ref`, `lo`, `hi`, `add`, `sub`, `here`). Expressions are
 * evaluated against the label table at the moment an instruction is emitted,
 * so the same expression yields a placeholder-based value during discovery
 * and the real value in the final pass.
 */

import { ValueRangeError } from './errors.js';

export type BytePart = 'lo' | 'hi';

export type Expression =
  | { readonly kind: 'label'; readonly name: string }
  | { readonly kind: 'pc' }
  | { readonly kind: 'binary'; readonly op: '+' | '-'; readonly left: Operand; readonly right: Operand }
  | { readonly kind: 'byte'; readonly part: BytePart; readonly operand: Operand };

export type Operand = number | string | Expression;

export interface OperandValue {
  value: number;
  /** True when any label in the operand was not yet defined (discovery only). */
  pending: boolean;
}

export interface EvaluationScope {
  resolve(name: string): OperandValue;
  readonly pc: number;
}

export function ref(name: string): Expression {
  return { kind: 'label', name };
}

export function here(): Expression {
  return { kind: 'pc' };
}

export function add(left: Operand, right: Operand): Expression {
  return { kind: 'binary', op: '+', left, right };
}

export function sub(left: Operand, right: Operand): Expression {
  return { kind: 'binary', op: '-', left, right };
}

export function lo(operand: Operand): Expression {
  return { kind: 'byte', part: 'lo', operand };
}

export function hi(operand: Operand): Expression {
  return { kind: 'byte', part: 'hi', operand };
}

/**
 * Split a 16-bit value into its high and low byte.
 * Throws ValueRangeError outside 0..65535.
 */
export function hiLo(value: number): { hi: number; lo: number } {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new ValueRangeError(value);
  }
  const high = Math.floor(value / 256);
  return { hi: high, lo: value - high * 256 };
}

export function evaluate(operand: Operand, scope: EvaluationScope): OperandValue {
  if (typeof operand === 'number') {
    return { value: operand, pending: false };
  }
  if (typeof operand === 'string') {
    return scope.resolve(operand);
  }
  switch (operand.kind) {
    case 'label':
      return scope.resolve(operand.name);
    case 'pc':
      return { value: scope.pc, pending: false };
    case 'binary': {
      const left = evaluate(operand.left, scope);
      const right = evaluate(operand.right, scope);
      return {
        value: operand.op === '+' ? left.value + right.value : left.value - right.value,
        pending: left.pending || right.pending,
      };
    }
    case 'byte': {
      const inner = evaluate(operand.operand, scope);
      // Placeholder arithmetic may leave 16 bits; only real values are range checked
      const split = hiLo(inner.pending ? inner.value & 0xffff : inner.value);
      return { value: operand.part === 'lo' ? split.lo : split.hi, pending: inner.pending };
    }
  }
}

/**
 * True for a `lo`/`hi` byte part, optionally offset by a constant. Such an
 * operand stays below 256 whatever its labels resolve to.
 */
export function isBytePart(operand: Operand): boolean {
  if (typeof operand !== 'object') return false;
  if (operand.kind === 'byte') return true;
  if (operand.kind !== 'binary') return false;
  return (
    (isBytePart(operand.left) && typeof operand.right === 'number') ||
    (operand.op === '+' && typeof operand.left === 'number' && isBytePart(operand.right))
  );
}

export function isExpression(value: unknown): value is Expression {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  const { kind } = value;
  return kind === 'label' || kind === 'pc' || kind === 'binary' || kind === 'byte';
}
