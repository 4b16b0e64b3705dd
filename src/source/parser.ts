/**
 * 6502 source parser
 *
 * Parses tokens into an AST of labels, assignments, instructions and
 * directives. Operand expressions are built directly as assembler operands
 * so they can be evaluated in either pass.
 */

import type { IndexRegister } from '../assembler/addressing.js';
import { AssemblyError } from '../assembler/errors.js';
import { type Mnemonic, isMnemonic } from '../assembler/opcodes.js';
import { type Operand, add, here, hi, lo, sub } from '../assembler/operand.js';
import { Lexer, type Token, TokenType } from './lexer.js';

export enum NodeType {
  LABEL = 'LABEL',
  ASSIGNMENT = 'ASSIGNMENT',
  INSTRUCTION = 'INSTRUCTION',
  DIRECTIVE = 'DIRECTIVE',
}

/** Operand syntax as written; lowered to resolver inputs by the source program. */
export type OperandSyntax =
  | { kind: 'accumulator' }
  | { kind: 'immediate'; value: Operand }
  | { kind: 'direct'; value: Operand; index?: IndexRegister }
  | { kind: 'indirect'; value: Operand }
  | { kind: 'indexed-indirect'; value: Operand } // (zp,X)
  | { kind: 'indirect-indexed'; value: Operand }; // (zp),Y

export interface LabelNode {
  type: NodeType.LABEL;
  name: string;
  line: number;
  column: number;
}

export interface AssignmentNode {
  type: NodeType.ASSIGNMENT;
  name: string;
  value: Operand;
  line: number;
  column: number;
}

export interface InstructionNode {
  type: NodeType.INSTRUCTION;
  mnemonic: Mnemonic;
  operand?: OperandSyntax;
  line: number;
  column: number;
}

export type DirectiveName = '.ORG' | '.BYTE' | '.WORD' | '.TEXT' | '.FILL';

export type DirectiveArgument = { kind: 'string'; text: string } | { kind: 'value'; value: Operand };

export interface DirectiveNode {
  type: NodeType.DIRECTIVE;
  name: DirectiveName;
  args: DirectiveArgument[];
  line: number;
  column: number;
}

export type ASTNode = LabelNode | AssignmentNode | InstructionNode | DirectiveNode;

export interface AST {
  statements: ASTNode[];
}

const DIRECTIVES: readonly DirectiveName[] = ['.ORG', '.BYTE', '.WORD', '.TEXT', '.FILL'];

function isDirectiveName(name: string): name is DirectiveName {
  return DIRECTIVES.some((d) => d === name);
}

export class ParserError extends AssemblyError {
  constructor(message: string, public readonly line: number, public readonly column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'ParserError';
  }
}

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
  }

  parse(): AST {
    const lexer = new Lexer(this.source);
    this.tokens = lexer.tokenize();
    this.pos = 0;

    const statements: ASTNode[] = [];

    while (!this.isAtEnd()) {
      if (this.match(TokenType.NEWLINE)) continue;
      this.parseLine(statements);
    }

    return { statements };
  }

  private parseLine(statements: ASTNode[]): void {
    while (this.check(TokenType.LABEL_DEF)) {
      const token = this.advance();
      statements.push({ type: NodeType.LABEL, name: String(token.value), line: token.line, column: token.column });
    }

    if (this.check(TokenType.DIRECTIVE)) {
      statements.push(this.parseDirective());
    } else if (this.check(TokenType.IDENTIFIER)) {
      if (this.peekNext().type === TokenType.EQUALS) {
        statements.push(this.parseAssignment());
      } else {
        statements.push(this.parseInstruction());
      }
    } else if (!this.check(TokenType.NEWLINE) && !this.isAtEnd()) {
      const token = this.peek();
      throw new ParserError(`Unexpected token '${token.value}'`, token.line, token.column);
    }

    this.expectEndOfLine();
  }

  private parseAssignment(): AssignmentNode {
    const name = this.advance();
    this.advance(); // '='
    const value = this.parseExpression();
    return { type: NodeType.ASSIGNMENT, name: String(name.value), value, line: name.line, column: name.column };
  }

  private parseInstruction(): InstructionNode {
    const token = this.advance();
    const mnemonic = String(token.value).toUpperCase();
    if (!isMnemonic(mnemonic)) {
      throw new ParserError(`Unknown instruction '${token.value}'`, token.line, token.column);
    }
    const node: InstructionNode = { type: NodeType.INSTRUCTION, mnemonic, line: token.line, column: token.column };
    if (!this.atEndOfLine()) {
      node.operand = this.parseOperand();
    }
    return node;
  }

  private parseOperand(): OperandSyntax {
    if (this.match(TokenType.HASH)) {
      return { kind: 'immediate', value: this.parseExpression() };
    }

    if (this.check(TokenType.IDENTIFIER) && this.isRegisterName(this.peek(), 'A') && this.atEndOfLine(1)) {
      this.advance();
      return { kind: 'accumulator' };
    }

    if (this.match(TokenType.LPAREN)) {
      const value = this.parseExpression();
      if (this.match(TokenType.COMMA)) {
        this.expectRegister('X');
        this.expect(TokenType.RPAREN, "Expected ')' after indexed-indirect operand");
        return { kind: 'indexed-indirect', value };
      }
      this.expect(TokenType.RPAREN, "Expected ')' after indirect operand");
      if (this.match(TokenType.COMMA)) {
        this.expectRegister('Y');
        return { kind: 'indirect-indexed', value };
      }
      return { kind: 'indirect', value };
    }

    const value = this.parseExpression();
    if (this.match(TokenType.COMMA)) {
      const token = this.peek();
      if (this.isRegisterName(token, 'X') || this.isRegisterName(token, 'Y')) {
        this.advance();
        return { kind: 'direct', value, index: String(token.value).toUpperCase() === 'X' ? 'X' : 'Y' };
      }
      throw new ParserError('Expected index register X or Y', token.line, token.column);
    }
    return { kind: 'direct', value };
  }

  private parseDirective(): DirectiveNode {
    const token = this.advance();
    const name = String(token.value);
    if (!isDirectiveName(name)) {
      throw new ParserError(`Unknown directive '${name}'`, token.line, token.column);
    }

    const args: DirectiveArgument[] = [];
    if (!this.atEndOfLine()) {
      do {
        if (this.check(TokenType.STRING)) {
          args.push({ kind: 'string', text: String(this.advance().value) });
        } else {
          args.push({ kind: 'value', value: this.parseExpression() });
        }
      } while (this.match(TokenType.COMMA));
    }

    return { type: NodeType.DIRECTIVE, name, args, line: token.line, column: token.column };
  }

  // expression := unary (('+' | '-') unary)*
  private parseExpression(): Operand {
    let left = this.parseUnary();
    for (;;) {
      if (this.match(TokenType.PLUS)) {
        left = add(left, this.parseUnary());
      } else if (this.match(TokenType.MINUS)) {
        left = sub(left, this.parseUnary());
      } else {
        return left;
      }
    }
  }

  // unary := '<' unary | '>' unary | '-' unary | primary
  private parseUnary(): Operand {
    if (this.match(TokenType.LESS)) return lo(this.parseUnary());
    if (this.match(TokenType.GREATER)) return hi(this.parseUnary());
    if (this.match(TokenType.MINUS)) return sub(0, this.parseUnary());
    return this.parsePrimary();
  }

  private parsePrimary(): Operand {
    const token = this.peek();
    switch (token.type) {
      case TokenType.NUMBER:
        this.advance();
        return Number(token.value);
      case TokenType.IDENTIFIER:
        this.advance();
        return String(token.value);
      case TokenType.STAR:
        this.advance();
        return here();
      default:
        throw new ParserError(`Expected expression, got '${token.value}'`, token.line, token.column);
    }
  }

  private isRegisterName(token: Token, register: string): boolean {
    return token.type === TokenType.IDENTIFIER && String(token.value).toUpperCase() === register;
  }

  private expectRegister(register: IndexRegister): void {
    const token = this.peek();
    if (!this.isRegisterName(token, register)) {
      throw new ParserError(`Expected index register ${register}`, token.line, token.column);
    }
    this.advance();
  }

  private atEndOfLine(offset = 0): boolean {
    const type = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)].type;
    return type === TokenType.NEWLINE || type === TokenType.EOF;
  }

  private expectEndOfLine(): void {
    if (this.atEndOfLine()) {
      this.match(TokenType.NEWLINE);
      return;
    }
    const token = this.peek();
    throw new ParserError(`Unexpected token '${token.value}'`, token.line, token.column);
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private peekNext(): Token {
    return this.tokens[Math.min(this.pos + 1, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.tokens[this.pos];
    if (!this.isAtEnd()) this.pos++;
    return token;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    const token = this.peek();
    throw new ParserError(message, token.line, token.column);
  }
}

export function parse(source: string): AST {
  return new Parser(source).parse();
}
