/**
 * 6502 source lexer
 *
 * Tokenizes assembly source into tokens for parsing. Mnemonics are not
 * special here; the parser decides by position whether an identifier is an
 * instruction, a label or an index register.
 */

import { AssemblyError } from '../assembler/errors.js';

export enum TokenType {
  IDENTIFIER = 'IDENTIFIER',
  LABEL_DEF = 'LABEL_DEF',
  DIRECTIVE = 'DIRECTIVE',

  // Literals
  NUMBER = 'NUMBER',
  STRING = 'STRING',

  // Operators and punctuation
  HASH = 'HASH',
  COMMA = 'COMMA',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  LESS = 'LESS',
  GREATER = 'GREATER',
  EQUALS = 'EQUALS',
  STAR = 'STAR',
  NEWLINE = 'NEWLINE',

  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string | number;
  line: number;
  column: number;
}

const PUNCTUATION: Record<string, TokenType> = {
  '#': TokenType.HASH,
  ',': TokenType.COMMA,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  '+': TokenType.PLUS,
  '-': TokenType.MINUS,
  '<': TokenType.LESS,
  '>': TokenType.GREATER,
  '=': TokenType.EQUALS,
  '*': TokenType.STAR,
};

export class LexerError extends AssemblyError {
  constructor(message: string, public readonly line: number, public readonly column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'LexerError';
  }
}

export class Lexer {
  private source: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    this.push(TokenType.EOF, '', this.line, this.column);
    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private advance(): string {
    const char = this.source[this.pos++];
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private push(type: TokenType, value: string | number, line: number, column: number): void {
    this.tokens.push({ type, value, line, column });
  }

  private scanToken(): void {
    const startLine = this.line;
    const startColumn = this.column;
    const char = this.advance();

    switch (char) {
      case ' ':
      case '\t':
      case '\r':
        break;

      case '\n':
        this.push(TokenType.NEWLINE, '\n', startLine, startColumn);
        break;

      case ';':
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
        break;

      case '$':
        this.push(TokenType.NUMBER, this.scanDigits(16, startLine, startColumn), startLine, startColumn);
        break;

      case '%':
        this.push(TokenType.NUMBER, this.scanDigits(2, startLine, startColumn), startLine, startColumn);
        break;

      case '"':
        this.scanString(startLine, startColumn);
        break;

      case "'":
        this.scanChar(startLine, startColumn);
        break;

      case '.':
        this.push(TokenType.DIRECTIVE, '.' + this.scanWord().toUpperCase(), startLine, startColumn);
        break;

      default:
        if (char in PUNCTUATION) {
          this.push(PUNCTUATION[char], char, startLine, startColumn);
        } else if (this.isDigit(char)) {
          this.pos--;
          this.column--;
          this.push(TokenType.NUMBER, this.scanDigits(10, startLine, startColumn), startLine, startColumn);
        } else if (this.isAlpha(char) || char === '_') {
          this.pos--;
          this.column--;
          this.scanIdentifier(startLine, startColumn);
        } else {
          throw new LexerError(`Unexpected character '${char}'`, startLine, startColumn);
        }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char) || char === '_';
  }

  private isRadixDigit(char: string, radix: number): boolean {
    switch (radix) {
      case 2:
        return char === '0' || char === '1';
      case 16:
        return this.isDigit(char) || (char >= 'a' && char <= 'f') || (char >= 'A' && char <= 'F');
      default:
        return this.isDigit(char);
    }
  }

  private scanDigits(radix: number, startLine: number, startColumn: number): number {
    let digits = '';
    while (!this.isAtEnd() && this.isRadixDigit(this.peek(), radix)) {
      digits += this.advance();
    }
    if (digits === '') {
      throw new LexerError('Expected digits after number prefix', startLine, startColumn);
    }
    return parseInt(digits, radix);
  }

  private scanWord(): string {
    let word = '';
    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      word += this.advance();
    }
    return word;
  }

  private scanString(startLine: number, startColumn: number): void {
    let value = '';
    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\n') {
        throw new LexerError('Unterminated string literal', startLine, startColumn);
      }
      value += this.advance();
    }
    if (this.isAtEnd()) {
      throw new LexerError('Unterminated string literal', startLine, startColumn);
    }
    this.advance(); // closing quote
    this.push(TokenType.STRING, value, startLine, startColumn);
  }

  // 'A' is the character code of A
  private scanChar(startLine: number, startColumn: number): void {
    if (this.isAtEnd() || this.peek() === '\n') {
      throw new LexerError('Unterminated character literal', startLine, startColumn);
    }
    const value = this.advance().charCodeAt(0);
    if (this.peek() !== "'") {
      throw new LexerError('Unterminated character literal', startLine, startColumn);
    }
    this.advance();
    this.push(TokenType.NUMBER, value, startLine, startColumn);
  }

  private scanIdentifier(startLine: number, startColumn: number): void {
    const name = this.scanWord();
    if (this.peek() === ':') {
      this.advance();
      this.push(TokenType.LABEL_DEF, name, startLine, startColumn);
      return;
    }
    this.push(TokenType.IDENTIFIER, name, startLine, startColumn);
  }
}
