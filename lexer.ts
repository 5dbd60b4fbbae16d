// Token types
export enum TokenType {
  LeftParen = "LeftParen",
  RightParen = "RightParen",
  Boolean = "Boolean",
  Atom = "Atom",
  EOF = "EOF",
}

export type Token =
  | { type: TokenType.LeftParen }
  | { type: TokenType.RightParen }
  | { type: TokenType.Boolean; value: boolean }
  | { type: TokenType.Atom; text: string }
  | { type: TokenType.EOF };

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

function isDelimiter(char: string): boolean {
  return isWhitespace(char) || char === "(" || char === ")";
}

//
// Lexer over an in-memory source buffer
//
export class Lexer {
  private pos: number = 0;
  private peekedToken: Token | null = null;

  constructor(private readonly source: string) {}

  private get currentChar(): string | null {
    return this.pos < this.source.length ? this.source[this.pos] : null;
  }

  private skipWhitespace(): void {
    while (this.currentChar !== null && isWhitespace(this.currentChar)) {
      this.pos++;
    }
  }

  private readAtom(): Token {
    const start = this.pos;
    while (this.currentChar !== null && !isDelimiter(this.currentChar)) {
      this.pos++;
    }
    return { type: TokenType.Atom, text: this.source.slice(start, this.pos) };
  }

  private readNextToken(): Token {
    this.skipWhitespace();

    const char = this.currentChar;
    if (char === null) {
      return { type: TokenType.EOF };
    }

    switch (char) {
      case "(":
        this.pos++;
        return { type: TokenType.LeftParen };
      case ")":
        this.pos++;
        return { type: TokenType.RightParen };
      case "#": {
        // #t and #f end after two characters, whatever follows
        const next = this.source[this.pos + 1];
        if (next === "t" || next === "f") {
          this.pos += 2;
          return { type: TokenType.Boolean, value: next === "t" };
        }
        return this.readAtom();
      }
      default:
        return this.readAtom();
    }
  }

  peek(): Token {
    if (this.peekedToken === null) {
      this.peekedToken = this.readNextToken();
    }
    return this.peekedToken;
  }

  next(): Token {
    if (this.peekedToken !== null) {
      const token = this.peekedToken;
      this.peekedToken = null;
      return token;
    }
    return this.readNextToken();
  }
}
