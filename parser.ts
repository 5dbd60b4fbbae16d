import { TokenType, Lexer } from "./lexer";
import { Sym, Pair, Value, fromBoolean } from "./types";

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export function parseAtom(text: string): Value {
  if (NUMBER_PATTERN.test(text)) {
    return parseFloat(text);
  }
  return new Sym(text);
}

//
// Parser
//
export class Parser {
  constructor(private lexer: Lexer) {}

  static fromString(source: string): Parser {
    return new Parser(new Lexer(source));
  }

  atEnd(): boolean {
    return this.lexer.peek().type === TokenType.EOF;
  }

  // Returns undefined once the input is exhausted
  parse(): Value | undefined {
    const token = this.lexer.next();

    switch (token.type) {
      case TokenType.EOF:
        return undefined;
      case TokenType.LeftParen:
        return this.parseList();
      case TokenType.RightParen:
        // Unmatched close paren reads as the empty list
        return null;
      case TokenType.Boolean:
        return fromBoolean(token.value);
      case TokenType.Atom:
        return parseAtom(token.text);
    }
  }

  parseAll(): Value[] {
    const forms: Value[] = [];
    while (!this.atEnd()) {
      const form = this.parse();
      if (form === undefined) break;
      forms.push(form);
    }
    return forms;
  }

  private parseList(): Value {
    const items: Value[] = [];

    while (true) {
      const token = this.lexer.peek();
      if (token.type === TokenType.RightParen) {
        this.lexer.next(); // consume )
        break;
      }
      // A list still open at end of input is closed here
      const item = this.parse();
      if (item === undefined) break;
      items.push(item);
    }

    return items.reduceRight<Value>((cdr, car) => new Pair(car, cdr), null);
  }
}

// Single-form read: the remainder of the source is discarded
export function readForm(source: string): Value {
  return Parser.fromString(source).parse() ?? null;
}

export function readAll(source: string): Value[] {
  return Parser.fromString(source).parseAll();
}
