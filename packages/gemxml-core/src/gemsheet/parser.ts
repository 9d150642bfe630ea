/**
 * GemSheet parser.
 *
 * Grammar:
 *   Stylesheet ::= Rule*
 *   Rule       ::= Selector+ Block
 *   Selector   ::= '#' Name | '.' Name | Name
 *   Block      ::= '{' (Property ':' Value ';')* '}'
 *
 * Selectors written before one block are kept as a single space-joined
 * string; each of them is an independent alternative when matching.
 * There is no specificity: rules apply in source order.
 */
import { ErrorKind, GemError } from "../errors.js";
import { SheetLexer, SheetTokenType, type SheetToken } from "./lexer.js";

/** property → raw value */
export type StyleDeclarations = Record<string, string>;

/** selector → declarations, in declaration order */
export type StyleRules = Map<string, StyleDeclarations>;

export class SheetParser {
  private tokens: SheetToken[] = [];
  private pos = 0;

  constructor(private readonly file = "<stylesheet>") {}

  parse(source: string): StyleRules {
    this.tokens = new SheetLexer(source, this.file).tokenize();
    this.pos = 0;
    return this.parseRules();
  }

  /** Parse an already tokenized stream */
  parseTokens(tokens: SheetToken[]): StyleRules {
    this.tokens = tokens;
    this.pos = 0;
    return this.parseRules();
  }

  private parseRules(): StyleRules {
    const rules: StyleRules = new Map();
    while (!this.check(SheetTokenType.EOF)) {
      const selector = this.parseSelectors();
      // a repeated selector replaces the earlier block wholesale
      rules.set(selector, this.parseBlock());
    }
    return rules;
  }

  private parseSelectors(): string {
    const selectors: string[] = [];
    while (!this.check(SheetTokenType.LBrace)) {
      selectors.push(this.parseSelector());
    }
    if (selectors.length === 0) {
      throw this.error("Expected a selector (tag, #id or .class) before '{'.");
    }
    return selectors.join(" ");
  }

  private parseSelector(): string {
    const token = this.current();
    if (token.type === SheetTokenType.Tag) {
      this.advance();
      return token.value;
    }
    if (token.type === SheetTokenType.Id || token.type === SheetTokenType.Class) {
      this.advance();
      const name = this.current();
      if (name.type !== SheetTokenType.Tag || name.start.offset !== token.end.offset) {
        throw this.error(`Expected a name immediately after '${token.value}'.`);
      }
      this.advance();
      return token.value + name.value;
    }
    throw this.error(`Expected a selector, found ${describe(token)} instead.`);
  }

  private parseBlock(): StyleDeclarations {
    this.expect(SheetTokenType.LBrace);
    const declarations: StyleDeclarations = {};

    while (!this.check(SheetTokenType.RBrace)) {
      const property = this.current();
      if (property.type !== SheetTokenType.Property) {
        throw this.error(`Expected a property or '}', found ${describe(property)} instead.`);
      }
      this.advance();
      const value = this.expect(SheetTokenType.Value);
      declarations[property.value] = value.value;
    }

    this.expect(SheetTokenType.RBrace);
    return declarations;
  }

  private expect(type: SheetTokenType): SheetToken {
    const token = this.current();
    if (token.type !== type) {
      throw this.error(`Expected '${type}', found ${describe(token)} instead.`);
    }
    this.advance();
    return token;
  }

  private check(type: SheetTokenType): boolean {
    return this.current().type === type;
  }

  private advance(): void {
    if (this.pos < this.tokens.length - 1) {
      this.pos++;
    }
  }

  private current(): SheetToken {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new Error("SheetParser: empty token stream");
    }
    return token;
  }

  private error(details: string): GemError {
    const token = this.current();
    return new GemError(ErrorKind.InvalidSyntax, details, this.file, token.start, token.end);
  }
}

function describe(token: SheetToken): string {
  return token.type === SheetTokenType.EOF ? "end of input" : `'${token.value}'`;
}

/** Parse GemSheet source into ordered rules */
export function parseStylesheet(source: string, file?: string): StyleRules {
  return new SheetParser(file).parse(source);
}

/** Validate stylesheet syntax. Returns null if valid, the error if not. */
export function validateStylesheetSyntax(source: string, file?: string): GemError | null {
  try {
    parseStylesheet(source, file);
    return null;
  } catch (err) {
    if (err instanceof GemError) return err;
    throw err;
  }
}
