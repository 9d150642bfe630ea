import { ErrorKind, GemError } from "../errors.js";
import {
  SourceCursor,
  isDigit,
  isHorizontalSpace,
  isLetter,
  isLineEnd,
  isWhitespace,
  type SourceLocation,
} from "../source/location.js";

export enum SheetTokenType {
  // Symbols
  LBrace = "{",
  RBrace = "}",
  Id = "#",
  Class = ".",

  // Words
  Tag = "tag",
  Property = "property",
  Value = "value",

  // Special
  EOF = "eof",
}

export interface SheetToken {
  type: SheetTokenType;
  value: string;
  start: SourceLocation;
  end: SourceLocation;
}

function isNameStart(ch: string | undefined): boolean {
  return isLetter(ch) || isDigit(ch) || ch === "_";
}

function isNameChar(ch: string): boolean {
  return isNameStart(ch) || ch === "-";
}

function isPropertyChar(ch: string): boolean {
  return isLetter(ch) || ch === "-";
}

/**
 * GemSheet tokenizer. Identifiers outside a block are selector names;
 * inside a block every identifier is a property and carries its raw value.
 */
export class SheetLexer {
  private cursor: SourceCursor;
  private tokens: SheetToken[] = [];
  private inBlock = false;

  constructor(
    private readonly source: string,
    private readonly file = "<stylesheet>",
  ) {
    this.cursor = new SourceCursor(source, file);
  }

  tokenize(): SheetToken[] {
    this.cursor = new SourceCursor(this.source, this.file);
    this.tokens = [];
    this.inBlock = false;

    while (!this.cursor.atEnd()) {
      const ch = this.cursor.current;
      if (isWhitespace(ch)) {
        this.cursor.advance();
      } else if (ch === "{" && !this.inBlock) {
        this.symbol(SheetTokenType.LBrace);
        this.inBlock = true;
      } else if (ch === "}") {
        this.symbol(SheetTokenType.RBrace);
        this.inBlock = false;
      } else if (this.inBlock && isLetter(ch)) {
        this.readDeclaration();
      } else if (!this.inBlock && ch === "#") {
        this.symbol(SheetTokenType.Id);
      } else if (!this.inBlock && ch === ".") {
        this.symbol(SheetTokenType.Class);
      } else if (!this.inBlock && isNameStart(ch)) {
        const start = this.cursor.loc();
        const name = this.cursor.readWhile(isNameChar);
        this.push(SheetTokenType.Tag, name, start);
      } else {
        const loc = this.cursor.loc();
        throw new GemError(
          ErrorKind.UnexpectedCharacter,
          `'${ch}'`,
          this.file,
          loc,
        );
      }
    }

    const eof = this.cursor.loc();
    this.tokens.push({ type: SheetTokenType.EOF, value: "", start: eof, end: eof });
    return this.tokens;
  }

  private symbol(type: SheetTokenType): void {
    const start = this.cursor.loc();
    this.cursor.advance();
    this.push(type, type, start);
  }

  /** `name: raw value;` */
  private readDeclaration(): void {
    const start = this.cursor.loc();
    const property = this.cursor.readWhile(isPropertyChar);
    if (!this.cursor.at(":")) {
      throw this.expected(`':' after property '${property}'`);
    }
    this.push(SheetTokenType.Property, property, start);
    this.cursor.advance(); // skip ':'

    this.cursor.readWhile(isHorizontalSpace);
    const valueStart = this.cursor.loc();
    const value = this.cursor.readWhile((c) => c !== ";" && !isLineEnd(c));
    if (value.length === 0) {
      throw this.expected(`a value after '${property}:'`);
    }
    if (!this.cursor.at(";")) {
      throw this.expected(`';' after value '${value}'`);
    }
    this.push(SheetTokenType.Value, value, valueStart);
    this.cursor.advance(); // skip ';'
  }

  private push(type: SheetTokenType, value: string, start: SourceLocation): void {
    this.tokens.push({ type, value, start, end: this.cursor.loc() });
  }

  private expected(what: string): GemError {
    const loc = this.cursor.loc();
    return new GemError(ErrorKind.ExpectedCharacter, `Expected ${what}`, this.file, loc);
  }
}
