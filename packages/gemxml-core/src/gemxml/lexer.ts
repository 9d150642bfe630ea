import { ErrorKind, GemError } from "../errors.js";
import {
  SourceCursor,
  isDigit,
  isHorizontalSpace,
  isLetter,
  isLineEnd,
  isWhitespace,
  type SourceLocation,
  type SourceRange,
} from "../source/location.js";
import { isElementName } from "./ast.js";

export enum TokenType {
  Tag = "TAG",
  Close = "CLOSE",
  Text = "TEXT",
  Data = "DATA",
  Attribute = "ATTRIBUTE",
  EOF = "EOF",
}

export interface Token {
  type: TokenType;
  value: string;
  start: SourceLocation;
  end: SourceLocation;
  /**
   * Set on tokens spliced in from a `#` or `*` shorthand: the token's own
   * span inside the shorthand text. `start`/`end` then cover the whole
   * shorthand content in the outer source.
   */
  virtual?: SourceRange;
}

/** Tokens compare by type and value; spans are ignored */
export function tokensEqual(a: Pick<Token, "type" | "value">, b: Pick<Token, "type" | "value">): boolean {
  return a.type === b.type && a.value === b.value;
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.Tag:
      return `<${token.value}>`;
    case TokenType.Close:
      return `</${token.value}>`;
    case TokenType.EOF:
      return "end of input";
    default:
      return `${token.type} '${token.value}'`;
  }
}

const MAX_MARKERS = 3;
const EMPHASIS_TAGS = ["i", "b", "bi"] as const;

const TEXT_STOP = new Set(["\n", "\r", "<", ">", '"']);

function isAttributeChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || ch === "-" || ch === "_";
}

function isTagNameChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch);
}

/**
 * GemXML tokenizer. Markdown-style shorthand (`# heading`, `**bold**`)
 * is expanded here by lexing the shorthand's content with a nested lexer
 * and wrapping the result in synthesized tag/close tokens.
 */
export class Lexer {
  private cursor: SourceCursor;
  private tokens: Token[] = [];

  constructor(
    private readonly source: string,
    private readonly file = "<input>",
  ) {
    this.cursor = new SourceCursor(source, file);
  }

  tokenize(): Token[] {
    this.cursor = new SourceCursor(this.source, this.file);
    this.tokens = [];

    while (!this.cursor.atEnd()) {
      const ch = this.cursor.current;
      if (isWhitespace(ch)) {
        this.cursor.advance();
      } else if (ch === "<") {
        this.readTag();
      } else if (ch === '"') {
        this.readQuoted();
      } else if (ch === "#") {
        this.readHeading();
      } else if (ch === "*") {
        this.readEmphasis();
      } else {
        this.readText();
      }
    }

    const eof = this.cursor.loc();
    this.tokens.push({ type: TokenType.EOF, value: "", start: eof, end: eof });
    return this.tokens;
  }

  private readTag(): void {
    const start = this.cursor.loc();
    this.cursor.advance(); // skip '<'
    this.cursor.readWhile(isWhitespace);

    let closing = false;
    if (this.cursor.current === "/") {
      closing = true;
      this.cursor.advance();
    }

    if (!isLetter(this.cursor.current)) {
      throw this.expected(`Expected a letter after '${closing ? "</" : "<"}'`);
    }
    const name = this.cursor.readWhile(isTagNameChar);
    if (!isElementName(name)) {
      throw new GemError(ErrorKind.UnknownTag, `<${name}>`, this.file, start, this.cursor.loc());
    }

    const attributes = new Map<string, { value: string; loc: SourceRange }>();
    if (this.cursor.current !== ">") {
      if (!isWhitespace(this.cursor.current)) {
        throw this.expected("Expected '>' or a whitespace after tag name.");
      }
      this.cursor.readWhile(isWhitespace);

      while (!this.cursor.atEnd() && this.cursor.current !== ">") {
        const attrStart = this.cursor.loc();
        if (!isLetter(this.cursor.current)) {
          throw this.expected(`Expected an attribute name, found ${this.found()} instead.`);
        }
        const key = this.cursor.readWhile(isAttributeChar);
        this.cursor.readWhile(isWhitespace);
        if (this.cursor.current !== "=") {
          throw this.expected(`Expected '=' after attribute, found ${this.found()} instead.`);
        }
        this.cursor.advance();
        this.cursor.readWhile(isWhitespace);
        const value = this.readQuotedValue("Expected '\"' after '='.");
        attributes.set(key, { value, loc: { start: attrStart, end: this.cursor.loc() } });
        this.cursor.readWhile(isWhitespace);
      }

      if (this.cursor.atEnd()) {
        throw this.expected(`Expected '>' to close <${closing ? "/" : ""}${name}>.`);
      }
    }
    this.cursor.advance(); // skip '>'

    this.tokens.push({
      type: closing ? TokenType.Close : TokenType.Tag,
      value: name,
      start,
      end: this.cursor.loc(),
    });
    for (const [key, attr] of attributes) {
      this.tokens.push({ type: TokenType.Attribute, value: key, ...attr.loc });
      this.tokens.push({ type: TokenType.Data, value: attr.value, ...attr.loc });
    }
  }

  /** `"..."` outside a tag, e.g. an include path */
  private readQuoted(): void {
    const start = this.cursor.loc();
    const value = this.readQuotedValue("Expected '\"'.");
    this.tokens.push({ type: TokenType.Data, value, start, end: this.cursor.loc() });
  }

  private readQuotedValue(missingOpen: string): string {
    if (this.cursor.current !== '"') {
      throw this.expected(missingOpen);
    }
    this.cursor.advance();
    const value = this.cursor.readWhile((c) => c !== '"' && !isLineEnd(c));
    if (this.cursor.current !== '"') {
      throw this.expected("Expected terminating '\"' character.");
    }
    this.cursor.advance();
    return value;
  }

  /** `# text` to end of line → h1..h3 */
  private readHeading(): void {
    const start = this.cursor.loc();
    const count = this.cursor.readWhile((c) => c === "#").length;
    this.cursor.readWhile(isHorizontalSpace);
    if (count > MAX_MARKERS) {
      throw this.invalid(`Expected a max of ${MAX_MARKERS} '#' characters.`, start);
    }

    const contentStart = this.cursor.loc();
    const content = this.cursor.readWhile((c) => !isLineEnd(c));
    if (content.length === 0) {
      throw this.invalid(`Expected content after '${"#".repeat(count)}'.`, contentStart);
    }
    const contentEnd = this.cursor.loc();

    const tag = `h${count}`;
    this.tokens.push({ type: TokenType.Tag, value: tag, start, end: contentStart });
    this.tokens.push(...this.expand(content, contentStart, contentEnd));
    this.tokens.push({ type: TokenType.Close, value: tag, start: contentEnd, end: contentEnd });
  }

  /** `*i*`, `**b**`, `***bi***` */
  private readEmphasis(): void {
    const start = this.cursor.loc();
    const count = this.cursor.readWhile((c) => c === "*").length;
    this.cursor.readWhile(isHorizontalSpace);
    if (count > MAX_MARKERS) {
      throw this.invalid(`Expected a max of ${MAX_MARKERS} '*' characters.`, start);
    }

    const contentStart = this.cursor.loc();
    const content = this.cursor.readWhile((c) => c !== "*" && !isLineEnd(c));
    if (content.length === 0) {
      throw this.invalid(`Expected content after '${"*".repeat(count)}'.`, contentStart);
    }
    if (this.cursor.current !== "*") {
      throw this.invalid("Reached end of line when parsing '*' emphasis.", this.cursor.loc());
    }

    const endCount = this.cursor.readWhile((c) => c === "*").length;
    const contentEnd = this.cursor.loc();
    if (endCount !== count) {
      throw this.invalid(
        `Expected ${count} '*' characters, got ${endCount} '*' characters instead.`,
        contentEnd,
      );
    }

    const tag = EMPHASIS_TAGS[count - 1] ?? "i";
    this.tokens.push({ type: TokenType.Tag, value: tag, start, end: contentStart });
    this.tokens.push(...this.expand(content, contentStart, contentEnd));
    this.tokens.push({ type: TokenType.Close, value: tag, start: contentEnd, end: contentEnd });
  }

  private readText(): void {
    const start = this.cursor.loc();
    const text = this.cursor.readWhile((c) => !TEXT_STOP.has(c));
    if (text.length === 0) {
      throw new GemError(
        ErrorKind.UnexpectedCharacter,
        `Unexpected character ${this.found()}`,
        this.file,
        start,
      );
    }
    this.tokens.push({ type: TokenType.Text, value: text, start, end: this.cursor.loc() });
  }

  /**
   * Lex shorthand content on its own and pin every resulting token (and
   * any error) to the content's span in this source.
   */
  private expand(content: string, start: SourceLocation, end: SourceLocation): Token[] {
    let inner: Token[];
    try {
      inner = new Lexer(content, this.file).tokenize();
    } catch (err) {
      if (err instanceof GemError) throw err.relocate(start, end);
      throw err;
    }
    return inner
      .filter((tok) => tok.type !== TokenType.EOF)
      .map((tok) => ({
        type: tok.type,
        value: tok.value,
        start,
        end,
        virtual: { start: tok.start, end: tok.end },
      }));
  }

  private found(): string {
    const ch = this.cursor.current;
    return ch === undefined ? "end of input" : `'${ch}'`;
  }

  private expected(details: string): GemError {
    return new GemError(ErrorKind.ExpectedCharacter, details, this.file, this.cursor.loc());
  }

  private invalid(details: string, start: SourceLocation): GemError {
    return new GemError(ErrorKind.InvalidSyntax, details, this.file, start, this.cursor.loc());
  }
}
