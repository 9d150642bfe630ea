import type { AstNode, AstNodeList, AstTag, AstText } from "./ast.js";
import { ErrorKind, GemError } from "../errors.js";
import { Lexer, TokenType, describeToken, tokensEqual, type Token } from "./lexer.js";

/**
 * Recursive descent over GemXML tokens.
 *
 * `parseTags` stops at the first CLOSE without checking it; the enclosing
 * `parseTag` (or `parse` at the top level) decides whether that CLOSE is
 * the one it expected, so mismatches are reported where they occur.
 */
export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  constructor(private readonly file = "<input>") {}

  parse(source: string): AstNodeList {
    return this.parseTokens(new Lexer(source, this.file).tokenize());
  }

  parseTokens(tokens: Token[]): AstNodeList {
    this.tokens = tokens;
    this.pos = 0;

    const body = this.parseTags();
    const leftover = this.current();
    if (leftover.type !== TokenType.EOF) {
      throw this.error(
        `Cannot fully parse the document: unexpected ${describeToken(leftover)}.`,
        leftover,
      );
    }
    return body;
  }

  private parseTags(): AstNodeList {
    const first = this.current();
    let start = first.start;
    let end = first.end;
    const body: AstNode[] = [];

    while (!this.check(TokenType.Close) && !this.check(TokenType.EOF)) {
      const node = this.parseTag();
      if (body.length === 0) start = node.loc.start;
      end = node.loc.end;
      body.push(node);
    }

    return { kind: "list", body, loc: { start, end } };
  }

  private parseTag(): AstNode {
    const token = this.current();
    if (token.type === TokenType.Text || token.type === TokenType.Data) {
      return this.parseText();
    }
    if (token.type !== TokenType.Tag) {
      throw this.error(`Expected a tag, found ${describeToken(token)} instead.`, token);
    }
    this.advance();

    const attributes = new Map<string, string>();
    while (this.check(TokenType.Attribute)) {
      const key = this.current().value;
      this.advance();
      const data = this.current();
      if (data.type !== TokenType.Data) {
        throw this.error(`Expected a value for attribute '${key}'.`, data);
      }
      attributes.set(key, data.value);
      this.advance();
    }

    const content = this.parseTags();

    const close = this.current();
    if (!tokensEqual(close, { type: TokenType.Close, value: token.value })) {
      throw this.error(
        `Expected </${token.value}>, found ${describeToken(close)} instead.`,
        close,
      );
    }
    this.advance();

    const tag: AstTag = {
      kind: "tag",
      name: token.value,
      attributes,
      content,
      loc: { start: token.start, end: close.end },
    };
    return tag;
  }

  private parseText(): AstText {
    const token = this.current();
    this.advance();
    return { kind: "text", content: token.value, loc: { start: token.start, end: token.end } };
  }

  private check(type: TokenType): boolean {
    return this.current().type === type;
  }

  private advance(): void {
    if (this.pos < this.tokens.length - 1) {
      this.pos++;
    }
  }

  private current(): Token {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new Error("Parser: empty token stream");
    }
    return token;
  }

  private error(details: string, token: Token): GemError {
    return new GemError(ErrorKind.InvalidSyntax, details, this.file, token.start, token.end);
  }
}

/** Parse a GemXML source string into an AST */
export function parseGemXml(source: string, file?: string): AstNodeList {
  return new Parser(file).parse(source);
}
