/** Source location for error reporting */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

export interface SourceRange {
  start: SourceLocation;
  end: SourceLocation;
}

/**
 * Walks a named source buffer one character at a time, keeping the
 * line/column of the current character. Lines and columns are 1-based,
 * offsets 0-based.
 */
export class SourceCursor {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(
    readonly source: string,
    readonly file: string,
  ) {}

  /** The character under the cursor, or undefined at end of input */
  get current(): string | undefined {
    return this.source[this.offset];
  }

  peek(offset = 1): string | undefined {
    return this.source[this.offset + offset];
  }

  /** True when the character under the cursor is `ch` */
  at(ch: string): boolean {
    return this.current === ch;
  }

  atEnd(): boolean {
    return this.offset >= this.source.length;
  }

  advance(): void {
    if (this.offset >= this.source.length) return;
    if (this.source[this.offset] === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset++;
  }

  /** Consume characters while `test` holds and return them */
  readWhile(test: (ch: string) => boolean): string {
    const start = this.offset;
    let ch = this.current;
    while (ch !== undefined && test(ch)) {
      this.advance();
      ch = this.current;
    }
    return this.source.slice(start, this.offset);
  }

  loc(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.offset };
  }
}

export function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z]$/.test(ch);
}

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

export function isWhitespace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

export function isHorizontalSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t";
}

/** `\r` ends a line too, for CRLF input */
export function isLineEnd(ch: string | undefined): boolean {
  return ch === "\n" || ch === "\r";
}
