import type { SourceLocation, SourceRange } from "./source/location.js";

export enum ErrorKind {
  UnexpectedCharacter = "UnexpectedCharacter",
  ExpectedCharacter = "ExpectedCharacter",
  InvalidSyntax = "InvalidSyntax",
  UnknownTag = "UnknownTag",
  MissingAttribute = "MissingAttribute",
  WindowError = "WindowError",
  AttributeError = "AttributeError",
  FileError = "FileError",
  IdCollision = "IdCollision",
}

/**
 * The single error type of the toolchain. Every phase throws the first
 * problem it finds and nothing downstream runs.
 */
export class GemError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly details: string,
    readonly file: string,
    readonly start: SourceLocation,
    readonly end: SourceLocation = start,
  ) {
    super(`${kind}: ${details} (${file}, line ${start.line}, column ${start.column})`);
    this.name = "GemError";
  }

  get loc(): SourceRange {
    return { start: this.start, end: this.end };
  }

  /** Same error anchored at a different span */
  relocate(start: SourceLocation, end: SourceLocation): GemError {
    return new GemError(this.kind, this.details, this.file, start, end);
  }
}
