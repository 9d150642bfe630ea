import { describe, it, expect } from "vitest";
import { SheetLexer, SheetTokenType } from "../src/gemsheet/lexer.js";
import { parseStylesheet, validateStylesheetSyntax } from "../src/gemsheet/parser.js";
import { ErrorKind, GemError } from "../src/errors.js";

function lexError(source: string): GemError {
  try {
    new SheetLexer(source, "style.gms").tokenize();
  } catch (err) {
    if (err instanceof GemError) return err;
    throw err;
  }
  throw new Error("expected the lexer to fail");
}

function parseError(source: string): GemError {
  const err = validateStylesheetSyntax(source, "style.gms");
  if (!err) throw new Error("expected the stylesheet to be rejected");
  return err;
}

describe("SheetLexer", () => {
  it("tokenizes a simple rule", () => {
    const tokens = new SheetLexer("rect { color: red; }").tokenize();
    expect(tokens.map((t) => t.type)).toEqual([
      SheetTokenType.Tag,
      SheetTokenType.LBrace,
      SheetTokenType.Property,
      SheetTokenType.Value,
      SheetTokenType.RBrace,
      SheetTokenType.EOF,
    ]);
    expect(tokens.map((t) => t.value)).toEqual(["rect", "{", "color", "red", "}", ""]);
  });

  it("emits id and class markers before the name", () => {
    const tokens = new SheetLexer("#main .box {}").tokenize();
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [SheetTokenType.Id, "#"],
      [SheetTokenType.Tag, "main"],
      [SheetTokenType.Class, "."],
      [SheetTokenType.Tag, "box"],
      [SheetTokenType.LBrace, "{"],
      [SheetTokenType.RBrace, "}"],
      [SheetTokenType.EOF, ""],
    ]);
  });

  it("keeps the raw value, skipping only leading whitespace", () => {
    const tokens = new SheetLexer("p { font:   bold  12px  serif ; }").tokenize();
    const value = tokens.find((t) => t.type === SheetTokenType.Value);
    expect(value?.value).toBe("bold  12px  serif ");
  });

  it("accepts hyphenated property names", () => {
    const tokens = new SheetLexer("p {\n  border-color: #00ff00;\n}").tokenize();
    const property = tokens.find((t) => t.type === SheetTokenType.Property);
    expect(property?.value).toBe("border-color");
    expect(property?.start).toEqual({ line: 2, column: 3, offset: 6 });
  });

  it("fails when ':' does not follow a property", () => {
    const err = lexError("p { color red; }");
    expect(err.kind).toBe(ErrorKind.ExpectedCharacter);
    expect(err.details).toBe("Expected ':' after property 'color'");
  });

  it("fails when a value is not terminated by ';' on its line", () => {
    const err = lexError("p { color: red }\n");
    expect(err.kind).toBe(ErrorKind.ExpectedCharacter);
    expect(err.details).toBe("Expected ';' after value 'red }'");
  });

  it("stops a value at a CRLF line end", () => {
    expect(lexError("p { color: red\r\n}").details).toBe("Expected ';' after value 'red'");
    const tokens = new SheetLexer("p {\r\n  color: red;\r\n}\r\n").tokenize();
    expect(tokens.map((t) => t.value)).toEqual(["p", "{", "color", "red", "}", ""]);
  });

  it("fails on an empty value", () => {
    const err = lexError("p { color: ; }");
    expect(err.kind).toBe(ErrorKind.ExpectedCharacter);
    expect(err.details).toBe("Expected a value after 'color:'");
  });

  it("fails on characters outside any token", () => {
    const err = lexError("p { color: red; } @");
    expect(err.kind).toBe(ErrorKind.UnexpectedCharacter);
    expect(err.details).toBe("'@'");
    expect(err.start).toEqual({ line: 1, column: 19, offset: 18 });
  });

  it("fails on a nested block", () => {
    expect(lexError("p { { } }").kind).toBe(ErrorKind.UnexpectedCharacter);
  });
});

describe("parseStylesheet", () => {
  it("maps selectors to declarations", () => {
    const rules = parseStylesheet(`
      rect { color: red; width: 2; }
      #title { weight: bold; }
      .box { color: green; }
    `);
    expect([...rules.keys()]).toEqual(["rect", "#title", ".box"]);
    expect(rules.get("rect")).toEqual({ color: "red", width: "2" });
    expect(rules.get("#title")).toEqual({ weight: "bold" });
  });

  it("joins a selector list into one space-separated key", () => {
    const rules = parseStylesheet("rect .box #main { color: red; }");
    expect([...rules.keys()]).toEqual(["rect .box #main"]);
  });

  it("last property in a block wins", () => {
    const rules = parseStylesheet("p { color: red; color: blue; }");
    expect(rules.get("p")).toEqual({ color: "blue" });
  });

  it("a repeated selector replaces the earlier block instead of merging", () => {
    const rules = parseStylesheet("rect { color: red; width: 2; }\nrect { color: blue; }");
    expect(rules.size).toBe(1);
    expect(rules.get("rect")).toEqual({ color: "blue" });
  });

  it("a repeated selector keeps its first position", () => {
    const rules = parseStylesheet("a { x: 1; } b { x: 2; } a { x: 3; }");
    expect([...rules.keys()]).toEqual(["a", "b"]);
    expect(rules.get("a")).toEqual({ x: "3" });
  });

  it("parses an empty stylesheet", () => {
    expect(parseStylesheet("  \n ").size).toBe(0);
    expect(validateStylesheetSyntax("")).toBeNull();
  });

  it("rejects a block without a selector", () => {
    const err = parseError("{ color: red; }");
    expect(err.kind).toBe(ErrorKind.InvalidSyntax);
    expect(err.details).toBe("Expected a selector (tag, #id or .class) before '{'.");
  });

  it("rejects a gap between '#' and the name", () => {
    const err = parseError("# main { color: red; }");
    expect(err.kind).toBe(ErrorKind.InvalidSyntax);
    expect(err.details).toBe("Expected a name immediately after '#'.");
  });

  it("rejects a block that never closes", () => {
    const err = parseError("p { color: red;");
    expect(err.kind).toBe(ErrorKind.InvalidSyntax);
    expect(err.details).toBe("Expected a property or '}', found end of input instead.");
  });

  it("rejects a selector with no block", () => {
    const err = parseError("rect");
    expect(err.details).toBe("Expected a selector, found end of input instead.");
  });

  it("reports the stylesheet's file name", () => {
    const err = parseError("}");
    expect(err.file).toBe("style.gms");
    expect(err.message).toBe(
      "InvalidSyntax: Expected a selector, found '}' instead. (style.gms, line 1, column 1)",
    );
  });
});
