import { describe, it, expect } from "vitest";
import { parseGemXml } from "../src/gemxml/parser.js";
import type { AstNode, AstTag } from "../src/gemxml/ast.js";
import { ErrorKind, GemError } from "../src/errors.js";

function parseError(source: string): GemError {
  try {
    parseGemXml(source, "doc.xml");
  } catch (err) {
    if (err instanceof GemError) return err;
    throw err;
  }
  throw new Error("expected the parser to fail");
}

function asTag(node: AstNode | undefined): AstTag {
  if (node?.kind !== "tag") throw new Error(`expected a tag, got ${node?.kind}`);
  return node;
}

describe("Parser", () => {
  it("builds a tree of tags and text", () => {
    const ast = parseGemXml("<window><text>Hi</text></window>");
    expect(ast.body.length).toBe(1);
    const window = asTag(ast.body[0]);
    expect(window.name).toBe("window");
    const text = asTag(window.content.body[0]);
    expect(text.name).toBe("text");
    expect(text.content.body).toEqual([
      {
        kind: "text",
        content: "Hi",
        loc: {
          start: { line: 1, column: 15, offset: 14 },
          end: { line: 1, column: 17, offset: 16 },
        },
      },
    ]);
  });

  it("collects attributes with the last value winning", () => {
    const ast = parseGemXml('<div id="a" class="box" id="b"></div>');
    const div = asTag(ast.body[0]);
    expect([...div.attributes.entries()]).toEqual([
      ["id", "b"],
      ["class", "box"],
    ]);
  });

  it("treats quoted data in content as literal text", () => {
    const ast = parseGemXml('<include as="style">"theme.gms"</include>');
    const include = asTag(ast.body[0]);
    expect(include.attributes.get("as")).toBe("style");
    expect(include.content.body.map((n) => n.kind === "text" && n.content)).toEqual(["theme.gms"]);
  });

  it("keeps siblings in order", () => {
    const ast = parseGemXml("<div>one<b>two</b>three</div>");
    const div = asTag(ast.body[0]);
    expect(div.content.body.map((n) => (n.kind === "text" ? n.content : `<${n.name}>`))).toEqual([
      "one",
      "<b>",
      "three",
    ]);
  });

  it("spans a node list from its first to its last child", () => {
    const ast = parseGemXml("  <div></div>  <b></b>");
    expect(ast.loc.start.offset).toBe(2);
    expect(ast.loc.end.offset).toBe(22);
    expect(asTag(ast.body[0]).loc).toEqual({
      start: { line: 1, column: 3, offset: 2 },
      end: { line: 1, column: 14, offset: 13 },
    });
  });

  it("parses an empty document to an empty list", () => {
    const ast = parseGemXml("");
    expect(ast.body).toEqual([]);
    expect(ast.loc.start).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it("nests shorthand like the equivalent tags", () => {
    const shorthand = parseGemXml("<window>\n# **Big** news\n</window>");
    const header = asTag(asTag(shorthand.body[0]).content.body[0]);
    expect(header.name).toBe("h1");
    expect(header.content.body.map((n) => n.kind)).toEqual(["tag", "text"]);
    const bold = asTag(header.content.body[0]);
    expect(bold.name).toBe("b");
    expect(bold.content.body.map((n) => n.kind === "text" && n.content)).toEqual(["Big"]);
  });

  it("rejects a close tag that does not match", () => {
    const err = parseError("<div>x</b>");
    expect(err.kind).toBe(ErrorKind.InvalidSyntax);
    expect(err.details).toBe("Expected </div>, found </b> instead.");
    expect(err.start.offset).toBe(6);
  });

  it("rejects an element left open", () => {
    const err = parseError("<div>x");
    expect(err.kind).toBe(ErrorKind.InvalidSyntax);
    expect(err.details).toBe("Expected </div>, found end of input instead.");
  });

  it("rejects a stray close tag", () => {
    const err = parseError("<div></div></div>");
    expect(err.kind).toBe(ErrorKind.InvalidSyntax);
    expect(err.details).toBe("Cannot fully parse the document: unexpected </div>.");
    expect(err.start.offset).toBe(11);
  });

  it("rejects a heading whose line swallows a close tag", () => {
    const err = parseError("<window># Hi</window>");
    expect(err.details).toBe("Expected </h1>, found </window> instead.");
  });
});
