import type { AstNode, AstNodeList, AstTag, ElementName } from "../gemxml/ast.js";
import { isElementName } from "../gemxml/ast.js";
import { ErrorKind, GemError } from "../errors.js";
import type { SourceRange } from "../source/location.js";
import type {
  Content,
  Emphasis,
  HeaderLevel,
  NodeHandle,
  TextContent,
  Window,
} from "../scene/types.js";
import { NodeRegistry } from "./registry.js";

export type IncludeKind = "style" | "md";

export const INCLUDE_KINDS: readonly IncludeKind[] = ["style", "md"];

const INCLUDE_EXTENSIONS: Record<IncludeKind, { ext: string; label: string }> = {
  style: { ext: ".gms", label: "Stylesheet" },
  md: { ext: ".md", label: "Markdown file" },
};

/** An `<include>` left for the caller to resolve */
export interface IncludeRef {
  as: IncludeKind;
  path: string;
  loc: SourceRange;
}

export interface CompilerOptions {
  /** Name used in error messages */
  file?: string;
  /** Existence check for included files; omitted means no check */
  fileExists?: (path: string) => boolean;
}

export interface CompileResult {
  window: Window;
  registry: NodeRegistry;
  includes: IncludeRef[];
}

const WINDOW_DEFAULTS = { x: 45, y: 35, width: 30, height: 20, title: "Title" };
const RECT_DEFAULTS = { width: 10, height: 6 };
const CIRCLE_DEFAULT_RADIUS = 4;
const LINE_ATTRIBUTES = ["startx", "starty", "endx", "endy"] as const;

const INTEGER = /^-?\d+$/;

/**
 * Turns a parsed GemXML document into a `Window` scene graph. One instance
 * compiles one document: the window, registry and includes belong to it.
 */
export class Compiler {
  private window: Window | null = null;
  private readonly registry = new NodeRegistry();
  private readonly includes: IncludeRef[] = [];
  private readonly file: string;

  constructor(private readonly options: CompilerOptions = {}) {
    this.file = options.file ?? "<input>";
  }

  /** The document must be a single `<window>` element */
  validate(ast: AstNodeList): AstTag {
    const [root] = ast.body;
    if (ast.body.length !== 1 || !root) {
      throw this.error(
        ErrorKind.WindowError,
        "A GemXML file can only support one window at a time.",
        ast.loc,
      );
    }
    if (root.kind !== "tag" || root.name !== "window") {
      throw this.error(
        ErrorKind.WindowError,
        "Expected <window> tag at the start of the file.",
        ast.loc,
      );
    }
    return root;
  }

  compile(ast: AstNodeList): CompileResult {
    const root = this.validate(ast);
    this.visitTag(root);
    const window = this.requireWindow(root);
    return { window, registry: this.registry, includes: [...this.includes] };
  }

  private visitNodes(list: AstNodeList): Content[] {
    const produced: Content[] = [];
    for (const node of list.body) {
      produced.push(...this.visit(node));
    }
    return produced;
  }

  /** Each visitor returns the content nodes it produced, in order */
  private visit(node: AstNode): Content[] {
    if (node.kind === "text") {
      return [this.registry.add((handle) => text(handle, node.content))];
    }
    return this.visitTag(node);
  }

  private visitTag(node: AstTag): Content[] {
    const name = node.name;
    if (!isElementName(name)) {
      throw this.error(ErrorKind.UnknownTag, `<${name}> (when compiling)`, node.loc);
    }
    const built = this.build(name, node);
    if (built) {
      this.registerClassAndId(built, node);
      return [built];
    }
    return [];
  }

  private build(name: ElementName, node: AstTag): Content | null {
    switch (name) {
      case "window":
        this.buildWindow(node);
        return null;
      case "include":
        this.recordInclude(node);
        return null;
      case "text":
        return this.registry.add((handle) => text(handle, this.literalText(node)));
      case "rect":
        return this.buildRect(node);
      case "circle":
        return this.buildCircle(node);
      case "line":
        return this.buildLine(node);
      case "div": {
        const contents = this.visitNodes(node.content);
        return this.registry.add((handle) => ({ kind: "div", handle, contents, styles: {} }));
      }
      case "h1":
      case "h2":
      case "h3": {
        const level = headerLevel(name);
        const contents = this.visitNodes(node.content);
        return this.registry.add((handle) => ({
          kind: "header",
          handle,
          level,
          contents,
          styles: {},
        }));
      }
      case "b":
      case "i":
      case "bi":
      case "u": {
        const emphasis: Emphasis = name;
        const contents = this.visitNodes(node.content);
        return this.registry.add((handle) => ({
          kind: "styledcontent",
          handle,
          emphasis,
          contents,
          styles: {},
        }));
      }
      default: {
        const unreachable: never = name;
        throw this.error(ErrorKind.UnknownTag, `<${String(unreachable)}> (when compiling)`, node.loc);
      }
    }
  }

  private buildWindow(node: AstTag): void {
    const x = this.intAttr(node, "x", WINDOW_DEFAULTS.x);
    const y = this.intAttr(node, "y", WINDOW_DEFAULTS.y);
    const width = this.intAttr(node, "width", WINDOW_DEFAULTS.width);
    const height = this.intAttr(node, "height", WINDOW_DEFAULTS.height);
    const title = node.attributes.get("title") ?? WINDOW_DEFAULTS.title;

    if (this.window !== null) {
      throw this.error(ErrorKind.WindowError, "There can only be one.", node.loc);
    }
    const window: Window = { kind: "window", x, y, width, height, title, contents: [], styles: {} };
    this.window = window;
    window.contents = this.visitNodes(node.content);
  }

  private buildRect(node: AstTag): Content {
    const window = this.requireWindow(node);
    const x = this.intAttr(node, "x", Math.floor(window.width / 2) - 5);
    const y = this.intAttr(node, "y", Math.floor(window.height / 2) - 3);
    const width = this.intAttr(node, "width", RECT_DEFAULTS.width);
    const height = this.intAttr(node, "height", RECT_DEFAULTS.height);
    return this.registry.add((handle) => ({ kind: "rect", handle, x, y, width, height, styles: {} }));
  }

  private buildCircle(node: AstTag): Content {
    const window = this.requireWindow(node);
    const x = this.intAttr(node, "x", Math.floor(window.width / 2));
    const y = this.intAttr(node, "y", Math.floor(window.height / 2));
    const radius = this.intAttr(node, "radius", CIRCLE_DEFAULT_RADIUS);
    return this.registry.add((handle) => ({ kind: "circle", handle, x, y, radius, styles: {} }));
  }

  private buildLine(node: AstTag): Content {
    for (const attr of LINE_ATTRIBUTES) {
      if (!node.attributes.has(attr)) {
        throw this.error(ErrorKind.MissingAttribute, `Missing attribute: '${attr}'`, node.loc);
      }
    }
    const startX = this.intAttr(node, "startx");
    const startY = this.intAttr(node, "starty");
    const endX = this.intAttr(node, "endx");
    const endY = this.intAttr(node, "endy");
    return this.registry.add((handle) => ({
      kind: "line",
      handle,
      startX,
      startY,
      endX,
      endY,
      styles: {},
    }));
  }

  private recordInclude(node: AstTag): void {
    const as = node.attributes.get("as");
    if (as === undefined) {
      throw this.error(ErrorKind.MissingAttribute, "Missing attribute: 'as'", node.loc);
    }
    if (!isIncludeKind(as)) {
      throw this.error(
        ErrorKind.AttributeError,
        `Expected one of the following for 'as' attribute: ${INCLUDE_KINDS.join(", ")}.`,
        node.loc,
      );
    }

    const children = node.content.body;
    const [pathNode] = children;
    if (!pathNode) {
      throw this.error(ErrorKind.MissingAttribute, "File path cannot be empty.", node.loc);
    }
    if (children.length !== 1 || pathNode.kind !== "text") {
      throw this.error(ErrorKind.FileError, "Expected a single file path.", node.loc);
    }

    const path = pathNode.content.trim();
    const { ext, label } = INCLUDE_EXTENSIONS[as];
    if (!path.endsWith(ext)) {
      throw this.error(ErrorKind.FileError, `${label} must end in '${ext}'.`, node.loc);
    }
    if (this.options.fileExists && !this.options.fileExists(path)) {
      throw this.error(ErrorKind.FileError, `Cannot find file ${path}.`, node.loc);
    }

    this.includes.push({ as, path, loc: node.loc });
  }

  /** A `<text>` element holds literal lines only */
  private literalText(node: AstTag): string {
    const lines: string[] = [];
    for (const child of node.content.body) {
      if (child.kind !== "text") {
        throw this.error(
          ErrorKind.InvalidSyntax,
          `<text> may only contain literal text, found <${child.name}>.`,
          child.loc,
        );
      }
      lines.push(child.content);
    }
    return lines.join("\n");
  }

  private registerClassAndId(built: Content, node: AstTag): void {
    const classAttr = node.attributes.get("class");
    if (classAttr !== undefined) {
      for (const className of new Set(classAttr.split(/\s+/).filter(Boolean))) {
        this.registry.addClass(className, built.handle);
      }
    }

    const id = node.attributes.get("id");
    if (id !== undefined) {
      const owner: NodeHandle | undefined = this.registry.assignId(id, built.handle);
      if (owner !== undefined) {
        const holder = this.registry.node(owner);
        throw this.error(
          ErrorKind.IdCollision,
          `ID '${id}' is already used by a <${holder.kind}> node.`,
          node.loc,
        );
      }
    }
  }

  private intAttr(node: AstTag, name: string, fallback?: number): number {
    const raw = node.attributes.get(name);
    if (raw === undefined) {
      if (fallback === undefined) {
        throw this.error(ErrorKind.MissingAttribute, `Missing attribute: '${name}'`, node.loc);
      }
      return fallback;
    }
    const trimmed = raw.trim();
    if (!INTEGER.test(trimmed)) {
      throw this.error(
        ErrorKind.AttributeError,
        `Expected an integer for '${name}', got '${raw}'.`,
        node.loc,
      );
    }
    return parseInt(trimmed, 10);
  }

  private requireWindow(node: { loc: SourceRange }): Window {
    if (!this.window) {
      throw this.error(ErrorKind.WindowError, "Content must be inside a <window>.", node.loc);
    }
    return this.window;
  }

  private error(kind: ErrorKind, details: string, loc: SourceRange): GemError {
    return new GemError(kind, details, this.file, loc.start, loc.end);
  }
}

function text(handle: NodeHandle, content: string): TextContent {
  return { kind: "text", handle, text: content, styles: {} };
}

function headerLevel(name: "h1" | "h2" | "h3"): HeaderLevel {
  switch (name) {
    case "h1":
      return 1;
    case "h2":
      return 2;
    case "h3":
      return 3;
  }
}

function isIncludeKind(value: string): value is IncludeKind {
  return INCLUDE_KINDS.some((kind) => kind === value);
}

/** Validate and compile a parsed document */
export function compileDocument(ast: AstNodeList, options?: CompilerOptions): CompileResult {
  return new Compiler(options).compile(ast);
}
