import { applyStylesheets } from "../cascade/index.js";
import { Compiler, type IncludeRef } from "../compiler/compiler.js";
import type { NodeRegistry } from "../compiler/registry.js";
import { ErrorKind, GemError } from "../errors.js";
import { EventEmitter, type CompileEvent } from "../events/index.js";
import { parseStylesheet, type StyleRules } from "../gemsheet/parser.js";
import { Lexer } from "../gemxml/lexer.js";
import { Parser } from "../gemxml/parser.js";
import type { Window } from "../scene/types.js";

/** How the core reaches included files; implemented outside the core */
export interface IncludeProvider {
  exists(path: string): boolean;
  read(path: string): string;
}

export interface ProcessOptions {
  /** Name of the document, used in errors and events */
  file?: string;
  /** Resolves `<include>` paths; required once a document includes a stylesheet */
  includes?: IncludeProvider;
  onEvent?: (event: CompileEvent) => void;
}

export interface LoadedStylesheet {
  path: string;
  rules: StyleRules;
}

export interface ProcessResult {
  window: Window;
  registry: NodeRegistry;
  includes: IncludeRef[];
  stylesheets: LoadedStylesheet[];
}

export type ProcessOutcome =
  | { ok: true; result: ProcessResult }
  | { ok: false; error: GemError };

/**
 * Lex, parse, compile and style a GemXML document.
 * This is the primary entry point; the first error aborts everything.
 */
export function processDocument(source: string, options: ProcessOptions = {}): ProcessResult {
  const file = options.file ?? "<input>";
  const emitter = new EventEmitter();
  if (options.onEvent) emitter.on(options.onEvent);
  const now = () => new Date().toISOString();

  try {
    // 1. Lex
    const tokens = new Lexer(source, file).tokenize();
    emitter.emit({ type: "document_lexed", file, tokenCount: tokens.length, timestamp: now() });

    // 2. Parse
    const ast = new Parser(file).parseTokens(tokens);
    emitter.emit({ type: "document_parsed", file, nodeCount: ast.body.length, timestamp: now() });

    // 3. Compile
    const provider = options.includes;
    const compiler = new Compiler({
      file,
      ...(provider && { fileExists: (path: string) => provider.exists(path) }),
    });
    const { window, registry, includes } = compiler.compile(ast);
    emitter.emit({
      type: "document_compiled",
      file,
      contentCount: registry.size,
      includeCount: includes.length,
      timestamp: now(),
    });

    // 4. Load stylesheets in include order
    const stylesheets: LoadedStylesheet[] = [];
    for (const include of includes) {
      if (include.as !== "style") continue;
      if (!provider) {
        throw new GemError(
          ErrorKind.FileError,
          `No include provider to read ${include.path}.`,
          file,
          include.loc.start,
          include.loc.end,
        );
      }
      let text: string;
      try {
        text = provider.read(include.path);
      } catch (err) {
        throw new GemError(
          ErrorKind.FileError,
          `Cannot read file ${include.path}: ${err instanceof Error ? err.message : String(err)}`,
          file,
          include.loc.start,
          include.loc.end,
        );
      }
      const rules = parseStylesheet(text, include.path);
      stylesheets.push({ path: include.path, rules });
    }

    // 5. Cascade
    applyStylesheets(
      stylesheets.map((s) => s.rules),
      window,
      registry,
    );
    for (const sheet of stylesheets) {
      emitter.emit({
        type: "stylesheet_applied",
        file: sheet.path,
        ruleCount: sheet.rules.size,
        timestamp: now(),
      });
    }

    return { window, registry, includes, stylesheets };
  } catch (err) {
    if (err instanceof GemError) {
      emitter.emit({
        type: "compile_failed",
        file: err.file,
        kind: err.kind,
        error: err.message,
        timestamp: now(),
      });
    }
    throw err;
  }
}

/** Same as processDocument, with GemErrors returned instead of thrown */
export function tryProcessDocument(source: string, options?: ProcessOptions): ProcessOutcome {
  try {
    return { ok: true, result: processDocument(source, options) };
  } catch (err) {
    if (err instanceof GemError) return { ok: false, error: err };
    throw err;
  }
}

