import * as fs from "node:fs";
import * as path from "node:path";
import { glob } from "glob";
import { GemError, processDocument, type CompileEvent, type ProcessResult } from "@gemxml/core";
import { AssetIncludeProvider } from "./asset-provider.js";
import { CONFIG_FILE_NAME, ConfigError, loadConfig, type CliConfig } from "./config.js";

export function printUsage(): void {
  console.log(`
gemxml - GemXML window markup compiler

Usage:
  gemxml compile <file> [options]
  gemxml check <pattern...> [options]

Commands:
  compile    Compile one document and its stylesheets
  check      Compile every file matching the glob patterns and report errors

Options:
  --assets <dir>     Directory include paths are resolved against (default: assets)
  --config <file>    Config file (default: ${CONFIG_FILE_NAME})
  --verbose          Show compile events

General:
  --help, -h         Show this help
`);
}

const FLAGS_WITH_VALUES = new Set(["--assets", "--config"]);

function getArgValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith("--")) {
      if (FLAGS_WITH_VALUES.has(arg)) i++; // skip the flag's value
      continue;
    }
    result.push(arg);
  }
  return result;
}

function resolveConfig(args: string[]): CliConfig {
  const configPath = path.resolve(getArgValue(args, "--config") ?? CONFIG_FILE_NAME);
  const assetsDir = getArgValue(args, "--assets");
  return loadConfig(configPath, {
    ...(assetsDir !== undefined && { assetsDir: path.resolve(assetsDir) }),
    ...(args.includes("--verbose") && { verbose: true }),
  });
}

function printEvent(event: CompileEvent): void {
  switch (event.type) {
    case "document_lexed":
      console.log(`  [lex] ${event.file}: ${event.tokenCount} tokens`);
      break;
    case "document_parsed":
      console.log(`  [parse] ${event.file}: ${event.nodeCount} top-level nodes`);
      break;
    case "document_compiled":
      console.log(
        `  [compile] ${event.file}: ${event.contentCount} content nodes, ${event.includeCount} includes`,
      );
      break;
    case "stylesheet_applied":
      console.log(`  [style] ${event.file}: ${event.ruleCount} rules`);
      break;
    case "compile_failed":
      console.log(`  [fail] ${event.file}: ${event.kind}`);
      break;
  }
}

/** One-line description of a compiled document */
export function summarize(result: ProcessResult): string {
  const { window } = result;
  return (
    `Window "${window.title}" at (${window.x}, ${window.y}) size ${window.width}x${window.height}: ` +
    `${result.registry.size} content nodes, ${result.stylesheets.length} stylesheets`
  );
}

function compileFile(filePath: string, config: CliConfig): ProcessResult {
  const source = fs.readFileSync(filePath, "utf-8");
  return processDocument(source, {
    file: path.basename(filePath),
    includes: new AssetIncludeProvider(config.assetsDir),
    ...(config.verbose && { onEvent: printEvent }),
  });
}

function reportFailure(err: unknown): void {
  if (err instanceof GemError || err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(`Unexpected failure: ${err}`);
  }
}

/** `gemxml compile <file>`; returns the exit code */
export function compileCommand(args: string[]): number {
  const [file] = positionals(args);
  if (!file) {
    console.error("Error: No GemXML file specified");
    return 1;
  }
  const filePath = path.resolve(file);
  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  try {
    const config = resolveConfig(args);
    console.log(summarize(compileFile(filePath, config)));
    return 0;
  } catch (err) {
    reportFailure(err);
    return 1;
  }
}

/** `gemxml check <pattern...>`; returns the exit code */
export async function checkCommand(args: string[]): Promise<number> {
  const patterns = positionals(args);
  if (patterns.length === 0) {
    console.error("Error: No file pattern specified");
    return 1;
  }

  let config: CliConfig;
  try {
    config = resolveConfig(args);
  } catch (err) {
    reportFailure(err);
    return 1;
  }

  const files = (await glob(patterns, { nodir: true, absolute: true })).sort();
  if (files.length === 0) {
    console.error(`Error: No files match ${patterns.join(" ")}`);
    return 1;
  }

  let failures = 0;
  for (const file of files) {
    try {
      compileFile(file, config);
      console.log(`ok ${path.relative(process.cwd(), file)}`);
    } catch (err) {
      failures++;
      console.error(`FAIL ${path.relative(process.cwd(), file)}`);
      reportFailure(err);
    }
  }
  return failures === 0 ? 0 : 1;
}

/** Dispatch a command line (without the node/script prefix) */
export async function runCli(args: string[]): Promise<number> {
  const command = args[0];
  if (!command || command === "--help" || command === "-h") {
    printUsage();
    return 0;
  }
  if (command === "compile") return compileCommand(args.slice(1));
  if (command === "check") return checkCommand(args.slice(1));

  console.error(`Unknown command: ${command}`);
  printUsage();
  return 1;
}
