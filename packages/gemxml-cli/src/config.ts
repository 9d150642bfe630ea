import * as fs from "node:fs";
import * as path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const CONFIG_FILE_NAME = "gemxml.config.json";

const ConfigFileSchema = Type.Object(
  {
    assetsDir: Type.Optional(Type.String({ minLength: 1 })),
    verbose: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFileSchema>;

export interface CliConfig {
  /** Directory include paths are resolved against */
  assetsDir: string;
  verbose: boolean;
}

export const DEFAULT_CONFIG: CliConfig = {
  assetsDir: "assets",
  verbose: false,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Validate parsed JSON against the config schema */
export function parseConfig(json: unknown, source = CONFIG_FILE_NAME): ConfigFile {
  if (!Value.Check(ConfigFileSchema, json)) {
    const problems = [...Value.Errors(ConfigFileSchema, json)]
      .map((e) => `${e.path || "/"}: ${e.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${source}: ${problems}`);
  }
  return json;
}

/**
 * Load the config file if there is one. Relative `assetsDir` values are
 * resolved against the config file's directory.
 */
export function loadConfig(configPath: string, overrides: Partial<CliConfig> = {}): CliConfig {
  let fromFile: ConfigFile = {};
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, "utf-8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    fromFile = parseConfig(json, configPath);
  }

  const baseDir = path.dirname(path.resolve(configPath));
  const assetsDir = overrides.assetsDir ?? fromFile.assetsDir ?? DEFAULT_CONFIG.assetsDir;
  return {
    assetsDir: path.resolve(baseDir, assetsDir),
    verbose: overrides.verbose ?? fromFile.verbose ?? DEFAULT_CONFIG.verbose,
  };
}
