import * as fs from "node:fs";
import * as path from "node:path";
import type { IncludeProvider } from "@gemxml/core";

/** Reads included files from a fixed assets directory */
export class AssetIncludeProvider implements IncludeProvider {
  readonly root: string;

  constructor(assetsDir: string) {
    this.root = path.resolve(assetsDir);
  }

  resolve(includePath: string): string {
    return path.resolve(this.root, includePath);
  }

  /** Whether `includePath` stays inside the assets directory */
  contains(includePath: string): boolean {
    return this.resolve(includePath).startsWith(this.root + path.sep);
  }

  exists(includePath: string): boolean {
    if (!this.contains(includePath)) return false;
    const full = this.resolve(includePath);
    return fs.existsSync(full) && fs.statSync(full).isFile();
  }

  read(includePath: string): string {
    if (!this.contains(includePath)) {
      throw new Error(`${includePath} is outside the assets directory ${this.root}`);
    }
    return fs.readFileSync(this.resolve(includePath), "utf-8");
  }
}
