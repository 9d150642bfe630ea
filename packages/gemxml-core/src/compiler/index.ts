export * from "./registry.js";
export * from "./compiler.js";
