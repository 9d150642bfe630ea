export * from "./ast.js";
export * from "./lexer.js";
export * from "./parser.js";
