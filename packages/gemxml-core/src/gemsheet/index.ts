export * from "./lexer.js";
export * from "./parser.js";
