// GemXML Core - markup and stylesheet compiler for window layouts
export * from "./source/location.js";
export * from "./errors.js";
export * from "./gemsheet/index.js";
export * from "./gemxml/index.js";
export * from "./scene/index.js";
export * from "./compiler/index.js";
export * from "./cascade/index.js";
export * from "./events/index.js";
export * from "./pipeline/index.js";
