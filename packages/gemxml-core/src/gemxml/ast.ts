import type { SourceRange } from "../source/location.js";

/** Every element name the markup accepts */
export const ELEMENT_NAMES = [
  "window",
  "text",
  "rect",
  "circle",
  "line",
  "include",
  "div",
  "h1",
  "h2",
  "h3",
  "b",
  "i",
  "bi",
  "u",
] as const;

export type ElementName = (typeof ELEMENT_NAMES)[number];

const ELEMENT_NAME_SET: ReadonlySet<string> = new Set(ELEMENT_NAMES);

export function isElementName(name: string): name is ElementName {
  return ELEMENT_NAME_SET.has(name);
}

/** Literal text, either a bare run or a quoted string */
export interface AstText {
  kind: "text";
  content: string;
  loc: SourceRange;
}

/** `<name attr="value">content</name>` */
export interface AstTag {
  kind: "tag";
  name: string;
  /** Unique keys; the last write wins, first-seen order is kept */
  attributes: ReadonlyMap<string, string>;
  content: AstNodeList;
  loc: SourceRange;
}

export type AstNode = AstText | AstTag;

/** Sibling nodes; spans from the first child to the last */
export interface AstNodeList {
  kind: "list";
  body: AstNode[];
  loc: SourceRange;
}
