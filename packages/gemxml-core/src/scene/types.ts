/** Resolved style properties: property → raw value */
export type StyleMap = Record<string, string>;

/** Index of a content node in its compile's registry arena */
export type NodeHandle = number;

interface ContentBase {
  handle: NodeHandle;
  /** Filled in by the cascade; empty straight out of the compiler */
  styles: StyleMap;
}

export interface TextContent extends ContentBase {
  kind: "text";
  text: string;
}

export interface RectContent extends ContentBase {
  kind: "rect";
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CircleContent extends ContentBase {
  kind: "circle";
  x: number;
  y: number;
  radius: number;
}

export interface LineContent extends ContentBase {
  kind: "line";
  startX: number;
  startY: number;
  endX: number;
  endY: number;
}

export interface DivContent extends ContentBase {
  kind: "div";
  contents: Content[];
}

export type HeaderLevel = 1 | 2 | 3;

export interface HeaderContent extends ContentBase {
  kind: "header";
  level: HeaderLevel;
  contents: Content[];
}

export type Emphasis = "b" | "i" | "bi" | "u";

export interface StyledContent extends ContentBase {
  kind: "styledcontent";
  emphasis: Emphasis;
  contents: Content[];
}

/**
 * Everything that can appear inside a window. `kind` doubles as the type
 * name stylesheet selectors match against.
 */
export type Content =
  | TextContent
  | RectContent
  | CircleContent
  | LineContent
  | DivContent
  | HeaderContent
  | StyledContent;

/** Root of the scene graph; exactly one per document */
export interface Window {
  kind: "window";
  x: number;
  y: number;
  width: number;
  height: number;
  title: string;
  contents: Content[];
  styles: StyleMap;
}

export type SceneNode = Window | Content;

/** Children of a scene node, or null for leaves */
export function childrenOf(node: SceneNode): Content[] | null {
  switch (node.kind) {
    case "window":
    case "div":
    case "header":
    case "styledcontent":
      return node.contents;
    case "text":
    case "rect":
    case "circle":
    case "line":
      return null;
  }
}
