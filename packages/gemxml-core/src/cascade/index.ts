/**
 * Applies parsed GemSheet rules to a compiled scene graph.
 *
 * For every node, parent first: copy all of the parent's resolved styles,
 * then walk the rules in source order and let every rule whose selector
 * matches overwrite the node's properties. A selector string is a list of
 * whitespace-separated alternatives (`rect .box #main`); any one matching
 * selects the rule. Later rules win, and with several stylesheets each one
 * is a full pass over the tree after the previous one.
 */
import type { NodeRegistry } from "../compiler/registry.js";
import type { StyleRules } from "../gemsheet/parser.js";
import { childrenOf, type SceneNode, type Window } from "../scene/types.js";

/** The selector alternatives a node answers to: kind, `#id`, `.class` */
export function selectorKeys(node: SceneNode, registry: NodeRegistry): Set<string> {
  const keys = new Set<string>([node.kind]);
  if (node.kind === "window") return keys;

  const id = registry.idOf(node.handle);
  if (id !== undefined) keys.add(`#${id}`);
  for (const className of registry.classesOf(node.handle)) {
    keys.add(`.${className}`);
  }
  return keys;
}

export function selectorMatches(selector: string, keys: ReadonlySet<string>): boolean {
  return selector.split(/\s+/).some((alt) => alt.length > 0 && keys.has(alt));
}

function cascade(
  rules: StyleRules,
  node: SceneNode,
  parent: SceneNode | null,
  registry: NodeRegistry,
): void {
  if (parent) {
    for (const [property, value] of Object.entries(parent.styles)) {
      node.styles[property] = value;
    }
  }

  const keys = selectorKeys(node, registry);
  for (const [selector, declarations] of rules) {
    if (!selectorMatches(selector, keys)) continue;
    for (const [property, value] of Object.entries(declarations)) {
      node.styles[property] = value;
    }
  }

  for (const child of childrenOf(node) ?? []) {
    cascade(rules, child, node, registry);
  }
}

/** One full cascade pass of a single stylesheet */
export function applyStylesheet(rules: StyleRules, window: Window, registry: NodeRegistry): void {
  cascade(rules, window, null, registry);
}

/** Apply stylesheets in include order; later sheets dominate */
export function applyStylesheets(
  sheets: readonly StyleRules[],
  window: Window,
  registry: NodeRegistry,
): void {
  for (const rules of sheets) {
    applyStylesheet(rules, window, registry);
  }
}
