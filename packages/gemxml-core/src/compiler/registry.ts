import type { Content, NodeHandle } from "../scene/types.js";

/**
 * Per-compile arena of content nodes plus the class and id indexes.
 * Nodes are addressed by handle; nothing here is shared between compiles.
 */
export class NodeRegistry {
  private arena: Content[] = [];
  private classIndex = new Map<string, NodeHandle[]>();
  private classesByHandle = new Map<NodeHandle, string[]>();
  private idIndex = new Map<string, NodeHandle>();
  private idByHandle = new Map<NodeHandle, string>();

  /** Allocate the next handle and store the node built for it */
  add(build: (handle: NodeHandle) => Content): Content {
    const node = build(this.arena.length);
    this.arena.push(node);
    return node;
  }

  get size(): number {
    return this.arena.length;
  }

  node(handle: NodeHandle): Content {
    const node = this.arena[handle];
    if (!node) throw new Error(`Unknown node handle: ${handle}`);
    return node;
  }

  nodes(): readonly Content[] {
    return this.arena;
  }

  addClass(className: string, handle: NodeHandle): void {
    const members = this.classIndex.get(className);
    if (members) {
      members.push(handle);
    } else {
      this.classIndex.set(className, [handle]);
    }
    const classes = this.classesByHandle.get(handle);
    if (classes) {
      classes.push(className);
    } else {
      this.classesByHandle.set(handle, [className]);
    }
  }

  /**
   * Register `id` for `handle`. Returns the handle already holding the id
   * when there is one (and registers nothing), undefined on success.
   */
  assignId(id: string, handle: NodeHandle): NodeHandle | undefined {
    const owner = this.idIndex.get(id);
    if (owner !== undefined && owner !== handle) return owner;
    this.idIndex.set(id, handle);
    this.idByHandle.set(handle, id);
    return undefined;
  }

  /** Nodes carrying `className`, in registration order */
  withClass(className: string): Content[] {
    return (this.classIndex.get(className) ?? []).map((h) => this.node(h));
  }

  withId(id: string): Content | undefined {
    const handle = this.idIndex.get(id);
    return handle === undefined ? undefined : this.node(handle);
  }

  classesOf(handle: NodeHandle): readonly string[] {
    return this.classesByHandle.get(handle) ?? [];
  }

  idOf(handle: NodeHandle): string | undefined {
    return this.idByHandle.get(handle);
  }

  classNames(): string[] {
    return [...this.classIndex.keys()];
  }

  ids(): string[] {
    return [...this.idIndex.keys()];
  }
}
