/**
 * Behavior Tree - arena-backed mutable XML tree
 *
 * Nodes live in a flat array and are addressed by their index (`NodeHandle`).
 * Detaching a node only unlinks it from its parent: the slot stays in the
 * arena and is never reused, so a handle held by the caller keeps pointing at
 * the same (now orphaned) node.
 */

export type NodeHandle = number;

export interface XmlAttribute {
  name: string;
  value: string;
}

export interface ElementNode {
  kind: "element";
  name: string;
  attributes: XmlAttribute[];
  children: NodeHandle[];
  parent: NodeHandle | null;
  /** Written as `<x />` when it has no children */
  selfClosing: boolean;
}

export interface CharacterNode {
  kind: "text" | "cdata" | "comment";
  value: string;
  parent: NodeHandle | null;
}

export interface InstructionNode {
  kind: "instruction";
  target: string;
  body: string;
  parent: NodeHandle | null;
}

export type BehaviorNode = ElementNode | CharacterNode | InstructionNode;

export class BehaviorTree {
  private readonly nodes: BehaviorNode[] = [];
  readonly root: NodeHandle;

  constructor(rootName: string, attributes: XmlAttribute[] = [], selfClosing = false) {
    this.root = this.add({ kind: "element", name: rootName, attributes: [...attributes], children: [], parent: null, selfClosing });
  }

  // ── Node creation ──────────────────────────────────────

  createElement(name: string, attributes: XmlAttribute[] = [], selfClosing = false): NodeHandle {
    return this.add({ kind: "element", name, attributes: [...attributes], children: [], parent: null, selfClosing });
  }

  createCharacters(kind: CharacterNode["kind"], value: string): NodeHandle {
    return this.add({ kind, value, parent: null });
  }

  createInstruction(target: string, body: string): NodeHandle {
    return this.add({ kind: "instruction", target, body, parent: null });
  }

  /** Element holding a single text node, e.g. `<PUSH_NAME>value</PUSH_NAME>` */
  createTextElement(name: string, text: string): NodeHandle {
    const handle = this.createElement(name);
    this.appendChild(handle, this.createCharacters("text", text));
    return handle;
  }

  // ── Access ─────────────────────────────────────────────

  node(handle: NodeHandle): BehaviorNode {
    const node = this.nodes[handle];
    if (!node) throw new RangeError(`Unknown node handle ${handle}`);
    return node;
  }

  element(handle: NodeHandle): ElementNode {
    const node = this.node(handle);
    if (node.kind !== "element") throw new TypeError(`Node ${handle} is a ${node.kind} node, not an element`);
    return node;
  }

  isElement(handle: NodeHandle): boolean {
    return this.node(handle).kind === "element";
  }

  children(handle: NodeHandle): readonly NodeHandle[] {
    const node = this.node(handle);
    return node.kind === "element" ? node.children : [];
  }

  firstElementChild(handle: NodeHandle): NodeHandle | undefined {
    return this.children(handle).find(child => this.isElement(child));
  }

  getAttribute(handle: NodeHandle, name: string): string | undefined {
    return this.element(handle).attributes.find(a => a.name === name)?.value;
  }

  /** Concatenated text and CDATA content of the direct children */
  textContent(handle: NodeHandle): string {
    let text = "";
    for (const child of this.children(handle)) {
      const node = this.node(child);
      if (node.kind === "text" || node.kind === "cdata") text += node.value;
    }
    return text;
  }


  // ── Mutation ───────────────────────────────────────────

  setAttribute(handle: NodeHandle, name: string, value: string): void {
    const attrs = this.element(handle).attributes;
    const existing = attrs.find(a => a.name === name);
    if (existing) existing.value = value;
    else attrs.push({ name, value });
  }

  appendChild(parent: NodeHandle, child: NodeHandle): void {
    if (child === this.root) throw new Error("The root element cannot be appended");
    if (this.node(child).parent !== null) this.detach(child);
    this.element(parent).children.push(child);
    this.node(child).parent = parent;
  }

  detach(handle: NodeHandle): void {
    if (handle === this.root) throw new Error("The root element cannot be detached");
    const node = this.node(handle);
    if (node.parent === null) return;
    const siblings = this.element(node.parent).children;
    siblings.splice(siblings.indexOf(handle), 1);
    node.parent = null;
  }

  /**
   * Removes every child and every attribute not named in `keepAttributes`.
   * The element keeps its place in the tree.
   */
  clearContent(handle: NodeHandle, keepAttributes: readonly string[] = []): void {
    const el = this.element(handle);
    for (const child of [...el.children]) this.detach(child);
    el.attributes = el.attributes.filter(a => keepAttributes.includes(a.name));
    el.selfClosing = false;
  }

  // ── Traversal ──────────────────────────────────────────

  /** Attached nodes under `from` (inclusive), depth-first in document order. */
  *walk(from: NodeHandle = this.root): Generator<NodeHandle> {
    yield from;
    for (const child of this.children(from)) yield* this.walk(child);
  }

  countNodes(kind?: BehaviorNode["kind"]): number {
    let count = 0;
    for (const handle of this.walk()) {
      if (!kind || this.node(handle).kind === kind) count++;
    }
    return count;
  }

  private add(node: BehaviorNode): NodeHandle {
    this.nodes.push(node);
    return this.nodes.length - 1;
  }
}
