import type { BehaviorTree, NodeHandle } from "./tree.js";

/**
 * Every attached element whose `attrName` attribute equals `value`, anywhere
 * below the root, in document order. `elementName` restricts the match to one
 * tag (the `//Component[@ID='x']` lookup).
 *
 * Callers check the length to tell a missing node from an ambiguous one.
 */
export function findByAttribute(tree: BehaviorTree, attrName: string, value: string, elementName?: string): NodeHandle[] {
  const matches: NodeHandle[] = [];
  const visit = (handle: NodeHandle): void => {
    const node = tree.node(handle);
    if (node.kind !== "element") return;
    if ((!elementName || node.name === elementName) && node.attributes.some(a => a.name === attrName && a.value === value)) {
      matches.push(handle);
    }
    for (const child of node.children) visit(child);
  };
  visit(tree.root);
  return matches;
}
