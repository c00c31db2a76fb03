/**
 * Format-preserving writer
 *
 * Output layout expected by the simulator's loader:
 *
 *   <CRLF>
 *   <ModelInfo ...>...</ModelInfo>      (verbatim header)
 *   <CRLF>
 *   <ModelBehaviors>...</ModelBehaviors>  (re-indented body, no trailing newline)
 *
 * No XML declaration and no byte-order mark: the header carries none either.
 */
import { writeFile } from "node:fs/promises";
import { IOFailureError } from "../errors.js";
import type { AssetDocument } from "./reader.js";
import type { BehaviorTree, ElementNode, NodeHandle, XmlAttribute } from "./tree.js";

export interface WriterOptions {
  indent: string;
  newLine: string;
}

export const DEFAULT_WRITER_OPTIONS: WriterOptions = { indent: "\t", newLine: "\r\n" };

export function serializeAssetDocument(doc: AssetDocument, options: WriterOptions = DEFAULT_WRITER_OPTIONS): string {
  return options.newLine + doc.headerText + options.newLine + serializeTree(doc.body, options);
}

export function serializeTree(tree: BehaviorTree, options: WriterOptions = DEFAULT_WRITER_OPTIONS): string {
  const out: string[] = [];
  writeNode(tree, tree.root, 0, false, out, options);
  return out.join("");
}

export async function writeAssetDocument(filePath: string, doc: AssetDocument, options: WriterOptions = DEFAULT_WRITER_OPTIONS): Promise<void> {
  try {
    await writeFile(filePath, serializeAssetDocument(doc, options), { encoding: "utf8" });
  } catch (e) {
    throw new IOFailureError(filePath, "write", e);
  }
}

// ── Serialization ─────────────────────────────────────────

/**
 * `inline` is set inside mixed content: once an element holds text, none of
 * its descendants get line breaks or indentation, since those would become
 * part of the text.
 */
function writeNode(tree: BehaviorTree, handle: NodeHandle, depth: number, inline: boolean, out: string[], options: WriterOptions): void {
  const node = tree.node(handle);
  switch (node.kind) {
    case "text":
      out.push(escapeText(node.value, options.newLine));
      return;
    case "cdata":
      out.push(`<![CDATA[${node.value}]]>`);
      return;
    case "comment":
      out.push(`<!--${node.value}-->`);
      return;
    case "instruction":
      out.push(node.body ? `<?${node.target} ${node.body}?>` : `<?${node.target}?>`);
      return;
    case "element":
      writeElement(tree, node, depth, inline, out, options);
  }
}

function writeElement(tree: BehaviorTree, el: ElementNode, depth: number, inline: boolean, out: string[], options: WriterOptions): void {
  const open = `<${el.name}${formatAttributes(el.attributes)}`;

  if (el.children.length === 0) {
    out.push(el.selfClosing ? `${open} />` : `${open}></${el.name}>`);
    return;
  }

  out.push(`${open}>`);
  const mixed = inline || el.children.some(child => {
    const kind = tree.node(child).kind;
    return kind === "text" || kind === "cdata";
  });

  for (const child of el.children) {
    if (!mixed) out.push(options.newLine + options.indent.repeat(depth + 1));
    writeNode(tree, child, depth + 1, mixed, out, options);
  }

  if (!mixed) out.push(options.newLine + options.indent.repeat(depth));
  out.push(`</${el.name}>`);
}

function formatAttributes(attributes: readonly XmlAttribute[]): string {
  return attributes.map(a => ` ${a.name}="${escapeAttribute(a.value)}"`).join("");
}

export function escapeText(value: string, newLine = "\r\n"): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\r\n|\r|\n/g, newLine);
}

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/\t/g, "&#x9;")
    .replace(/\n/g, "&#xA;")
    .replace(/\r/g, "&#xD;");
}
