/**
 * Dual-root document reader
 *
 * Reads `ModelInfo` as verbatim text and `ModelBehaviors` as a mutable tree.
 * The header is sliced straight out of the source so the vendor's own
 * formatting (attribute order, quoting, whitespace) survives untouched.
 */
import { open } from "node:fs/promises";
import { IOFailureError, MalformedSourceDocumentError } from "../errors.js";
import { BehaviorTree, type NodeHandle } from "./tree.js";
import { type OpenToken, XmlTokenStream } from "./tokenizer.js";

export const HEADER_ELEMENT = "ModelInfo";
export const BODY_ELEMENT = "ModelBehaviors";

export interface AssetDocument {
  /** Outer markup of `<ModelInfo>`, exactly as found in the source */
  headerText: string;
  body: BehaviorTree;
}

export class DualRootReader {
  constructor(private readonly stream: XmlTokenStream) {}

  /** Skips ahead to the next start tag named `name`, at any depth. */
  advanceTo(name: string): OpenToken | undefined {
    for (let token = this.stream.next(); token; token = this.stream.next()) {
      if (token.kind === "open" && token.name === name) return token;
    }
    return undefined;
  }

  /** Consumes the element opened by `start` and returns its outer markup. */
  readOuterXml(start: OpenToken): string {
    let depth = 1;
    for (let token = this.stream.next(); token; token = this.stream.next()) {
      if (token.kind === "open") depth++;
      else if (token.kind === "close" && --depth === 0) {
        return this.stream.source.slice(start.start, token.end);
      }
    }
    throw this.truncated(start.name);
  }

  /** Consumes the element opened by `start` and builds a tree rooted at it. */
  readSubtree(start: OpenToken): BehaviorTree {
    const tree = new BehaviorTree(start.name, start.attributes, start.selfClosing);
    const stack: NodeHandle[] = [tree.root];

    for (let token = this.stream.next(); token; token = this.stream.next()) {
      const parent = stack[stack.length - 1];
      switch (token.kind) {
        case "open": {
          const el = tree.createElement(token.name, token.attributes, token.selfClosing);
          tree.appendChild(parent, el);
          stack.push(el);
          break;
        }
        case "close":
          stack.pop();
          if (stack.length === 0) return tree;
          break;
        case "text":
          // whitespace-only runs are indentation, re-created by the writer
          if (token.value.trim()) tree.appendChild(parent, tree.createCharacters("text", token.value));
          break;
        case "cdata":
        case "comment":
          tree.appendChild(parent, tree.createCharacters(token.kind, token.value));
          break;
        case "instruction":
          tree.appendChild(parent, tree.createInstruction(token.target, token.body));
          break;
      }
    }
    throw this.truncated(start.name);
  }

  private truncated(name: string): MalformedSourceDocumentError {
    return new MalformedSourceDocumentError(this.stream.sourceName, `<${name}> is not closed`);
  }
}

/** Splits an in-memory behavior file into its header text and body tree. */
export function parseAssetDocument(text: string, sourceName = "<memory>"): AssetDocument {
  const reader = new DualRootReader(new XmlTokenStream(text, sourceName));

  const header = reader.advanceTo(HEADER_ELEMENT);
  if (!header) throw new MalformedSourceDocumentError(sourceName, `no <${HEADER_ELEMENT}> element`);
  const headerText = reader.readOuterXml(header);

  const body = reader.advanceTo(BODY_ELEMENT);
  if (!body) throw new MalformedSourceDocumentError(sourceName, `no <${BODY_ELEMENT}> element after <${HEADER_ELEMENT}>`);

  return { headerText, body: reader.readSubtree(body) };
}

export async function readAssetDocument(filePath: string): Promise<AssetDocument> {
  let text: string;
  try {
    const handle = await open(filePath, "r");
    try {
      text = await handle.readFile({ encoding: "utf8" });
    } finally {
      await handle.close();
    }
  } catch (e) {
    throw new IOFailureError(filePath, "read", e);
  }
  return parseAssetDocument(text, filePath);
}
