/**
 * Pull tokenizer for model behavior files
 *
 * The interior behavior files hold two sibling top-level elements
 * (`<ModelInfo>` and `<ModelBehaviors>`) with no enclosing root, so they are
 * tokenized as an XML fragment. The source is fed to saxes one chunk at a
 * time, only when the caller asks for a token the queue does not hold yet.
 *
 * Tokens carry absolute offsets into the source text so an element's outer
 * markup can be sliced out verbatim.
 */
import { SaxesParser } from "saxes";
import { MalformedSourceDocumentError } from "../errors.js";
import type { XmlAttribute } from "./tree.js";

export interface OpenToken {
  kind: "open";
  name: string;
  attributes: XmlAttribute[];
  selfClosing: boolean;
  /** Offset of the `<` starting the tag */
  start: number;
  /** Offset just past the `>` ending the tag */
  end: number;
}

export interface CloseToken {
  kind: "close";
  name: string;
  end: number;
}

export interface CharacterToken {
  kind: "text" | "cdata" | "comment";
  value: string;
}

export interface InstructionToken {
  kind: "instruction";
  target: string;
  body: string;
}

export type XmlToken = OpenToken | CloseToken | CharacterToken | InstructionToken;

const DEFAULT_CHUNK_SIZE = 16 * 1024;

// Optional BOM, then an optional XML declaration
const PROLOG = /^\uFEFF?\s*(?:<\?xml\s[^?]*\?>)?/;

export class XmlTokenStream {
  private readonly parser = new SaxesParser({ fragment: true, position: true });
  private readonly queue: XmlToken[] = [];
  /** Offset of the first character handed to saxes */
  private readonly base: number;
  private offset: number;
  private closed = false;

  constructor(readonly source: string, readonly sourceName: string, private readonly chunkSize = DEFAULT_CHUNK_SIZE) {
    this.base = PROLOG.exec(source)?.[0].length ?? 0;
    this.offset = this.base;

    this.parser.on("opentag", tag => {
      const end = this.base + this.parser.position;
      this.queue.push({
        kind: "open",
        name: tag.name,
        attributes: Object.entries(tag.attributes).map(([name, value]) => ({ name, value })),
        selfClosing: tag.isSelfClosing,
        // '<' cannot appear inside a start tag, so the last one before its end opens it
        start: this.source.lastIndexOf("<", end - 1),
        end,
      });
    });
    this.parser.on("closetag", tag => {
      this.queue.push({ kind: "close", name: tag.name, end: this.base + this.parser.position });
    });
    this.parser.on("text", value => this.queue.push({ kind: "text", value }));
    this.parser.on("cdata", value => this.queue.push({ kind: "cdata", value }));
    this.parser.on("comment", value => this.queue.push({ kind: "comment", value }));
    this.parser.on("processinginstruction", pi => {
      this.queue.push({ kind: "instruction", target: pi.target, body: pi.body });
    });
    this.parser.on("error", err => {
      throw new MalformedSourceDocumentError(this.sourceName, err.message, { cause: err });
    });
  }

  /** Next token, or undefined once the whole source has been consumed. */
  next(): XmlToken | undefined {
    while (this.queue.length === 0 && !this.closed) this.feed();
    return this.queue.shift();
  }

  private feed(): void {
    if (this.offset >= this.source.length) {
      this.closed = true;
      this.parser.close();
      return;
    }
    let end = Math.min(this.offset + this.chunkSize, this.source.length);
    // Keep CR LF pairs and surrogate pairs inside one chunk
    while (end < this.source.length && isSplitPoint(this.source.charCodeAt(end - 1))) end++;
    this.parser.write(this.source.slice(this.offset, end));
    this.offset = end;
  }
}

function isSplitPoint(code: number): boolean {
  return code === 0x0d || (code >= 0xd800 && code <= 0xdbff);
}
