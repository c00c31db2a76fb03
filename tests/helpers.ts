/**
 * Shared fixtures: a minimal interior behavior file and throwaway package folders
 */
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach } from "vitest";
import type { ModificationCatalog } from "../src/catalog.js";

export const CRLF = "\r\n";

export const HEADER = [
  '<ModelInfo guid="{0A1B2C3D-0000-4000-8000-000000000001}" version="1.1">',
  "\t<LODS>",
  '\t\t<LOD minSize="0" ModelFile="CRJ700_Interior.gltf"/>',
  "\t</LODS>",
  "</ModelInfo>",
].join(CRLF);

export const BODY = [
  "<ModelBehaviors>",
  '\t<Include ModelBehaviorFile="ASCRJ_Templates.xml"/>',
  '\t<Component ID="BTN1" Node="BTN1_NODE">',
  '\t\t<UseTemplate Name="ASCRJ_Push_Template">',
  "\t\t\t<NODE_ID>BTN1_NODE</NODE_ID>",
  "\t\t</UseTemplate>",
  "\t</Component>",
  '\t<Component ID="KNOB1" Node="KNOB1_NODE">',
  '\t\t<UseTemplate Name="OldTemplate" Extra="1">',
  "\t\t\t<ANIM_NAME>KNOB1_ANIM</ANIM_NAME>",
  "\t\t</UseTemplate>",
  "\t</Component>",
  "</ModelBehaviors>",
].join(CRLF);

export const SOURCE = ['<?xml version="1.0" encoding="utf-8"?>', HEADER, BODY].join(CRLF);

export const TEMPLATE_NAME = "ASCRJ_Knob_Infinite_Push_Template";

/** Body of SOURCE once the BTN1/KNOB1 record has been applied */
export const PATCHED_BODY = [
  "<ModelBehaviors>",
  '\t<Include ModelBehaviorFile="ASCRJ_Templates.xml" />',
  '\t<Component ID="KNOB1" Node="KNOB1_NODE">',
  `\t\t<UseTemplate Name="${TEMPLATE_NAME}">`,
  "\t\t\t<KNOB_ANIM_NAME>A</KNOB_ANIM_NAME>",
  "\t\t\t<KNOB_CHANGE_NAME>B</KNOB_CHANGE_NAME>",
  "\t\t\t<PUSH_ANIM_NAME>C</PUSH_ANIM_NAME>",
  "\t\t\t<PUSH_NAME>D</PUSH_NAME>",
  "\t\t</UseTemplate>",
  "\t</Component>",
  "</ModelBehaviors>",
].join(CRLF);

export const PATCHED_OUTPUT = CRLF + HEADER + CRLF + PATCHED_BODY;

export function catalogOf(...records: Array<Partial<ModificationCatalog["Modifications"][number]>>): ModificationCatalog {
  return {
    Modifications: records.map(r => ({
      ButtonId: "BTN1",
      KnobId: "KNOB1",
      KnobAnimName: "A",
      KnobChangeName: "B",
      PushAnimName: "C",
      PushName: "D",
      ...r,
    })),
  };
}

export const BTN1_KNOB1 = catalogOf({});

// ── Temporary folders ─────────────────────────────────────

const created: string[] = [];

/** A fresh temp folder, removed after the current test. */
export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "crj-fix-"));
  created.push(dir);
  return dir;
}

afterEach(async () => {
  while (created.length) {
    const dir = created.pop();
    if (dir) await rm(dir, { recursive: true, force: true });
  }
});

/** Writes `files` (relative `/`-separated path → content) under `root`. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const full = path.join(root, ...relative.split("/"));
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, content, "utf8");
  }
}
