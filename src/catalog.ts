/**
 * Modification catalog - which button to drop and which knob to rewire,
 * per cockpit control. Shipped as data/model-behavior-modifications.json.
 */
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, IOFailureError } from "./errors.js";

// Matched exactly against attribute values; never trimmed
const id = (field: string) => z.string().superRefine((value, ctx) => {
  if (!value.trim()) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} is required` });
  else if (value !== value.trim()) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} has surrounding whitespace` });
});

export const ModificationRecord = z.object({
  ButtonId: id("ButtonId"),
  KnobId: id("KnobId"),
  KnobAnimName: id("KnobAnimName"),
  KnobChangeName: id("KnobChangeName"),
  PushAnimName: id("PushAnimName"),
  PushName: id("PushName"),
}).strict();

export const ModificationCatalog = z.object({
  Modifications: z.array(ModificationRecord).min(1, "the catalog holds no modifications"),
});

export type ModificationRecord = Readonly<z.infer<typeof ModificationRecord>>;
export type ModificationCatalog = z.infer<typeof ModificationCatalog>;

export function parseCatalog(data: unknown, source = "<catalog>"): ModificationCatalog {
  const result = ModificationCatalog.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid modification catalog '${source}': ${issues.join("; ")}`, { source });
  }
  return result.data;
}

export async function loadCatalog(filePath: string): Promise<ModificationCatalog> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (e) {
    throw new IOFailureError(filePath, "read", e);
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Modification catalog '${filePath}' is not valid JSON: ${(e as Error).message}`, { source: filePath });
  }
  return parseCatalog(data, filePath);
}
