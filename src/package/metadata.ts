/**
 * Package metadata - manifest.json and layout.json of a Community package
 */
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { IOFailureError, PackageError } from "../errors.js";

// ── manifest.json ─────────────────────────────────────────

export const PackageDependency = z.object({
  name: z.string(),
  package_version: z.string(),
});

/** Fields this tool reads from a vendor manifest; the rest is carried along. */
export const PackageManifest = z.object({
  dependencies: z.array(PackageDependency).default([]),
  content_type: z.string().optional(),
  title: z.string().optional(),
  manufacturer: z.string().optional(),
  creator: z.string().optional(),
  package_version: z.string().min(1, "package_version is required"),
  minimum_game_version: z.string().optional(),
}).passthrough();

export type PackageDependency = z.infer<typeof PackageDependency>;
export type PackageManifest = z.infer<typeof PackageManifest>;

export interface PatchManifest {
  dependencies: PackageDependency[];
  content_type: string;
  title: string;
  manufacturer: string;
  creator: string;
  package_version: string;
  minimum_game_version: string;
  release_notes: Record<string, never>;
}

export async function readPackageManifest(manifestPath: string): Promise<PackageManifest> {
  let text: string;
  try {
    text = await readFile(manifestPath, "utf8");
  } catch (e) {
    throw new IOFailureError(manifestPath, "read", e);
  }

  let data: unknown;
  try {
    // vendor files are sometimes saved with a BOM
    data = JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch (e) {
    throw new PackageError(`Package manifest '${manifestPath}' is not valid JSON: ${(e as Error).message}`, { path: manifestPath });
  }

  const result = PackageManifest.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new PackageError(`Invalid package manifest '${manifestPath}': ${issues.join("; ")}`, { path: manifestPath });
  }
  return result.data;
}

export function createPatchManifest(options: {
  title: string;
  packageVersion: string;
  dependency: PackageDependency;
  original: PackageManifest;
}): PatchManifest {
  return {
    dependencies: [options.dependency],
    content_type: "CORE",
    title: options.title,
    manufacturer: "",
    creator: "",
    package_version: options.packageVersion,
    minimum_game_version: options.original.minimum_game_version ?? "",
    release_notes: {},
  };
}

// ── layout.json ───────────────────────────────────────────

export interface LayoutEntry {
  path: string;
  size: number;
  /** Last write time as a Windows FILETIME (100 ns ticks since 1601-01-01 UTC) */
  date: bigint;
}

export interface PackageLayout {
  content: LayoutEntry[];
}

const FILETIME_UNIX_EPOCH = 116444736000000000n;

export function toFileTime(mtimeNs: bigint): bigint {
  return mtimeNs / 100n + FILETIME_UNIX_EPOCH;
}

/** Every file under `root`, as `/`-separated relative paths, sorted. */
export async function listPackageFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const visit = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true }).catch((e: unknown) => {
      throw new IOFailureError(dir, "list", e);
    });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) await visit(full);
      else if (entry.isFile()) files.push(path.relative(root, full).split(path.sep).join("/"));
    }
  };
  await visit(root);
  return files.sort();
}

export async function createPackageLayout(root: string): Promise<PackageLayout> {
  const content: LayoutEntry[] = [];
  for (const relative of await listPackageFiles(root)) {
    const full = path.join(root, ...relative.split("/"));
    try {
      const info = await stat(full, { bigint: true });
      content.push({ path: relative, size: Number(info.size), date: toFileTime(info.mtimeNs) });
    } catch (e) {
      throw new IOFailureError(full, "stat", e);
    }
  }
  return { content };
}

const BIGINT_MARK = "\u0000bigint:";
const MARKED_BIGINT = /"\\u0000bigint:(\d+)"/g;

/**
 * Two-space indented JSON, non-ASCII left as is. FILETIME values exceed
 * 2^53, so bigints are written as bare integer literals.
 */
export function toPackageJson(value: PackageLayout | PatchManifest): string {
  return JSON.stringify(value, (_key: string, v: unknown) => typeof v === "bigint" ? `${BIGINT_MARK}${v}` : v, 2)
    .replace(MARKED_BIGINT, "$1");
}
