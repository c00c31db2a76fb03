/**
 * Patch configuration - package names, versions and aircraft variants
 *
 * Passed explicitly to the builder and batch driver so tests can swap any
 * value. Environment: MSFS_PACKAGES_PATH, LOG_LEVEL, LOG_DIR.
 */
import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "../errors.js";

const AircraftVariant = z.object({
  /** Folder under SimObjects/Airplanes */
  id: z.string().min(1),
  /** Interior behavior file present in every model* folder */
  behaviorFile: z.string().min(1),
});

export const PatchConfig = z.object({
  originalPackageName: z.string().min(1),
  patchPackageName: z.string().min(1),
  originalPackageVersionRequirement: z.string().min(1),
  patchPackageVersion: z.string().min(1),
  patchPackageTitle: z.string().min(1),
  /** Shared with the template fragment appended to ASCRJ_Templates.xml */
  templateName: z.string().min(1),
  /** Relative to the package root */
  templatesFile: z.string().min(1),
  aircraft: z.array(AircraftVariant).min(1),
  /** Overrides the UserCfg.opt lookup */
  packagesPath: z.string().optional(),
});

export type PatchConfig = z.infer<typeof PatchConfig>;

export const DEFAULT_PATCH_CONFIG: PatchConfig = {
  originalPackageName: "aerosoft-crj",
  patchPackageName: "aerosoft-crj-interaction-fix",
  originalPackageVersionRequirement: "1.0.6",
  patchPackageVersion: "1.0.0",
  patchPackageTitle: "Aerosoft CRJ Cockpit Interaction Fix",
  templateName: "ASCRJ_Knob_Infinite_Push_Template",
  templatesFile: "ModelBehaviorDefs/ASCRJ_Templates.xml",
  aircraft: [
    { id: "Aerosoft_CRJ_550", behaviorFile: "CRJ550_Interior.xml" },
    { id: "Aerosoft_CRJ_700", behaviorFile: "CRJ700_Interior.xml" },
  ],
};

export function loadPatchConfig(overrides: Partial<PatchConfig> = {}, env: NodeJS.ProcessEnv = process.env): PatchConfig {
  const result = PatchConfig.safeParse({
    ...DEFAULT_PATCH_CONFIG,
    packagesPath: env.MSFS_PACKAGES_PATH || undefined,
    ...overrides,
  });
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

// ── Bundled data files ────────────────────────────────────

export const DATA_FILES = {
  catalog: "model-behavior-modifications.json",
  templateFragment: "ASCRJ_Knob_Infinite_Push_Template.xml",
  welcome: "welcome.txt",
} as const;

/**
 * Path of a file in the repository's data/ folder. Walks up from this module
 * so it resolves both from the sources and from dist/.
 */
export function dataPath(fileName: string): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, "data", fileName);
    if (existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) throw new ConfigError(`Bundled data file '${fileName}' not found`, { fileName });
    dir = parent;
  }
}
