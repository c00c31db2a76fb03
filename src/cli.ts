/**
 * Command line front end: argument parsing, welcome text, confirmation and
 * the package build. `patch.ts` only forwards process.argv here.
 */
import { confirm } from "@inquirer/prompts";
import { readFile } from "fs/promises";
import { loadCatalog } from "./catalog.js";
import { ConfigError, PatchError } from "./errors.js";
import { buildPatchPackage, type BuildResult } from "./package/builder.js";
import { resolvePackagesRoot } from "./package/locator.js";
import { DATA_FILES, dataPath, loadPatchConfig, type PatchConfig } from "./utils/config.js";
import logger from "./utils/logger.js";

export interface CliOptions {
  packagesPath?: string;
  yes: boolean;
  help: boolean;
}

export const HELP_TEXT = `
CRJ Interaction Fix - Community patch package builder

Usage:
  npx tsx patch.ts [options]

Options:
  --packages, -p <path>   Simulator packages folder (holding Community/)
  --yes, -y               Do not ask for confirmation
  --help, -h              Show this help

Environment:
  MSFS_PACKAGES_PATH      Alternative to --packages flag
  LOG_LEVEL               debug | info | warn | error (default: info)
  LOG_DIR                 Folder for patch.log
`;

// ── Parse CLI args ──────────────────────────────────────────
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { yes: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--packages" || arg === "-p") {
      const value = argv[++i];
      if (!value || value.startsWith("-")) throw new ConfigError(`Option ${arg} needs a path`, { option: arg });
      options.packagesPath = value;
    } else if (arg === "--yes" || arg === "-y") {
      options.yes = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else {
      throw new ConfigError(`Unknown option '${arg}'. Use --help for usage.`, { option: arg });
    }
  }

  return options;
}

export function renderWelcome(template: string, config: PatchConfig): string {
  return template
    .replaceAll("{OriginalPackageName}", config.originalPackageName)
    .replaceAll("{PatchPackageName}", config.patchPackageName)
    .replaceAll("{OriginalPackageVersionRequirement}", config.originalPackageVersionRequirement);
}

/** Resolves to undefined when the user declines. */
export async function runPatch(options: CliOptions, env: NodeJS.ProcessEnv = process.env): Promise<BuildResult | undefined> {
  const config = loadPatchConfig(options.packagesPath ? { packagesPath: options.packagesPath } : {}, env);

  console.log(renderWelcome(await readFile(dataPath(DATA_FILES.welcome), "utf8"), config));
  if (!options.yes && process.stdin.isTTY) {
    const proceed = await confirm({ message: `Build ${config.patchPackageName} now?`, default: true });
    if (!proceed) {
      logger.info("Cancelled, nothing was written");
      return undefined;
    }
  }

  logger.info("Searching for MSFS packages path");
  const packagesRoot = await resolvePackagesRoot({ packagesPath: config.packagesPath });
  logger.info(`Packages path: ${packagesRoot}`);

  const catalog = await loadCatalog(dataPath(DATA_FILES.catalog));
  const templateFragment = await readFile(dataPath(DATA_FILES.templateFragment), "utf8");
  logger.info(`${catalog.Modifications.length} knob modifications loaded`);

  const startTime = Date.now();
  const result = await buildPatchPackage({ config, packagesRoot, catalog, templateFragment });

  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  logger.info("═══════════════════════════════════════════");
  logger.info(`✅ Package built in ${duration}s`);
  logger.info(`   Location:       ${result.patchPackagePath}`);
  logger.info(`   Behavior files: ${result.behaviorFiles.length}`);
  logger.info(`   Layout entries: ${result.layoutFiles}`);
  logger.info("═══════════════════════════════════════════");
  return result;
}

/** Runs the tool and returns the process exit code. */
export async function runCli(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      console.log(HELP_TEXT);
      return 0;
    }
    await runPatch(options, env);
    return 0;
  } catch (e) {
    if (e instanceof PatchError) logger.error(`${e.kind}: ${e.message}`);
    else logger.error(`Fatal error: ${(e as Error).message}`, e instanceof Error ? { stack: e.stack } : undefined);
    return 1;
  }
}
