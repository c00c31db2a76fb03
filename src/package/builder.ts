/**
 * Package Builder - produces the Community patch package next to the vendor one
 *
 * Steps: vendor version check → fresh patch folder → templates file with the
 * infinite-push fragment appended → interior behavior files of each aircraft
 * → layout.json → manifest.json.
 *
 * A failure aborts the run and leaves whatever was already written; the next
 * run starts by deleting the patch folder.
 */
import { existsSync } from "node:fs";
import path from "node:path";
import { processModelBehaviors } from "../batch-driver.js";
import type { ModificationCatalog } from "../catalog.js";
import { PackageError } from "../errors.js";
import type { PatchConfig } from "../utils/config.js";
import logger from "../utils/logger.js";
import { appendTextFile, copyFile, createDirectory, removeDirectory, writeTextFile } from "./file-ops.js";
import { getPackagePath } from "./locator.js";
import { createPackageLayout, createPatchManifest, readPackageManifest, toPackageJson, type PackageManifest } from "./metadata.js";

export interface BuildInput {
  config: PatchConfig;
  /** Folder holding Community/ and Official/ */
  packagesRoot: string;
  catalog: ModificationCatalog;
  /** Markup appended to the copied templates file */
  templateFragment: string;
}

export interface BuildResult {
  patchPackagePath: string;
  behaviorFiles: string[];
  layoutFiles: number;
}

const mod = { module: "builder" };

export async function checkOriginalPackage(originalPackagePath: string, config: PatchConfig): Promise<PackageManifest> {
  if (!existsSync(originalPackagePath)) {
    throw new PackageError(
      `The directory '${originalPackagePath}' does not exist. Please ensure the ${config.originalPackageName} package is installed prior to running this application.`,
      { path: originalPackagePath },
    );
  }

  logger.info("Checking package dependencies", mod);
  const manifestPath = path.join(originalPackagePath, "manifest.json");
  if (!existsSync(manifestPath)) {
    throw new PackageError(
      `Unable to locate the ${config.originalPackageName} package manifest file at location '${manifestPath}'.`,
      { path: manifestPath },
    );
  }

  const manifest = await readPackageManifest(manifestPath);
  if (manifest.package_version !== config.originalPackageVersionRequirement) {
    throw new PackageError(
      `${config.originalPackageName} must be version ${config.originalPackageVersionRequirement}. Version ${manifest.package_version} is currently installed.`,
      { path: manifestPath, installed: manifest.package_version },
    );
  }
  return manifest;
}

export async function buildPatchPackage(input: BuildInput): Promise<BuildResult> {
  const { config, packagesRoot } = input;
  const originalPackagePath = getPackagePath(packagesRoot, "Community", config.originalPackageName);
  const patchPackagePath = getPackagePath(packagesRoot, "Community", config.patchPackageName);

  const originalManifest = await checkOriginalPackage(originalPackagePath, config);

  if (existsSync(patchPackagePath)) {
    logger.info(`Removing existing instance of package '${config.patchPackageName}'`, mod);
    await removeDirectory(patchPackagePath);
  }
  await createDirectory(patchPackagePath);

  logger.info("Processing Model Behavior Defs", mod);
  const templatesSource = path.join(originalPackagePath, ...config.templatesFile.split("/"));
  const templatesTarget = path.join(patchPackagePath, ...config.templatesFile.split("/"));
  await createDirectory(path.dirname(templatesTarget));
  await copyFile(templatesSource, templatesTarget);
  logger.info(`Applying patch to ${templatesTarget}`, mod);
  await appendTextFile(templatesTarget, input.templateFragment);

  const behaviorFiles: string[] = [];
  for (const aircraft of config.aircraft) {
    logger.info(`Processing '${aircraft.behaviorFile}' files`, mod);
    behaviorFiles.push(...await processModelBehaviors({
      originalPackagePath,
      patchPackagePath,
      aircraftId: aircraft.id,
      behaviorFileName: aircraft.behaviorFile,
      catalog: input.catalog,
      templateName: config.templateName,
    }));
  }

  // layout.json covers what is on disk now; manifest.json comes after it
  logger.info("Creating package layout", mod);
  const layout = await createPackageLayout(patchPackagePath);
  await writeTextFile(path.join(patchPackagePath, "layout.json"), toPackageJson(layout));

  logger.info("Creating package manifest", mod);
  const manifest = createPatchManifest({
    title: config.patchPackageTitle,
    packageVersion: config.patchPackageVersion,
    dependency: { name: config.originalPackageName, package_version: config.originalPackageVersionRequirement },
    original: originalManifest,
  });
  await writeTextFile(path.join(patchPackagePath, "manifest.json"), toPackageJson(manifest));

  return { patchPackagePath, behaviorFiles, layoutFiles: layout.content.length };
}
