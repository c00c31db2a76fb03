/**
 * Batch driver - patches the interior behavior file of every model folder of
 * one aircraft variant, one file at a time.
 */
import { readdir } from "node:fs/promises";
import path from "node:path";
import type { ModificationCatalog } from "./catalog.js";
import { IOFailureError } from "./errors.js";
import { readAssetDocument } from "./behavior-xml/reader.js";
import { writeAssetDocument } from "./behavior-xml/writer.js";
import { createDirectory } from "./package/file-ops.js";
import { applyModifications } from "./patcher.js";
import logger from "./utils/logger.js";

const MODEL_DIRECTORY = /^model/i;

export interface ModelBehaviorJob {
  originalPackagePath: string;
  patchPackagePath: string;
  aircraftId: string;
  behaviorFileName: string;
  catalog: ModificationCatalog;
  templateName: string;
}

export function airplanePath(packagePath: string, aircraftId: string): string {
  return path.join(packagePath, "SimObjects", "Airplanes", aircraftId);
}

/** `model*` folders of one aircraft, in directory enumeration order */
export async function findModelDirectories(aircraftPath: string): Promise<string[]> {
  try {
    const entries = await readdir(aircraftPath, { withFileTypes: true });
    return entries.filter(e => e.isDirectory() && MODEL_DIRECTORY.test(e.name)).map(e => e.name);
  } catch (e) {
    throw new IOFailureError(aircraftPath, "list model directories of", e);
  }
}

/** Read → patch → write for each model folder. Returns the files written. */
export async function processModelBehaviors(job: ModelBehaviorJob): Promise<string[]> {
  const sourceRoot = airplanePath(job.originalPackagePath, job.aircraftId);
  const targetRoot = airplanePath(job.patchPackagePath, job.aircraftId);
  const written: string[] = [];

  for (const modelFolder of await findModelDirectories(sourceRoot)) {
    logger.info(`Processing model '${modelFolder}'`, { module: "batch" });

    const sourceFile = path.join(sourceRoot, modelFolder, job.behaviorFileName);
    const doc = await readAssetDocument(sourceFile);
    applyModifications(doc.body, job.catalog, { templateName: job.templateName, source: sourceFile });

    const targetDir = path.join(targetRoot, modelFolder);
    await createDirectory(targetDir);
    const targetFile = path.join(targetDir, job.behaviorFileName);
    logger.info(`Writing file: '${targetFile}'`, { module: "batch" });
    await writeAssetDocument(targetFile, doc);
    written.push(targetFile);
  }

  if (written.length === 0) logger.warn(`No model folders found under '${sourceRoot}'`, { module: "batch" });
  return written;
}
