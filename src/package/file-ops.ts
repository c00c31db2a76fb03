/**
 * Logged file-system helpers. Every failure surfaces as IOFailureError with
 * the offending path.
 */
import { appendFile, copyFile as fsCopyFile, mkdir, rm, writeFile } from "node:fs/promises";
import { IOFailureError } from "../errors.js";
import logger from "../utils/logger.js";

const mod = { module: "fs" };

export async function createDirectory(dirPath: string): Promise<void> {
  logger.info(`Creating directory: '${dirPath}'`, mod);
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (e) {
    throw new IOFailureError(dirPath, "create directory", e);
  }
}

export async function removeDirectory(dirPath: string): Promise<void> {
  logger.info(`Removing directory: '${dirPath}'`, mod);
  try {
    await rm(dirPath, { recursive: true, force: true });
  } catch (e) {
    throw new IOFailureError(dirPath, "remove directory", e);
  }
}

export async function copyFile(source: string, destination: string): Promise<void> {
  logger.info(`Copying file: From '${source}' to '${destination}'`, mod);
  try {
    await fsCopyFile(source, destination);
  } catch (e) {
    throw new IOFailureError(source, "copy file", e);
  }
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  logger.info(`Writing file: '${filePath}'`, mod);
  try {
    await writeFile(filePath, text, "utf8");
  } catch (e) {
    throw new IOFailureError(filePath, "write", e);
  }
}

export async function appendTextFile(filePath: string, text: string): Promise<void> {
  logger.info(`Appending to file: '${filePath}'`, mod);
  try {
    await appendFile(filePath, text, "utf8");
  } catch (e) {
    throw new IOFailureError(filePath, "append to", e);
  }
}
