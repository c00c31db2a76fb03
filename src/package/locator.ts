/**
 * Package Locator - finds the simulator's installed packages root
 *
 * The root is the `InstalledPackagesPath` line of UserCfg.opt, which lives in
 * a different place for the Microsoft Store and Steam editions.
 */
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { IOFailureError, PackageError } from "../errors.js";
import logger from "../utils/logger.js";

export type PackageSource = "Community" | "Official";

/** UserCfg.opt locations relative to the user profile, most common first */
const USER_CONFIG_LOCATIONS = [
  ["AppData", "Local", "Packages", "Microsoft.FlightSimulator_8wekyb3d8bbwe", "LocalCache", "UserCfg.opt"],
  ["AppData", "Roaming", "Microsoft Flight Simulator", "UserCfg.opt"],
] as const;

const PACKAGES_PATH_KEY = "InstalledPackagesPath";

export function findUserConfigPath(userProfile: string = homedir()): string {
  if (!userProfile) throw new PackageError("Failed to resolve user profile path");
  for (const segments of USER_CONFIG_LOCATIONS) {
    const candidate = path.join(userProfile, ...segments);
    if (existsSync(candidate)) return candidate;
  }
  throw new PackageError("Failed to resolve UserCfg.opt path", { userProfile });
}

/** `InstalledPackagesPath "D:\MSFS\Packages"` → `D:\MSFS\Packages` */
export function parseInstalledPackagesPath(userConfig: string): string | undefined {
  for (const line of userConfig.split(/\r?\n/)) {
    if (!line.startsWith(PACKAGES_PATH_KEY)) continue;
    const quote = line.indexOf('"');
    const value = quote >= 0 ? line.slice(quote) : line.slice(PACKAGES_PATH_KEY.length);
    return value.trim().replace(/^"+|"+$/g, "");
  }
  return undefined;
}

export async function resolvePackagesRoot(options: { packagesPath?: string; userProfile?: string } = {}): Promise<string> {
  if (options.packagesPath) {
    logger.info(`Using packages path override '${options.packagesPath}'`, { module: "locator" });
    return options.packagesPath;
  }

  const userConfigPath = findUserConfigPath(options.userProfile);
  logger.debug(`Reading ${userConfigPath}`, { module: "locator" });
  let text: string;
  try {
    text = await readFile(userConfigPath, "utf8");
  } catch (e) {
    throw new IOFailureError(userConfigPath, "read", e);
  }

  const packagesPath = parseInstalledPackagesPath(text);
  if (!packagesPath) {
    throw new PackageError(`Failed to find '${PACKAGES_PATH_KEY}' in user config`, { path: userConfigPath });
  }
  return packagesPath;
}

export function getPackagePath(packagesRoot: string, source: PackageSource, packageName: string): string {
  switch (source) {
    case "Community":
      return path.join(packagesRoot, "Community", packageName);
    case "Official":
      return path.join(packagesRoot, "Official", "OneStore", packageName);
  }
}
