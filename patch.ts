#!/usr/bin/env node
/**
 * CRJ Interaction Fix CLI
 *
 * Builds the Community package that swaps the Aerosoft CRJ's momentary push
 * knobs for infinite-push knobs, without touching the installed package.
 *
 * Usage:
 *   npx tsx patch.ts [--packages <path>] [--yes]
 *
 * Environment variables (or .env file):
 *   MSFS_PACKAGES_PATH (alternative to --packages flag)
 *   LOG_LEVEL (debug|info|warn|error, default: info)
 *   LOG_DIR   (also write the run log to <LOG_DIR>/patch.log)
 */
import "dotenv/config";
import { runCli } from "./src/cli.js";

process.exitCode = await runCli(process.argv.slice(2));
