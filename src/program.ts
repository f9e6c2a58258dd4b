import { Command, CommanderError } from "commander";
import { promises as fs } from "fs";
import { createRequire } from "module";
import { CleanupInterruptedError, DEFAULT_MAX_AGE_DAYS, cleanupOldWallpapers } from "./cleanup.js";
import { type Clock, isValidDate, subtractDays, systemClock } from "./clock.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json");

interface ProgramOptions {
  maxAge: string;
  directory?: string;
  dryRun: boolean;
  quiet: boolean;
}

export interface RunContext {
  clock?: Clock;
  signal?: AbortSignal;
}

export function createProgram(): Command {
  return new Command()
    .name("wallpaper-gc")
    .description("Wallpaper Garbage Collector - Delete dated wallpaper images past their retention")
    .version(pkg.version)
    .option("-m, --max-age <days>", "Maximum age in days before deletion", String(DEFAULT_MAX_AGE_DAYS))
    .option("-d, --directory <path>", "Directory to scan (default: current directory)")
    .option("-n, --dry-run", "Show what would be deleted without actually deleting", false)
    .option("-q, --quiet", "Only print the number of deleted files", false);
}

/**
 * Run the CLI against the given user arguments and resolve to the process exit code
 */
export async function main(argv: string[], context: RunContext = {}): Promise<number> {
  try {
    return await runProgram(argv, context);
  } catch (error) {
    if (error instanceof CleanupInterruptedError || context.signal?.aborted) {
      console.error("\n✗ Cleanup interrupted by user.");
    } else {
      console.error(
        `✗ Error during cleanup: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return 1;
  }
}

async function runProgram(argv: string[], context: RunContext): Promise<number> {
  const program = createProgram().exitOverride();

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    // Commander has already printed help, the version or the usage error
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }

  const options = program.opts<ProgramOptions>();
  const clock = context.clock ?? systemClock;

  if (!/^\d+$/.test(options.maxAge)) {
    console.error("Error: --max-age must be a non-negative integer");
    return 1;
  }
  const maxAgeDays = parseInt(options.maxAge, 10);
  const cutoff = subtractDays(clock.now(), maxAgeDays);
  if (!Number.isSafeInteger(maxAgeDays) || !isValidDate(cutoff)) {
    console.error(`Error: --max-age ${options.maxAge} is out of range`);
    return 1;
  }

  if (options.directory !== undefined && !(await validateDirectory(options.directory))) {
    return 1;
  }

  const deletedCount = await cleanupOldWallpapers({
    directory: options.directory,
    maxAgeDays,
    dryRun: options.dryRun,
    quiet: options.quiet,
    clock,
    signal: context.signal,
  });

  if (options.quiet) {
    console.log(String(deletedCount));
  }

  return 0;
}

async function validateDirectory(directory: string): Promise<boolean> {
  try {
    const stats = await fs.stat(directory);
    if (!stats.isDirectory()) {
      console.error(`✗ ${directory} is not a directory.`);
      return false;
    }
    return true;
  } catch {
    console.error(`✗ Directory ${directory} does not exist.`);
    return false;
  }
}
