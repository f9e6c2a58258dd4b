import { promises as fs } from "fs";
import { ageInDays, subtractDays, systemClock } from "./clock.js";
import { findOldWallpapers } from "./selector.js";
import type { CleanupOptions, DeletionResult, WallpaperCandidate } from "./types.js";
import { formatDate } from "./wallpaper-date.js";

export const DEFAULT_MAX_AGE_DAYS = 30;

export class CleanupInterruptedError extends Error {
  constructor() {
    super("Cleanup interrupted by user.");
    this.name = "CleanupInterruptedError";
  }
}

/**
 * Delete (or, in dry-run mode, list) wallpaper files older than the retention window.
 * Returns the number of files deleted or that would be deleted.
 */
export async function cleanupOldWallpapers(options: CleanupOptions = {}): Promise<number> {
  const {
    directory = process.cwd(),
    maxAgeDays = DEFAULT_MAX_AGE_DAYS,
    dryRun = false,
    quiet = false,
    clock = systemClock,
    signal,
  } = options;
  const log = (message: string) => {
    if (!quiet) {
      console.log(message);
    }
  };

  const oldFiles = await findOldWallpapers({ directory, maxAgeDays, clock });
  signal?.throwIfAborted();

  if (oldFiles.length === 0) {
    log(`✓ No wallpaper files older than ${maxAgeDays} days found.`);
    return 0;
  }

  const cutoff = subtractDays(clock.now(), maxAgeDays);
  const action = dryRun ? "Would delete" : "Deleting";
  log(`${action} ${oldFiles.length} wallpaper file(s) older than ${formatDate(cutoff)}:`);

  const results: DeletionResult[] = [];
  for (const candidate of oldFiles) {
    signal?.throwIfAborted();

    const age = ageInDays(clock.now(), candidate.date);
    log(`  - ${candidate.name} (from ${formatDate(candidate.date)}, ${age} days old)`);

    const result: DeletionResult = dryRun
      ? { candidate, ok: true }
      : await deleteCandidate(candidate);
    if (!result.ok) {
      console.warn(`    ✗ Error deleting ${candidate.name}: ${result.error.message}`);
    }
    results.push(result);
  }
  signal?.throwIfAborted();

  const processedCount = results.filter((result) => result.ok).length;
  const failedCount = results.length - processedCount;

  if (dryRun) {
    log(`\nDry-run mode: ${processedCount} file(s) would be deleted.`);
  } else {
    log(`\n✓ Successfully deleted ${processedCount} old wallpaper file(s).`);
    if (failedCount > 0) {
      log(`⚠ Failed to delete ${failedCount} file(s).`);
    }
  }

  return processedCount;
}

async function deleteCandidate(candidate: WallpaperCandidate): Promise<DeletionResult> {
  try {
    await fs.unlink(candidate.path);
    return { candidate, ok: true };
  } catch (error) {
    return {
      candidate,
      ok: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
