import { promises as fs } from "fs";
import path from "path";
import { isValidDate, subtractDays } from "./clock.js";
import type { SelectorOptions, WallpaperCandidate } from "./types.js";
import { matchesWallpaperGlob, parseDateFromFilename } from "./wallpaper-date.js";

/**
 * Find wallpaper files in a directory dated before `now - maxAgeDays`, oldest first
 */
export async function findOldWallpapers(options: SelectorOptions): Promise<WallpaperCandidate[]> {
  const { directory, maxAgeDays, clock } = options;
  const cutoff = subtractDays(clock.now(), maxAgeDays);
  if (!isValidDate(cutoff)) {
    throw new Error(`Retention window of ${maxAgeDays} days is out of range`);
  }

  const entries = await fs.readdir(directory, { withFileTypes: true });

  const candidates = entries
    .filter((entry) => !entry.isDirectory() && matchesWallpaperGlob(entry.name))
    .map((entry) => entry.name)
    .sort()
    .flatMap((name): WallpaperCandidate[] => {
      const date = parseDateFromFilename(name);
      if (!date || date.getTime() >= cutoff.getTime()) {
        return [];
      }
      return [{ path: path.join(directory, name), name, date }];
    });

  // Array.prototype.sort is stable, so equal dates keep name order
  return candidates.sort((a, b) => a.date.getTime() - b.date.getTime());
}
