import type { Clock } from "./clock.js";

export interface SelectorOptions {
  directory: string;
  maxAgeDays: number;
  clock: Clock;
}

export interface CleanupOptions {
  directory?: string;
  maxAgeDays?: number;
  dryRun?: boolean;
  quiet?: boolean;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface WallpaperCandidate {
  path: string;
  name: string;
  date: Date;
}

export type DeletionResult =
  | { candidate: WallpaperCandidate; ok: true }
  | { candidate: WallpaperCandidate; ok: false; error: Error };
