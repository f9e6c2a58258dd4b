const WALLPAPER_PREFIX = "wallpaper-";
const WALLPAPER_EXTENSION = ".png";

// Anchored at the start only: anything after ".png" is left to the glob stage
const WALLPAPER_NAME_PATTERN = /^wallpaper-[^-]+-(\d{4})-(\d{2})-(\d{2})\.png/;

/**
 * Check a name against the `wallpaper-*.png` glob
 */
export function matchesWallpaperGlob(filename: string): boolean {
  return (
    filename.length >= WALLPAPER_PREFIX.length + WALLPAPER_EXTENSION.length &&
    filename.startsWith(WALLPAPER_PREFIX) &&
    filename.endsWith(WALLPAPER_EXTENSION)
  );
}

/**
 * Extract the date from `wallpaper-<device>-<YYYY-MM-DD>.png`.
 * Returns local midnight of that day, or undefined when the name does not
 * match or the date does not exist on the calendar.
 */
export function parseDateFromFilename(filename: string): Date | undefined {
  const match = WALLPAPER_NAME_PATTERN.exec(filename);
  if (!match) {
    return undefined;
  }

  const [, yearText, monthText, dayText] = match;
  return toCalendarDate(Number(yearText), Number(monthText), Number(dayText));
}

/**
 * Format a date as local YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function toCalendarDate(year: number, month: number, day: number): Date | undefined {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return undefined;
  }

  // setFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);

  // Out-of-range days roll over into the next month
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }

  return date;
}
