import { describe, it, expect } from "vitest";
import { formatDate, matchesWallpaperGlob, parseDateFromFilename } from "./wallpaper-date.js";

describe("parseDateFromFilename", () => {
  it("should return local midnight of the embedded date", () => {
    const date = parseDateFromFilename("wallpaper-laptop-2020-01-01.png");

    expect(date?.getTime()).toBe(new Date(2020, 0, 1).getTime());
  });

  it("should accept any device name without hyphens", () => {
    expect(parseDateFromFilename("wallpaper-phone_2-2023-11-30.png")?.getTime()).toBe(
      new Date(2023, 10, 30).getTime(),
    );
    expect(parseDateFromFilename("wallpaper-x-1999-12-31.png")?.getFullYear()).toBe(1999);
  });

  it("should accept February 29 in leap years only", () => {
    expect(parseDateFromFilename("wallpaper-laptop-2024-02-29.png")?.getDate()).toBe(29);
    expect(parseDateFromFilename("wallpaper-laptop-2000-02-29.png")?.getDate()).toBe(29);
    expect(parseDateFromFilename("wallpaper-laptop-2023-02-29.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-1900-02-29.png")).toBeUndefined();
  });

  it("should reject dates that do not exist on the calendar", () => {
    expect(parseDateFromFilename("wallpaper-laptop-2021-04-31.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2021-13-01.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2021-00-10.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2021-01-00.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-0000-01-01.png")).toBeUndefined();
  });

  it("should reject names with the wrong prefix or extension", () => {
    expect(parseDateFromFilename("image-laptop-2020-01-01.png")).toBeUndefined();
    expect(parseDateFromFilename("Wallpaper-laptop-2020-01-01.png")).toBeUndefined();
    expect(parseDateFromFilename("old-wallpaper-laptop-2020-01-01.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2020-01-01.jpg")).toBeUndefined();
  });

  it("should reject malformed date groups", () => {
    expect(parseDateFromFilename("wallpaper-laptop-20-01-01.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2020-1-01.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2020_01_01.png")).toBeUndefined();
    expect(parseDateFromFilename("wallpaper-laptop-2020-01-01-2.png")).toBeUndefined();
  });

  it("should reject device names containing hyphens", () => {
    expect(parseDateFromFilename("wallpaper-my-laptop-2020-01-01.png")).toBeUndefined();
  });

  it("should reject names without a device segment", () => {
    expect(parseDateFromFilename("wallpaper-2020-01-01.png")).toBeUndefined();
  });

  it("should tolerate trailing characters after .png", () => {
    expect(parseDateFromFilename("wallpaper-laptop-2020-01-01.png.bak")?.getTime()).toBe(
      new Date(2020, 0, 1).getTime(),
    );
  });
});

describe("matchesWallpaperGlob", () => {
  it("should match names starting with wallpaper- and ending with .png", () => {
    expect(matchesWallpaperGlob("wallpaper-laptop-2020-01-01.png")).toBe(true);
    expect(matchesWallpaperGlob("wallpaper-2020-01-01.png")).toBe(true);
    expect(matchesWallpaperGlob("wallpaper-.png")).toBe(true);
  });

  it("should not match other names", () => {
    expect(matchesWallpaperGlob("wallpaper.png")).toBe(false);
    expect(matchesWallpaperGlob("wallpaper-laptop-2020-01-01.png.bak")).toBe(false);
    expect(matchesWallpaperGlob("wallpaper-laptop-2020-01-01.PNG")).toBe(false);
    expect(matchesWallpaperGlob("notes.txt")).toBe(false);
  });
});

describe("formatDate", () => {
  it("should pad month and day", () => {
    expect(formatDate(new Date(2021, 2, 5))).toBe("2021-03-05");
    expect(formatDate(new Date(2021, 11, 25, 23, 59))).toBe("2021-12-25");
  });
});
