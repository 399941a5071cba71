import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { expandPath, APP_DIR, CONFIG_FILE } from "./paths.js";

/** Normalize path to POSIX format for cross-platform test assertions */
const toPosix = (p: string) => p.replace(/\\/g, "/");

describe("expandPath", () => {
  it("expands ~ to home directory", () => {
    const result = toPosix(expandPath("~/Videos/post.mp4"));
    expect(result).toBe(`${toPosix(homedir())}/Videos/post.mp4`);
  });

  it("returns absolute paths unchanged", () => {
    expect(expandPath("/tmp/out.mp4")).toBe("/tmp/out.mp4");
  });

  it("returns relative paths unchanged", () => {
    expect(expandPath("videos/out.mp4")).toBe("videos/out.mp4");
  });

  it("handles just ~ correctly", () => {
    expect(expandPath("~")).toBe(homedir());
  });
});

describe("APP_DIR", () => {
  it("lives in the home directory", () => {
    expect(toPosix(APP_DIR)).toBe(`${toPosix(homedir())}/.reelstitch`);
  });

  it("holds the config file", () => {
    expect(toPosix(CONFIG_FILE)).toBe(`${toPosix(APP_DIR)}/config.json`);
  });
});
