import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openConfigStore } from "./configManager.js";

describe("openConfigStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "config-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts from the defaults", () => {
    expect(openConfigStore(dir).load()).toEqual({
      maxAttempts: 10,
      waitSeconds: 10,
      timeLimitSeconds: 0,
      quality: 3200000,
    });
  });

  it("persists updates to config.json", async () => {
    const store = openConfigStore(dir);

    const updated = store.update({ quality: 1200000, timeLimitSeconds: 12.5 });

    expect(updated.quality).toBe(1200000);
    expect(openConfigStore(dir).load().timeLimitSeconds).toBe(12.5);
    const saved: unknown = JSON.parse(await readFile(join(dir, "config.json"), "utf-8"));
    expect(saved).toMatchObject({ quality: 1200000, timeLimitSeconds: 12.5 });
  });

  it("rejects invalid values without saving them", () => {
    const store = openConfigStore(dir);

    expect(() => store.update({ maxAttempts: 0 })).toThrow();
    expect(store.load().maxAttempts).toBe(10);
  });

  it("rejects a hand-edited file with bad values", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({ waitSeconds: -1 }));

    expect(() => openConfigStore(dir).load()).toThrow();
  });
});
