import { describe, expect, it, vi } from "vitest";
import { isConfigKey } from "./config.js";

vi.mock("../../config/configManager.js", () => ({
  loadConfig: vi.fn(),
  updateConfig: vi.fn(),
  getConfigValue: vi.fn(),
}));

describe("isConfigKey", () => {
  it.each(["maxAttempts", "waitSeconds", "timeLimitSeconds", "quality"])("accepts %s", (key) => {
    expect(isConfigKey(key)).toBe(true);
  });

  it.each(["headless", "quality ", ""])("rejects %j", (key) => {
    expect(isConfigKey(key)).toBe(false);
  });
});
