/**
 * Configuration loader tests
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { getConfigPath, loadConfig, mergeConfig, saveConfig } from "./configLoader";
import { ConfigError, createDefaultConfig } from "../../domain/entities";

describe("configLoader", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "docsync-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test("should place the config inside the index directory", () => {
    expect(getConfigPath("/proj")).toBe(path.join("/proj", ".docsync", "config.json"));
  });

  test("should return defaults when there is no config file", async () => {
    expect(await loadConfig(tempDir)).toEqual(createDefaultConfig());
  });

  test("should merge saved settings over defaults", async () => {
    await fs.mkdir(path.join(tempDir, ".docsync"));
    await fs.writeFile(
      path.join(tempDir, ".docsync", "config.json"),
      JSON.stringify({ concurrency: 8, llm: { model: "gpt-4o" }, unknownKey: true })
    );

    const config = await loadConfig(tempDir);

    expect(config.concurrency).toBe(8);
    expect(config.llm).toEqual({ model: "gpt-4o", timeoutMs: 60_000, temperature: 0.2 });
    expect(config.summaryFile).toBe("docs.md");
  });

  test("should round-trip through saveConfig", async () => {
    const config = { ...createDefaultConfig(), maxRetries: 0, docstringTargets: ["function" as const] };

    await saveConfig(tempDir, config);

    expect(await loadConfig(tempDir)).toEqual(config);
  });

  test("should reject invalid JSON", async () => {
    await fs.mkdir(path.join(tempDir, ".docsync"));
    await fs.writeFile(path.join(tempDir, ".docsync", "config.json"), "{ nope");

    await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("mergeConfig", () => {
  test("should reject values of the wrong type", () => {
    expect(() => mergeConfig(createDefaultConfig(), { concurrency: "4" })).toThrow(
      "'concurrency' must be a number"
    );
    expect(() => mergeConfig(createDefaultConfig(), { llm: { model: 4 } })).toThrow(
      "'llm.model' must be a string"
    );
    expect(() => mergeConfig(createDefaultConfig(), [])).toThrow(
      "Configuration must be a JSON object"
    );
  });

  test("should reject unknown docstring targets", () => {
    expect(() => mergeConfig(createDefaultConfig(), { docstringTargets: ["lambda"] })).toThrow(
      "Unknown docstring target: 'lambda'"
    );
  });

  test("should not modify the base config", () => {
    const base = createDefaultConfig();
    mergeConfig(base, { llm: { temperature: 0 } });

    expect(base.llm.temperature).toBe(0.2);
  });
});
