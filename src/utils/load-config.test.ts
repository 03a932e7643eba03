import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { assertRunnable, loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import { ConfigError } from "./errors";
import type { MigrationConfig } from "../types";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.migration).toEqual({
      dryRun: false,
      skipImages: false,
      importTag: "mela-import",
      favoriteTag: "favorite",
      wantToCookTag: "want-to-cook",
      maxRenameAttempts: 5,
      requestDelay: 300,
    });
    expect(config.http).toEqual({ timeout: 30000, retries: 3, backoff: 1000 });
  });
});

describe("mergeConfig", () => {
  it("merges nested sections key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      target: { url: "http://mealie.test" },
      migration: { importTag: "from-mela" },
    });

    expect(merged.target).toEqual({ url: "http://mealie.test", token: "" });
    expect(merged.migration.importTag).toBe("from-mela");
    expect(merged.migration.favoriteTag).toBe("favorite");
    expect(merged.source).toBe("");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "mealie-migrate-config-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ migration: { importTag: "custom-tag" } }));

    const { config } = await loadConfig(custom);

    expect(config.migration.importTag).toBe("custom-tag");
  });

  it("reports an invalid custom config and keeps the other layers", async () => {
    const custom = join(dir, "invalid.json");
    await writeFile(custom, JSON.stringify({ http: { retries: "many" } }));

    const { config, errors } = await loadConfig(custom);

    expect(errors.map((e) => e.path)).toContain(custom);
    expect(typeof config.http.retries).toBe("number");
  });
});

describe("assertRunnable", () => {
  async function configWith(patch: Partial<MigrationConfig>): Promise<MigrationConfig> {
    return { ...(await loadDefaultConfig()), ...patch };
  }

  it("requires a target for live runs", async () => {
    const config = await configWith({ source: "export.melarecipes" });

    expect(() => assertRunnable(config)).toThrow(ConfigError);
    try {
      assertRunnable(config);
    } catch (error) {
      expect(error).toMatchObject({
        missing: ["target.url (--url)", "target.token (--token)"],
      });
    }
  });

  it("accepts a dry run without a target", async () => {
    const base = await loadDefaultConfig();
    const config = await configWith({
      source: "export.melarecipes",
      migration: { ...base.migration, dryRun: true },
    });

    expect(() => assertRunnable(config)).not.toThrow();
  });

  it("always requires a source", async () => {
    const config = await configWith({
      target: { url: "http://mealie.test", token: "test-secret" },
    });

    expect(() => assertRunnable(config)).toThrow("Missing required configuration: source (<export>)");
  });
});
