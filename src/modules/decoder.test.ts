import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { decode, toSourceRecipe } from "./decoder";
import { FormatError, Logger, Tracker } from "../utils";
import { MelaRecordSchema } from "../types";
import type { SourceExport, SourceRecipe } from "../types";
import { JPEG_BYTES, melaRecord, tempDir, writeExport, zipBytes } from "../testing/fixtures";

async function collect(source: SourceExport): Promise<SourceRecipe[]> {
  const recipes: SourceRecipe[] = [];
  for await (const recipe of source.recipes()) {
    recipes.push(recipe);
  }
  return recipes;
}

describe("toSourceRecipe", () => {
  it("splits ingredients into headers and lines", () => {
    const record = MelaRecordSchema.parse({
      title: "Bread",
      ingredients: "# Dough\n500 g flour\n\n  10 g salt  \r\n## Topping\nseeds",
    });

    expect(toSourceRecipe(record, "r1").ingredients).toEqual([
      { kind: "header", text: "Dough" },
      { kind: "line", text: "500 g flour" },
      { kind: "line", text: "10 g salt" },
      { kind: "header", text: "Topping" },
      { kind: "line", text: "seeds" },
    ]);
  });

  it("converts NSDate seconds to an ISO timestamp", () => {
    const record = MelaRecordSchema.parse({ title: "Bread", date: 86400 });
    expect(toSourceRecipe(record, "r1").createdAt).toBe("2001-01-02T00:00:00.000Z");
  });

  it("drops a date outside the representable range", () => {
    const record = MelaRecordSchema.parse({ title: "Bread", date: 1e20 });
    expect(toSourceRecipe(record, "r1").createdAt).toBeUndefined();
  });

  it("falls back to Untitled for a blank title", () => {
    const record = MelaRecordSchema.parse({ title: "   " });
    expect(toSourceRecipe(record, "r1").title).toBe("Untitled");
  });

  it("degrades malformed fields instead of rejecting the record", () => {
    const record = MelaRecordSchema.parse({
      title: "Bread",
      categories: "Baking",
      tags: ["Quick", 7],
      favorite: "yes",
      prepTime: 15,
    });

    const recipe = toSourceRecipe(record, "r1");
    expect(recipe.categories).toEqual([]);
    expect(recipe.tags).toEqual(["Quick"]);
    expect(recipe.favorite).toBe(false);
    expect(recipe.prepTime).toBeUndefined();
  });

  it("treats blank strings as absent", () => {
    const record = MelaRecordSchema.parse({ title: "Bread", text: "  ", link: "" });
    const recipe = toSourceRecipe(record, "r1");

    expect(recipe.description).toBeUndefined();
    expect(recipe.sourceUrl).toBeUndefined();
  });
});

describe("decode", () => {
  let dir: string;
  let tracker: Tracker;
  const logger = new Logger("silent");

  beforeEach(async () => {
    dir = await tempDir();
    tracker = new Tracker();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("bulk archives", () => {
    it("yields every record in archive order", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "a.melarecipe": melaRecord({ id: "a", title: "Soup" }),
        "b.melarecipe": melaRecord({ id: "b", title: "Bread" }),
      });

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes.map((r) => [r.identity, r.title])).toEqual([
        ["a", "Soup"],
        ["b", "Bread"],
      ]);
    });

    it("ignores macOS metadata entries", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "a.melarecipe": melaRecord({ id: "a", title: "Soup" }),
        "__MACOSX/._a.melarecipe": "binary junk",
        "._b.melarecipe": "binary junk",
      });

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes).toHaveLength(1);
      expect(tracker.getIssues()).toEqual([]);
    });

    it("skips unreadable records and tracks them", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "a.melarecipe": melaRecord({ id: "a", title: "Soup" }),
        "broken.melarecipe": "{ not json",
        "list.melarecipe": "[1, 2]",
        "c.melarecipe": melaRecord({ id: "c", title: "Cake" }),
      });

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes.map((r) => r.identity)).toEqual(["a", "c"]);
      expect(tracker.getIssues().map((i) => [i.path, i.reason])).toEqual([
        ["export.melarecipes!broken.melarecipe", "invalid-json"],
        ["export.melarecipes!list.melarecipe", "schema-validation"],
      ]);
    });

    it("uses the entry path as identity when a record has no id", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "Soup.melarecipe": melaRecord({ title: "Soup" }),
      });

      const [recipe] = await collect(await decode(file, { tracker, logger }));

      expect(recipe.identity).toBe("export.melarecipes!Soup.melarecipe");
    });

    it("keeps identities distinct when ids repeat", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "a.melarecipe": melaRecord({ id: "same", title: "Soup" }),
        "b.melarecipe": melaRecord({ id: "same", title: "Soup" }),
      });

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes.map((r) => r.identity)).toEqual(["same", "same#2"]);
    });

    it("unwraps an archive nested one level deep", async () => {
      const inner = await zipBytes({
        "a.melarecipe": melaRecord({ id: "a", title: "Soup" }),
      });
      const file = await writeExport(dir, "backup.zip", {
        "Recipes.melarecipes": inner,
        "b.melarecipe": melaRecord({ id: "b", title: "Bread" }),
      });

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes.map((r) => r.identity)).toEqual(["b", "a"]);
    });

    it("does not unwrap archives nested deeper", async () => {
      const deepest = await zipBytes({ "a.melarecipe": melaRecord({ id: "a" }) });
      const middle = await zipBytes({ "deep.zip": deepest, "b.melarecipe": melaRecord({ id: "b" }) });
      const file = await writeExport(dir, "backup.zip", { "middle.melarecipes": middle });

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes.map((r) => r.identity)).toEqual(["b"]);
    });

    it("rejects an archive that is not a zip", async () => {
      const file = join(dir, "export.melarecipes");
      await writeFile(file, "definitely not a zip");

      await expect(decode(file, { tracker, logger })).rejects.toBeInstanceOf(FormatError);
    });

    it("rejects an archive without recipe records", async () => {
      const file = await writeExport(dir, "export.melarecipes", { "readme.txt": "hello" });

      await expect(decode(file, { tracker, logger })).rejects.toThrow(
        `No recipes found in ${file}`,
      );
    });
  });

  describe("other sources", () => {
    it("reads a single recipe file", async () => {
      const file = join(dir, "Soup.melarecipe");
      await writeFile(file, melaRecord({ id: "soup", title: "Soup" }));

      const recipes = await collect(await decode(file, { tracker, logger }));

      expect(recipes.map((r) => r.title)).toEqual(["Soup"]);
    });

    it("reads every export in a directory, sorted by path", async () => {
      await mkdir(join(dir, "nested"));
      await writeFile(join(dir, "nested", "b.melarecipe"), melaRecord({ id: "b", title: "Bread" }));
      await writeFile(join(dir, "a.melarecipe"), melaRecord({ id: "a", title: "Soup" }));
      await writeFile(join(dir, "notes.txt"), "ignored");

      const recipes = await collect(await decode(dir, { tracker, logger }));

      expect(recipes.map((r) => r.identity)).toEqual(["a", "b"]);
    });

    it("rejects unknown file types", async () => {
      const file = join(dir, "recipes.pdf");
      await writeFile(file, "%PDF");

      await expect(decode(file, { tracker, logger })).rejects.toThrow(/Unknown file type: \.pdf/);
    });

    it("rejects a missing path", async () => {
      const file = join(dir, "missing.melarecipes");

      await expect(decode(file, { tracker, logger })).rejects.toThrow(`File not found: ${file}`);
    });
  });

  describe("sequence and images", () => {
    it("is single-pass", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "a.melarecipe": melaRecord({ id: "a" }),
      });
      const source = await decode(file, { tracker, logger });
      await collect(source);

      await expect(collect(source)).rejects.toThrow("Recipe sequence already consumed");
    });

    it("reads the first image of a record on demand", async () => {
      const file = await writeExport(dir, "export.melarecipes", {
        "a.melarecipe": melaRecord({ id: "a", images: [JPEG_BYTES, Buffer.from("second")] }),
        "b.melarecipe": melaRecord({ id: "b" }),
      });
      const source = await decode(file, { tracker, logger });
      const recipes = await collect(source);

      expect(recipes.map((r) => r.hasImage)).toEqual([true, false]);

      const image = await source.image("a");
      expect(image?.format).toBe("jpg");
      expect(image?.bytes.equals(JPEG_BYTES)).toBe(true);
      expect(await source.image("b")).toBeNull();
      expect(await source.image("unknown")).toBeNull();
    });
  });
});
