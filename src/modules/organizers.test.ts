import { describe, it, expect, beforeEach } from "vitest";
import { resolveOrganizers } from "./organizers";
import { IdGenerator, Logger, Tracker, TransportError } from "../utils";
import { FakeTarget } from "../testing/fake-target";
import { testConfig } from "../testing/fixtures";
import type { MigrationOptions } from "../types";

describe("resolveOrganizers", () => {
  let target: FakeTarget;
  let tracker: Tracker;

  beforeEach(() => {
    target = new FakeTarget();
    tracker = new Tracker();
  });

  function context(migration: Partial<MigrationOptions> = {}) {
    return {
      config: testConfig(migration),
      transport: target,
      tracker,
      logger: new Logger("silent"),
      idGenerator: new IdGenerator(),
    };
  }

  it("reuses organizers that already exist", async () => {
    const soups = target.addOrganizer("categories", "Soups");

    const table = await resolveOrganizers({ categories: ["Soups"], tags: [] }, context());

    expect(table.categories.get("Soups")).toEqual(soups);
    expect(target.callsTo("POST")).toEqual([]);
  });

  it("matches names exactly, not by search similarity", async () => {
    target.addOrganizer("tags", "Quick Meals");

    const table = await resolveOrganizers({ categories: [], tags: ["Quick"] }, context());

    expect(table.tags.get("Quick")).toMatchObject({ name: "Quick", slug: "quick" });
    expect(target.organizers.tags.map((t) => t.name)).toEqual(["Quick Meals", "Quick"]);
  });

  it("creates missing organizers once per kind", async () => {
    const table = await resolveOrganizers(
      { categories: ["Dinner"], tags: ["Dinner", "mela-import"] },
      context(),
    );

    expect(target.callsTo("POST").map((c) => c.path)).toEqual([
      "/api/organizers/categories",
      "/api/organizers/tags",
      "/api/organizers/tags",
    ]);
    expect(table.categories.get("Dinner")?.id).not.toBe(table.tags.get("Dinner")?.id);
    expect([...table.tags.keys()]).toEqual(["Dinner", "mela-import"]);
  });

  it("searches with the name and an unlimited page size", async () => {
    await resolveOrganizers({ categories: ["Side Dish"], tags: [] }, context());

    expect(target.callsTo("GET")[0].path).toBe(
      "/api/organizers/categories?search=Side+Dish&perPage=-1",
    );
  });

  it("falls back to a slug lookup when creation conflicts", async () => {
    const existing = target.addOrganizer("tags", "Vegan");
    target.hideFromSearch("Vegan");

    const table = await resolveOrganizers({ categories: [], tags: ["Vegan"] }, context());

    expect(table.tags.get("Vegan")).toEqual(existing);
    expect(target.callsTo("GET", /\/slug\//).map((c) => c.path)).toEqual([
      "/api/organizers/tags/slug/vegan",
    ]);
  });

  it("leaves rejected names out of the table and records an issue", async () => {
    target.failOn("POST", /\/api\/organizers\/tags$/, { status: 422, data: { detail: "invalid" } });

    const table = await resolveOrganizers({ categories: [], tags: ["Odd"] }, context());

    expect(table.tags.has("Odd")).toBe(false);
    expect(tracker.getIssues("organizer")).toEqual([
      { type: "organizer", path: "tags/Odd", reason: "create-rejected", details: "HTTP 422" },
    ]);
  });

  it("propagates transport failures", async () => {
    target.failOn("GET", /organizers/, new TransportError("timed out", null, true));

    await expect(
      resolveOrganizers({ categories: ["Soups"], tags: [] }, context()),
    ).rejects.toBeInstanceOf(TransportError);
  });

  it("uses placeholders without calling the target in a dry run", async () => {
    const table = await resolveOrganizers(
      { categories: ["Soups"], tags: ["Quick"] },
      context({ dryRun: true }),
    );

    expect(target.calls).toEqual([]);
    expect(table.categories.get("Soups")).toMatchObject({ name: "Soups", slug: "soups" });
    expect(table.categories.get("Soups")?.id).toMatch(/^dry-run-[a-z0-9]{8}$/);
    expect(table.tags.get("Quick")?.slug).toBe("quick");
  });
});
