import { describe, it, expect } from "vitest";
import { parseDuration } from "./parse-duration";

describe("parseDuration", () => {
  describe("minutes", () => {
    it("parses minutes with a unit", () => {
      expect(parseDuration("30 min")).toBe("PT30M");
      expect(parseDuration("45 minutes")).toBe("PT45M");
      expect(parseDuration("10 mins")).toBe("PT10M");
    });

    it("treats a bare number as minutes", () => {
      expect(parseDuration("45")).toBe("PT45M");
    });

    it("accepts German minute units", () => {
      expect(parseDuration("45 Minuten")).toBe("PT45M");
    });
  });

  describe("hours", () => {
    it("parses hours alone", () => {
      expect(parseDuration("2 hours")).toBe("PT2H");
      expect(parseDuration("1 hr")).toBe("PT1H");
      expect(parseDuration("3 Stunden")).toBe("PT3H");
    });

    it("parses hours and minutes together", () => {
      expect(parseDuration("1 hour 15 minutes")).toBe("PT1H15M");
      expect(parseDuration("1h30m")).toBe("PT1H30M");
    });

    it("carries minutes past 60 into hours", () => {
      expect(parseDuration("90 min")).toBe("PT1H30M");
      expect(parseDuration("120")).toBe("PT2H");
    });
  });

  describe("pass-through", () => {
    it("upper-cases values already in ISO form", () => {
      expect(parseDuration("pt20m")).toBe("PT20M");
      expect(parseDuration("PT1H")).toBe("PT1H");
    });

    it("returns unparseable text trimmed", () => {
      expect(parseDuration("  overnight ")).toBe("overnight");
    });

    it("returns zero durations as written", () => {
      expect(parseDuration("0 minutes")).toBe("0 minutes");
    });

    it("returns undefined for blank input", () => {
      expect(parseDuration(undefined)).toBeUndefined();
      expect(parseDuration("")).toBeUndefined();
      expect(parseDuration("   ")).toBeUndefined();
    });
  });
});
