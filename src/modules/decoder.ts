/**
 * Decoder Module
 * Opens a Mela export and exposes its recipes as a lazy, single-pass sequence
 *
 * Record entries are located up front (zip directories only); each record is
 * decompressed and parsed when the sequence reaches it. Image blobs stay in the
 * archive until the uploader asks for them.
 */

import { readFile, stat } from "fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import glob from "fast-glob";
import JSZip from "jszip";
import { MelaRecordSchema } from "../types";
import type {
  ImageBlob,
  IngredientEntry,
  MelaRecord,
  MigrationContext,
  SourceExport,
  SourceRecipe,
} from "../types";
import { FormatError, errorMessage, sniffImageFormat } from "../utils";

const RECIPE_EXTENSION = ".melarecipe";
const ARCHIVE_EXTENSIONS = [".melarecipes", ".zip"];

// Mela dates are NSDate values: seconds since 2001-01-01T00:00:00Z
const NSDATE_EPOCH_MS = Date.UTC(2001, 0, 1);

type DecoderContext = Pick<MigrationContext, "tracker" | "logger">;

/**
 * Where a record lives; read() decompresses/reads it on demand
 */
interface RecordLocation {
  label: string;
  read(): Promise<string>;
}

// ============================================================================
// Record Conversion
// ============================================================================

function isArchive(name: string): boolean {
  return ARCHIVE_EXTENSIONS.includes(path.extname(name).toLowerCase());
}

function isRecipeFile(name: string): boolean {
  return path.extname(name).toLowerCase() === RECIPE_EXTENSION;
}

// macOS zips carry AppleDouble shadows of every file
function isJunkEntry(name: string): boolean {
  return name.startsWith("__MACOSX/") || path.basename(name).startsWith("._");
}

function present(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

function splitLines(value: string | undefined): string[] {
  return (value ?? "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function toIngredientEntry(line: string): IngredientEntry {
  if (line.startsWith("#")) {
    return { kind: "header", text: line.replace(/^#+/, "").trim() };
  }
  return { kind: "line", text: line };
}

function nsDateToIso(seconds: number | undefined): string | undefined {
  if (seconds === undefined || !Number.isFinite(seconds)) return undefined;
  const date = new Date(NSDATE_EPOCH_MS + seconds * 1000);
  // Outside the range Date can represent
  if (Number.isNaN(date.getTime())) return undefined;
  return date.toISOString();
}

/**
 * Convert a validated .melarecipe record into the internal source model
 */
export function toSourceRecipe(record: MelaRecord, identity: string): SourceRecipe {
  return {
    identity,
    title: record.title?.trim() || "Untitled",
    description: present(record.text),
    yield: present(record.yield),
    ingredients: splitLines(record.ingredients).map(toIngredientEntry),
    instructions: splitLines(record.instructions),
    categories: record.categories,
    tags: record.tags,
    prepTime: present(record.prepTime),
    cookTime: present(record.cookTime),
    totalTime: present(record.totalTime),
    notes: present(record.notes),
    nutrition: present(record.nutrition),
    sourceUrl: present(record.link),
    createdAt: nsDateToIso(record.date),
    favorite: record.favorite ?? false,
    wantToCook: record.wantToCook ?? false,
    hasImage: record.images.length > 0,
  };
}

async function readRecord(location: RecordLocation): Promise<MelaRecord> {
  const content = await location.read();
  return MelaRecordSchema.parse(JSON.parse(content));
}

// ============================================================================
// Container Discovery
// ============================================================================

/**
 * List record entries of an archive, unwrapping nested archives one level deep
 */
async function openArchive(
  data: Uint8Array,
  label: string,
  nested: boolean,
  ctx: DecoderContext,
): Promise<RecordLocation[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new FormatError(`Cannot open archive ${label}: ${errorMessage(error)}`, label, {
      cause: error,
    });
  }

  const recordEntries: JSZip.JSZipObject[] = [];
  const archiveEntries: JSZip.JSZipObject[] = [];

  zip.forEach((_relativePath, entry) => {
    if (entry.dir || isJunkEntry(entry.name)) return;
    if (isRecipeFile(entry.name)) recordEntries.push(entry);
    else if (isArchive(entry.name)) archiveEntries.push(entry);
  });

  const locations: RecordLocation[] = recordEntries.map((entry) => ({
    label: `${label}!${entry.name}`,
    read: () => entry.async("string"),
  }));

  for (const entry of archiveEntries) {
    const innerLabel = `${label}!${entry.name}`;
    if (nested) {
      ctx.logger.debug(`Ignoring archive nested more than one level deep: ${innerLabel}`);
      continue;
    }
    try {
      const inner = await entry.async("uint8array");
      locations.push(...(await openArchive(inner, innerLabel, true, ctx)));
    } catch (error) {
      ctx.tracker.trackError(innerLabel, error, "resource");
      ctx.logger.warn(`Skipping ${innerLabel}: ${errorMessage(error)}`);
    }
  }

  return locations;
}

async function locateFile(
  filePath: string,
  label: string,
  ctx: DecoderContext,
): Promise<RecordLocation[]> {
  if (isRecipeFile(filePath)) {
    return [{ label, read: () => readFile(filePath, "utf-8") }];
  }
  if (isArchive(filePath)) {
    return openArchive(await readFile(filePath), label, false, ctx);
  }
  throw new FormatError(
    `Unknown file type: ${path.extname(filePath) || "(none)"}. ` +
      `Expected .melarecipes (bulk export) or .melarecipe (single recipe)`,
    filePath,
  );
}

async function locateRecords(
  sourcePath: string,
  ctx: DecoderContext,
): Promise<RecordLocation[]> {
  let info: Stats;
  try {
    info = await stat(sourcePath);
  } catch (error) {
    throw new FormatError(`File not found: ${sourcePath}`, sourcePath, { cause: error });
  }

  if (!info.isDirectory()) {
    return locateFile(sourcePath, path.basename(sourcePath), ctx);
  }

  const files = await glob(["**/*.melarecipe", "**/*.melarecipes"], {
    cwd: sourcePath,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
  });

  const locations: RecordLocation[] = [];
  for (const file of files.sort()) {
    const label = path.relative(sourcePath, file);
    try {
      locations.push(...(await locateFile(file, label, ctx)));
    } catch (error) {
      ctx.tracker.trackError(label, error, "resource");
      ctx.logger.warn(`Skipping ${label}: ${errorMessage(error)}`);
    }
  }
  return locations;
}

// ============================================================================
// Main Decoder Function
// ============================================================================

/**
 * Open a Mela export (bulk archive, single recipe file, or a directory of either)
 *
 * Throws FormatError when the source can't be opened or holds no recipe records.
 * Re-decoding means calling decode() again; the returned sequence is single-pass.
 */
export async function decode(
  sourcePath: string,
  ctx: DecoderContext,
): Promise<SourceExport> {
  const locations = await locateRecords(sourcePath, ctx);

  if (locations.length === 0) {
    throw new FormatError(`No recipes found in ${sourcePath}`, sourcePath);
  }

  ctx.logger.debug(`Found ${locations.length} recipe entries in ${sourcePath}`);

  // identity → where the record (and its images) can be read again
  const byIdentity = new Map<string, RecordLocation>();
  let consumed = false;

  function claimIdentity(preferred: string): string {
    let identity = preferred;
    for (let n = 2; byIdentity.has(identity); n++) {
      identity = `${preferred}#${n}`;
    }
    return identity;
  }

  async function* recipes(): AsyncGenerator<SourceRecipe> {
    if (consumed) {
      throw new Error("Recipe sequence already consumed; decode the source again");
    }
    consumed = true;

    for (const location of locations) {
      let record: MelaRecord;
      try {
        record = await readRecord(location);
      } catch (error) {
        ctx.tracker.trackError(location.label, error, "resource");
        ctx.logger.warn(`Skipping ${location.label}: ${errorMessage(error)}`);
        continue;
      }

      const identity = claimIdentity(record.id?.trim() || location.label);
      byIdentity.set(identity, location);
      yield toSourceRecipe(record, identity);
    }
  }

  async function image(identity: string): Promise<ImageBlob | null> {
    const location = byIdentity.get(identity);
    if (!location) return null;

    const record = await readRecord(location);
    const [encoded] = record.images;
    if (!encoded) return null;

    const bytes = Buffer.from(encoded, "base64");
    return { bytes, format: sniffImageFormat(bytes) };
  }

  return { path: sourcePath, recipes, image };
}
