/**
 * Test fixtures: configs, Mela records and export archives
 */

import { mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import JSZip from "jszip";
import type { MigrationConfig, MigrationOptions } from "../types";

export const PNG_BYTES = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d,
]);
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

export function testConfig(
  migration: Partial<MigrationOptions> = {},
  source: string = "export.melarecipes",
): MigrationConfig {
  return {
    source,
    target: { url: "http://mealie.test", token: "test-secret" },
    migration: {
      dryRun: false,
      skipImages: false,
      importTag: "mela-import",
      favoriteTag: "favorite",
      wantToCookTag: "want-to-cook",
      maxRenameAttempts: 5,
      requestDelay: 0,
      ...migration,
    },
    http: { timeout: 1000, retries: 0, backoff: 0 },
    logging: { level: "silent" },
  };
}

/**
 * Serialize a .melarecipe record; images are given as raw bytes
 */
export function melaRecord(
  fields: Record<string, unknown> & { images?: Uint8Array[] } = {},
): string {
  const { images = [], ...rest } = fields;
  return JSON.stringify({
    ...rest,
    images: images.map((bytes) => Buffer.from(bytes).toString("base64")),
  });
}

export async function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "mealie-migrate-"));
}

export async function zipBytes(entries: Record<string, string | Uint8Array>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "uint8array" });
}

/**
 * Write a zip export into dir and return its path
 */
export async function writeExport(
  dir: string,
  name: string,
  entries: Record<string, string | Uint8Array>,
): Promise<string> {
  const filePath = join(dir, name);
  await writeFile(filePath, await zipBytes(entries));
  return filePath;
}
