/**
 * Per-recipe outcome and report type definitions
 */

import type { Issue, ImageIssueReason } from "./context";

export type FailureStage = "stub" | "patch";

export type FailureReason =
  | "DuplicateUnresolved"
  | "MissingOrganizer"
  | "StubRejected"
  | "PatchRejected"
  | "TransportError";

export type CreatedOutcome = { kind: "Created"; slug: string };

export type RenamedOutcome = {
  kind: "CreatedWithRename";
  slug: string;
  originalName: string;
  finalName: string;
};

export type MigrationOutcome =
  | CreatedOutcome
  | RenamedOutcome
  | { kind: "Failed"; stage: FailureStage; reason: FailureReason; details: string }
  | { kind: "SkippedDryRun"; predicted: CreatedOutcome | RenamedOutcome }
  | { kind: "Interrupted" };

export type OutcomeKind = MigrationOutcome["kind"];

export type ImageResult =
  | { status: "uploaded"; extension: string }
  | { status: "none" }
  | {
      status: "failed";
      reason: "ImageUploadFailed";
      cause: ImageIssueReason;
      details: string;
    };

export interface RecipeReport {
  index: number; // 1-based position in source order
  identity: string;
  name: string; // Source title
  outcome: MigrationOutcome;
  image?: ImageResult; // Absent when images are skipped
}

export interface MigrationCounts {
  total: number;
  created: number;
  renamed: number;
  skipped: number;
  failed: number;
  interrupted: number;
  imagesUploaded: number;
  imagesFailed: number;
}

export interface MigrationReport {
  dryRun: boolean;
  interrupted: boolean;
  recipes: RecipeReport[];
  counts: MigrationCounts;
  issues: Issue[];
  duration: number;
}
