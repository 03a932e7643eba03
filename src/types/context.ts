/**
 * Migration context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { MigrationConfig } from "./config";
import type { SourceExport } from "./source";
import type { SourceRecipe, TargetRecipeDraft } from "./recipe";
import type { OrganizerTable, RecipeHandle } from "./target";
import type { Transport } from "./transport";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { IdGenerator } from "../utils/id-generator";

// ============================================================================
// Issues
// ============================================================================

// Type-safe reasons for each issue type
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type OrganizerIssueReason = "create-rejected" | "lookup-failed" | "transport";
export type ImageIssueReason =
  | "unsupported-format"
  | "decode-failed"
  | "upload-failed";

// Discriminated union - each type has its own subset of reasons
export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface OrganizerIssue {
  type: "organizer";
  path: string; // "<kind>/<name>"
  reason: OrganizerIssueReason;
  details?: string;
}

export interface ImageIssue {
  type: "image";
  path: string; // Recipe identity
  reason: ImageIssueReason;
  details?: string;
}

export type Issue = ResourceIssue | OrganizerIssue | ImageIssue;
export type IssueType = Issue["type"];

// ============================================================================
// Context
// ============================================================================

export interface MigrationContext {
  // Input - provided at initialization
  config: MigrationConfig;
  transport: Transport;
  tracker: Tracker;
  logger: Logger;
  idGenerator: IdGenerator;

  // Slugs handed out this run; shared by every recipe's stub creation
  claimedSlugs: Set<string>;

  // Filled in by the pipeline stages
  source?: SourceExport; // Decoder
  recipes?: SourceRecipe[]; // Decoder
  drafts?: TargetRecipeDraft[]; // Mapper
  organizers?: OrganizerTable; // Organizer resolver
  handles?: Map<string, RecipeHandle>; // Synchronizer, keyed by recipe identity
}
