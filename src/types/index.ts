/**
 * Central type exports
 */

// Configuration
export type {
  MigrationConfig,
  PartialMigrationConfig,
  TargetConfig,
  MigrationOptions,
  HttpConfig,
  LoggingConfig,
  LogLevel,
  ConfigIssue,
} from "./config";
export {
  MigrationConfigSchema,
  PartialMigrationConfigSchema,
} from "./config";

// Recipes
export type {
  MelaRecord,
  IngredientEntry,
  SourceRecipe,
  ImageFormat,
  ImageBlob,
  DraftIngredient,
  DraftInstruction,
  TargetRecipeDraft,
  DraftSummary,
} from "./recipe";
export { MelaRecordSchema } from "./recipe";

// Source
export type { SourceExport } from "./source";

// Target
export type {
  OrganizerRef,
  OrganizerKind,
  OrganizerTable,
  OrganizerNames,
  RecipeHandle,
  IngredientPayload,
  InstructionPayload,
  NotePayload,
  RecipePatch,
} from "./target";
export { OrganizerRefSchema, OrganizerPageSchema } from "./target";

// Transport
export type {
  HttpMethod,
  RequestBody,
  Transport,
  TransportResponse,
} from "./transport";
export { isSuccess, describeResponse } from "./transport";

// Outcomes
export type {
  FailureStage,
  FailureReason,
  CreatedOutcome,
  RenamedOutcome,
  MigrationOutcome,
  OutcomeKind,
  ImageResult,
  RecipeReport,
  MigrationCounts,
  MigrationReport,
} from "./outcome";

// Context
export type {
  MigrationContext,
  Issue,
  IssueType,
  ResourceIssue,
  OrganizerIssue,
  ImageIssue,
  ResourceIssueReason,
  OrganizerIssueReason,
  ImageIssueReason,
} from "./context";
