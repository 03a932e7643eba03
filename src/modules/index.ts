/**
 * Pipeline modules export
 */

export { decode, toSourceRecipe } from "./decoder";
export { map, mapRecipe, summarizeDraft, collectOrganizerNames } from "./mapper";
export type { MapperOptions } from "./mapper";
export { organize, resolveOrganizers } from "./organizers";
export { syncRecipe, buildRecipePatch, resolveReferences, nameForAttempt } from "./synchronizer";
export type { SyncResult, ResolvedReferences } from "./synchronizer";
export { uploadImage } from "./uploader";
export {
  displayReport,
  exportReport,
  formatReportJson,
  toExportedReport,
  describeOutcome,
  formatDuration,
} from "./report";
export type { ExportedReport, GroupedIssues } from "./report";
