/**
 * Migration Tracker
 * Unified tracking for per-recipe outcomes, counts, and issues
 */

import { ZodError } from "zod";
import { TransportError, errorMessage } from "./errors";
import type {
  Issue,
  IssueType,
  ResourceIssueReason,
  OrganizerIssueReason,
  MigrationCounts,
  MigrationReport,
  RecipeReport,
  MigrationOutcome,
  ImageResult,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: errorMessage(error),
  };
}

function mapOrganizerError(error: unknown): IssueInfo<OrganizerIssueReason> {
  if (error instanceof TransportError) {
    return { reason: "transport", details: error.message };
  }
  return { reason: "create-rejected", details: errorMessage(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private recipes: RecipeReport[] = [];
  private issues: Issue[] = [];
  private interrupted = false;
  private startTime = new Date();

  constructor(private dryRun: boolean = false) {}

  // ============================================================================
  // Outcome recording
  // ============================================================================

  /**
   * Register a recipe in source order; returns its report entry
   */
  addRecipe(identity: string, name: string): RecipeReport {
    const entry: RecipeReport = {
      index: this.recipes.length + 1,
      identity,
      name,
      outcome: { kind: "Interrupted" },
    };
    this.recipes.push(entry);
    return entry;
  }

  setOutcome(entry: RecipeReport, outcome: MigrationOutcome): void {
    entry.outcome = outcome;
  }

  setImage(entry: RecipeReport, image: ImageResult): void {
    entry.image = image;
    if (image.status === "failed") {
      this.issues.push({
        type: "image",
        path: entry.identity,
        reason: image.cause,
        details: image.details,
      });
    }
  }

  markInterrupted(): void {
    this.interrupted = true;
  }

  isInterrupted(): boolean {
    return this.interrupted;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown, type: "resource" | "organizer"): void {
    switch (type) {
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
      case "organizer": {
        const { reason, details } = mapOrganizerError(error);
        this.issues.push({ type: "organizer", path, reason, details });
        break;
      }
    }
  }

  trackOrganizerIssue(path: string, reason: OrganizerIssueReason, details: string): void {
    this.issues.push({ type: "organizer", path, reason, details });
  }

  // ============================================================================
  // Getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getRecipes(): RecipeReport[] {
    return this.recipes;
  }

  getCounts(): MigrationCounts {
    const counts: MigrationCounts = {
      total: this.recipes.length,
      created: 0,
      renamed: 0,
      skipped: 0,
      failed: 0,
      interrupted: 0,
      imagesUploaded: 0,
      imagesFailed: 0,
    };

    for (const { outcome, image } of this.recipes) {
      switch (outcome.kind) {
        case "Created":
          counts.created++;
          break;
        case "CreatedWithRename":
          counts.renamed++;
          break;
        case "SkippedDryRun":
          counts.skipped++;
          break;
        case "Failed":
          counts.failed++;
          break;
        case "Interrupted":
          counts.interrupted++;
          break;
      }
      if (image?.status === "uploaded") counts.imagesUploaded++;
      if (image?.status === "failed") counts.imagesFailed++;
    }

    return counts;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getReport(): MigrationReport {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      dryRun: this.dryRun,
      interrupted: this.interrupted,
      recipes: this.recipes,
      counts: this.getCounts(),
      issues: this.issues,
      duration,
    };
  }
}
