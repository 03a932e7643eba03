/**
 * Report Module
 * Prints the migration summary and writes the machine-readable report
 */

import { writeFile } from "fs/promises";
import chalk from "chalk";
import type {
  ImageIssue,
  Issue,
  MigrationCounts,
  MigrationReport,
  OrganizerIssue,
  RecipeReport,
  ResourceIssue,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

/**
 * One plain-text line per recipe, used by the verbose listing
 */
export function describeOutcome(entry: RecipeReport): string {
  const { outcome } = entry;
  switch (outcome.kind) {
    case "Created":
      return `created → ${outcome.slug}`;
    case "CreatedWithRename":
      return `created as "${outcome.finalName}" → ${outcome.slug}`;
    case "SkippedDryRun": {
      const predicted = outcome.predicted;
      return predicted.kind === "Created"
        ? `would create → ${predicted.slug}`
        : `would create as "${predicted.finalName}" → ${predicted.slug}`;
    }
    case "Failed":
      return `failed at ${outcome.stage}: ${outcome.reason} (${outcome.details})`;
    case "Interrupted":
      return "interrupted";
  }
}

// ============================================================================
// JSON Report
// ============================================================================

export interface GroupedIssues {
  resource: Record<string, ResourceIssue[]>;
  organizer: Record<string, OrganizerIssue[]>;
  image: Record<string, ImageIssue[]>;
}

export interface ExportedReport {
  dryRun: boolean;
  interrupted: boolean;
  duration: number;
  counts: MigrationCounts;
  recipes: RecipeReport[];
  issues: GroupedIssues;
}

function groupIssuesByTypeAndReason(issues: Issue[]): GroupedIssues {
  const grouped: GroupedIssues = { resource: {}, organizer: {}, image: {} };

  for (const issue of issues) {
    switch (issue.type) {
      case "resource":
        (grouped.resource[issue.reason] ??= []).push(issue);
        break;
      case "organizer":
        (grouped.organizer[issue.reason] ??= []).push(issue);
        break;
      case "image":
        (grouped.image[issue.reason] ??= []).push(issue);
        break;
    }
  }

  return grouped;
}

/**
 * Machine-readable report: run flags, counts, every recipe, issues grouped by reason
 */
export function toExportedReport(report: MigrationReport): ExportedReport {
  return {
    dryRun: report.dryRun,
    interrupted: report.interrupted,
    duration: report.duration,
    counts: report.counts,
    recipes: report.recipes,
    issues: groupIssuesByTypeAndReason(report.issues),
  };
}

export function formatReportJson(report: MigrationReport): string {
  return JSON.stringify(toExportedReport(report), null, 2);
}

export async function exportReport(report: MigrationReport, path: string): Promise<void> {
  await writeFile(path, formatReportJson(report), "utf-8");
}

// ============================================================================
// Console Report
// ============================================================================

/**
 * Print the summary and one line per recipe; verbose adds image failures and issue details
 */
export function displayReport(
  report: MigrationReport,
  { verbose = false }: { verbose?: boolean } = {},
): void {
  const { counts } = report;
  const succeeded = counts.created + counts.renamed + counts.skipped;
  const hasErrors = counts.failed > 0 || counts.interrupted > 0;
  const hasWarnings = counts.imagesFailed > 0 || report.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = report.interrupted
    ? "Migration Interrupted"
    : report.dryRun
      ? "Dry Run Complete"
      : "Migration Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(report.duration))}`,
  );

  console.log(sectionHeader("Recipes"));
  console.log(`   ${progressBar(succeeded, counts.total)}`);

  if (counts.created > 0) {
    console.log(statRow(chalk.green("◉"), "Created", counts.created, chalk.green));
  }
  if (counts.renamed > 0) {
    console.log(statRow(chalk.cyan("◉"), "Renamed", counts.renamed, chalk.cyan));
  }
  if (counts.skipped > 0) {
    console.log(statRow(chalk.cyan("◉"), "Dry run", counts.skipped, chalk.cyan));
  }
  if (counts.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", counts.failed, chalk.red));
  }
  if (counts.interrupted > 0) {
    console.log(statRow(chalk.yellow("◉"), "Interrupted", counts.interrupted, chalk.yellow));
  }

  const totalImages = counts.imagesUploaded + counts.imagesFailed;
  if (totalImages > 0) {
    console.log(sectionHeader("Images"));
    console.log(`   ${progressBar(counts.imagesUploaded, totalImages)}`);
    console.log(statRow(chalk.green("◉"), "Uploaded", counts.imagesUploaded, chalk.green));
    if (counts.imagesFailed > 0) {
      console.log(statRow(chalk.red("◉"), "Failed", counts.imagesFailed, chalk.red));
    }
  }

  displayRecipeList(report.recipes, verbose);
  displayIssues(report.issues, verbose);

  console.log("");
}

function displayRecipeList(recipes: RecipeReport[], verbose: boolean): void {
  if (recipes.length === 0) return;

  console.log(sectionHeader("Details"));
  for (const entry of recipes) {
    const color = entry.outcome.kind === "Failed" ? chalk.red : chalk.dim;
    const position = chalk.dim(`[${entry.index}/${recipes.length}]`);
    console.log(`   ${position} ${entry.name} ${color(describeOutcome(entry))}`);
    if (verbose && entry.image?.status === "failed") {
      console.log(`        ${chalk.yellow(`image: ${entry.image.details}`)}`);
    }
  }
}

function displayIssues(issues: Issue[], verbose: boolean): void {
  if (issues.length === 0) return;

  console.log(sectionHeader(chalk.red("Issues")));

  const labels: Record<Issue["type"], string> = {
    resource: "Unreadable entries",
    organizer: "Organizers",
    image: "Images",
  };

  for (const type of ["resource", "organizer", "image"] as const) {
    const ofType = issues.filter((issue) => issue.type === type);
    if (ofType.length === 0) continue;

    console.log(statRow(chalk.yellow("✖"), labels[type], ofType.length, chalk.yellow));
    if (!verbose) continue;

    for (const issue of ofType.slice(0, 10)) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`[${issue.reason}]`)}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (ofType.length > 10) {
      console.log(`      ${chalk.dim(`  +${ofType.length - 10} more`)}`);
    }
  }
}
