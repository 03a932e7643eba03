/**
 * Migrate command - Loads config and runs the migration pipeline
 */

import ora from "ora";
import { z } from "zod";
import { Migrator } from "../../migrator";
import type { MigrationProgress } from "../../migrator";
import { displayReport, exportReport, formatReportJson } from "../../modules";
import type { LogLevel, MigrationConfig } from "../../types";
import { Logger, assertRunnable, errorMessage, loadConfig } from "../../utils";

const MigrateOptionsSchema = z.object({
  url: z.string().optional(),
  token: z.string().optional(),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  skipImages: z.boolean().optional(),
  report: z.string().optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof MigrateOptionsSchema>;

const STAGE_TEXT: Record<MigrationProgress["stage"], string> = {
  Idle: "Initializing...",
  Decoding: "Reading export...",
  ResolvingOrganizers: "Resolving categories and tags...",
  SyncingRecipes: "Importing recipes",
  UploadingImages: "Uploading images",
  Reporting: "Writing report...",
};

/**
 * Apply CLI flags over the loaded configuration (flags win)
 */
export function applyOptions(
  config: MigrationConfig,
  exportPath: string,
  options: Options,
): MigrationConfig {
  return {
    ...config,
    source: exportPath,
    target: {
      url: options.url ?? config.target.url,
      token: options.token ?? config.target.token,
    },
    migration: {
      ...config.migration,
      dryRun: options.dryRun ?? config.migration.dryRun,
      skipImages: options.skipImages ?? config.migration.skipImages,
    },
    logging: options.verbose ? { level: "debug" } : config.logging,
  };
}

/**
 * Info lines would interleave with the spinner; the summary replaces them
 */
function consoleLevel(level: LogLevel, json?: boolean): LogLevel {
  if (level === "silent" || level === "debug") return level;
  if (json) return "error";
  return level === "info" ? "warn" : level;
}

function progressText({ stage, current, total, name }: MigrationProgress): string {
  const base = STAGE_TEXT[stage];
  if (!name) return base;
  return `${base} (${current}/${total}) ${name}`;
}

export async function migrateCommand(exportPath: string, opts: Options): Promise<void> {
  const options = MigrateOptionsSchema.parse(opts);
  // --json keeps stdout for the report alone
  const spinner = ora({ text: STAGE_TEXT.Idle, indent: 2, isSilent: options.json }).start();

  const controller = new AbortController();
  const onSigint = () => {
    spinner.text = "Stopping after the current recipe...";
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    // Load configuration (default → user → custom → flags)
    const loaded = await loadConfig(options.config);
    const config = applyOptions(loaded.config, exportPath, options);
    assertRunnable(config);

    const migrator = new Migrator(config, {
      logger: new Logger(consoleLevel(config.logging.level, options.json)),
      onProgress: (progress) => {
        spinner.text = progressText(progress);
      },
    });

    // Config files that failed to load show up in the report
    for (const err of loaded.errors) {
      migrator.tracker.trackError(err.path, err.error, "resource");
    }

    const report = await migrator.run({ signal: controller.signal });

    spinner.clear();
    spinner.stop();

    if (options.report) {
      await exportReport(report, options.report);
    }

    if (options.json) {
      console.log(formatReportJson(report));
    } else {
      displayReport(report, { verbose: options.verbose });
      if (options.report) {
        console.log(`  Report written to ${options.report}\n`);
      }
    }
  } catch (error) {
    spinner.fail("Migration failed");
    console.error(errorMessage(error));
    process.exit(1);
  } finally {
    process.off("SIGINT", onSigint);
  }
}
