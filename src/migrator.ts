/**
 * Migrator - Pipeline orchestrator
 * Drives one migration run through its stages; the modules hold the logic
 */

import { describeResponse, isSuccess } from "./types";
import type {
  ImageBlob,
  ImageResult,
  MigrationConfig,
  MigrationContext,
  MigrationReport,
  RecipeHandle,
  RecipeReport,
  SourceRecipe,
  Transport,
} from "./types";
import * as modules from "./modules";
import {
  FormatError,
  HttpTransport,
  IdGenerator,
  Logger,
  MigrationError,
  Tracker,
  TransportError,
  errorMessage,
  wait,
} from "./utils";

export type MigrationStage =
  | "Idle"
  | "Decoding"
  | "ResolvingOrganizers"
  | "SyncingRecipes"
  | "UploadingImages"
  | "Reporting";

const NEXT_STAGE: Record<MigrationStage, MigrationStage | null> = {
  Idle: "Decoding",
  Decoding: "ResolvingOrganizers",
  ResolvingOrganizers: "SyncingRecipes",
  SyncingRecipes: "UploadingImages",
  UploadingImages: "Reporting",
  Reporting: null,
};

export interface MigrationProgress {
  stage: MigrationStage;
  current: number;
  total: number;
  name?: string;
}

export interface MigratorOptions {
  transport?: Transport; // Defaults to HttpTransport against config.target
  logger?: Logger;
  onProgress?: (progress: MigrationProgress) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export class Migrator {
  private stage: MigrationStage = "Idle";
  private ctx: MigrationContext;

  constructor(
    config: MigrationConfig,
    private options: MigratorOptions = {},
  ) {
    this.ctx = {
      config,
      transport:
        options.transport ??
        new HttpTransport({
          baseUrl: config.target.url,
          token: config.target.token,
          http: config.http,
        }),
      tracker: new Tracker(config.migration.dryRun),
      logger: options.logger ?? new Logger(config.logging.level),
      idGenerator: new IdGenerator(),
      claimedSlugs: new Set(),
    };
  }

  get currentStage(): MigrationStage {
    return this.stage;
  }

  get tracker(): Tracker {
    return this.ctx.tracker;
  }

  /**
   * Run the pipeline once. Fatal errors (FormatError, TransportError) propagate;
   * per-recipe failures end up in the report.
   */
  async run({ signal }: RunOptions = {}): Promise<MigrationReport> {
    const { ctx } = this;

    this.advance("Decoding");
    await this.decodeSource();
    const entries = this.registerRecipes();

    this.advance("ResolvingOrganizers");
    if (!ctx.config.migration.dryRun) {
      await this.preflight();
    }
    await modules.organize(ctx);

    this.advance("SyncingRecipes");
    await this.syncAll(entries, signal);

    this.advance("UploadingImages");
    if (ctx.config.migration.skipImages) {
      ctx.logger.info("Skipping images");
    } else if (!ctx.tracker.isInterrupted()) {
      await this.uploadAll(entries, signal);
    }

    this.advance("Reporting");
    return ctx.tracker.getReport();
  }

  // ============================================================================
  // Stages
  // ============================================================================

  private advance(to: MigrationStage): void {
    if (NEXT_STAGE[this.stage] !== to) {
      throw new MigrationError(`Invalid stage transition: ${this.stage} → ${to}`);
    }
    this.stage = to;
    this.report({ stage: to, current: 0, total: this.ctx.drafts?.length ?? 0 });
  }

  private async decodeSource(): Promise<void> {
    const { ctx } = this;
    const source = await modules.decode(ctx.config.source, ctx);

    const recipes: SourceRecipe[] = [];
    for await (const recipe of source.recipes()) {
      recipes.push(recipe);
    }

    if (recipes.length === 0) {
      throw new FormatError(`No readable recipes in ${source.path}`, source.path);
    }

    ctx.source = source;
    ctx.recipes = recipes;
    modules.map(ctx);
    ctx.logger.info(`Decoded ${recipes.length} recipes from ${source.path}`);

    for (const draft of ctx.drafts ?? []) {
      const summary = modules.summarizeDraft(draft);
      ctx.logger.debug(
        `Mapped "${summary.name}": ${summary.ingredientCount} ingredients, ${summary.stepCount} steps, ` +
          `categories [${summary.categories.join(", ")}], tags [${summary.tags.join(", ")}]`,
      );
    }
  }

  private registerRecipes(): RecipeReport[] {
    const recipes = this.ctx.recipes ?? [];
    return recipes.map((recipe) => this.ctx.tracker.addRecipe(recipe.identity, recipe.title));
  }

  private async preflight(): Promise<void> {
    const response = await this.ctx.transport.invoke("GET", "/api/app/about");
    if (!isSuccess(response)) {
      throw new TransportError(
        `Target unreachable: ${describeResponse(response)}`,
        response.status,
        false,
      );
    }
  }

  private async syncAll(entries: RecipeReport[], signal?: AbortSignal): Promise<void> {
    const { ctx } = this;
    const drafts = ctx.drafts ?? [];
    const table = ctx.organizers ?? { categories: new Map(), tags: new Map() };
    const handles = new Map<string, RecipeHandle>();
    ctx.handles = handles;

    for (const [i, draft] of drafts.entries()) {
      const entry = entries[i];
      if (!entry) break;

      if (signal?.aborted) {
        ctx.tracker.markInterrupted();
        ctx.logger.warn(`Interrupted before "${draft.name}"; ${drafts.length - i} recipes not migrated`);
        return;
      }

      this.report({ stage: "SyncingRecipes", current: i + 1, total: drafts.length, name: draft.name });

      const { outcome, handle } = await modules.syncRecipe(draft, table, ctx);
      ctx.tracker.setOutcome(entry, outcome);
      if (handle) handles.set(draft.identity, handle);

      if (outcome.kind === "Failed") {
        ctx.logger.warn(`"${draft.name}" failed at ${outcome.stage}: ${outcome.reason} (${outcome.details})`);
      } else {
        ctx.logger.debug(`"${draft.name}": ${modules.describeOutcome(entry)}`);
      }

      await this.pause(i, drafts.length);
    }
  }

  private async uploadAll(entries: RecipeReport[], signal?: AbortSignal): Promise<void> {
    const { ctx } = this;
    const handles = ctx.handles ?? new Map<string, RecipeHandle>();

    for (const [i, entry] of entries.entries()) {
      const handle = handles.get(entry.identity);
      if (!handle) continue;

      if (signal?.aborted) {
        ctx.tracker.markInterrupted();
        ctx.logger.warn("Interrupted during image upload");
        return;
      }

      this.report({ stage: "UploadingImages", current: i + 1, total: entries.length, name: entry.name });

      const image = await this.uploadFor(entry.identity, handle);
      ctx.tracker.setImage(entry, image);
      if (image.status === "failed") {
        ctx.logger.warn(`Image for "${entry.name}" failed: ${image.details}`);
      }

      if (image.status === "uploaded") {
        await this.pause(i, entries.length);
      }
    }
  }

  private async uploadFor(
    identity: string,
    handle: RecipeHandle,
  ): Promise<ImageResult> {
    const { ctx } = this;
    if (!ctx.source) return { status: "none" };

    let blob: ImageBlob | null;
    try {
      blob = await ctx.source.image(identity);
    } catch (error) {
      return {
        status: "failed",
        reason: "ImageUploadFailed",
        cause: "decode-failed",
        details: errorMessage(error),
      };
    }

    return modules.uploadImage(handle, blob, ctx);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async pause(index: number, total: number): Promise<void> {
    const { dryRun, requestDelay } = this.ctx.config.migration;
    if (!dryRun && requestDelay > 0 && index < total - 1) {
      await wait(requestDelay);
    }
  }

  private report(progress: MigrationProgress): void {
    this.options.onProgress?.(progress);
  }
}
