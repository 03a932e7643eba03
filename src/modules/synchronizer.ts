/**
 * Synchronizer Module
 * Creates each recipe on the target: stub (for its slug), then the full patch
 *
 * Per-recipe failures come back as outcome values so the batch keeps going.
 */

import { randomUUID } from "node:crypto";
import { describeResponse, isSuccess } from "../types";
import type {
  CreatedOutcome,
  FailureReason,
  FailureStage,
  IngredientPayload,
  MigrationContext,
  MigrationOutcome,
  NotePayload,
  OrganizerRef,
  OrganizerTable,
  RecipeHandle,
  RecipePatch,
  RenamedOutcome,
  TargetRecipeDraft,
} from "../types";
import { TransportError, slugify } from "../utils";

type SyncContext = Pick<MigrationContext, "config" | "transport" | "logger" | "claimedSlugs">;

export interface SyncResult {
  outcome: MigrationOutcome;
  handle?: RecipeHandle;
}

export interface ResolvedReferences {
  categories: OrganizerRef[];
  tags: OrganizerRef[];
  missing: string[]; // "<kind>/<name>" for every name the table lacks
}

type StubResult =
  | { ok: true; slug: string; finalName: string }
  | { ok: false; reason: FailureReason; details: string };

// ============================================================================
// Patch Building
// ============================================================================

export function resolveReferences(
  draft: TargetRecipeDraft,
  table: OrganizerTable,
): ResolvedReferences {
  const missing: string[] = [];

  const lookup = (kind: keyof OrganizerTable, names: string[]): OrganizerRef[] =>
    names.flatMap((name) => {
      const ref = table[kind].get(name);
      if (!ref) {
        missing.push(`${kind}/${name}`);
        return [];
      }
      return [ref];
    });

  return {
    categories: lookup("categories", draft.categories),
    tags: lookup("tags", draft.tags),
    missing,
  };
}

/**
 * Shape a draft as the PATCH body Mealie accepts
 *
 * Every ingredient gets a fresh referenceId and every step a fresh id; Mealie
 * rejects instructions missing any of id/title/summary/text/ingredientReferences.
 * A section header becomes the title of the first ingredient after it.
 */
export function buildRecipePatch(
  draft: TargetRecipeDraft,
  refs: Pick<ResolvedReferences, "categories" | "tags">,
  name: string = draft.name,
  newId: () => string = randomUUID,
): RecipePatch {
  const recipeIngredient: IngredientPayload[] = [];
  let sectionTitle: string | null = null;

  for (const entry of draft.ingredients) {
    if (entry.type === "section") {
      sectionTitle = entry.title;
      continue;
    }
    const ingredient: IngredientPayload = { referenceId: newId(), note: entry.note };
    if (sectionTitle) ingredient.title = sectionTitle;
    sectionTitle = null;
    recipeIngredient.push(ingredient);
  }

  const patch: RecipePatch = {
    name,
    recipeIngredient,
    recipeInstructions: draft.instructions.map((step) => ({ id: newId(), ...step })),
    recipeCategory: refs.categories,
    tags: refs.tags,
  };

  if (draft.description !== undefined) patch.description = draft.description;
  if (draft.recipeYield !== undefined) patch.recipeYield = draft.recipeYield;
  if (draft.prepTime !== undefined) patch.prepTime = draft.prepTime;
  if (draft.performTime !== undefined) patch.performTime = draft.performTime;
  if (draft.totalTime !== undefined) patch.totalTime = draft.totalTime;
  if (draft.orgURL !== undefined) patch.orgURL = draft.orgURL;
  if (draft.dateAdded !== undefined) patch.dateAdded = draft.dateAdded;
  if (draft.createdAt !== undefined) patch.createdAt = draft.createdAt;

  const notes: NotePayload[] = [];
  if (draft.notes !== undefined) notes.push({ title: "Notes", text: draft.notes });
  if (draft.nutrition !== undefined) notes.push({ title: "Nutrition", text: draft.nutrition });
  if (notes.length > 0) patch.notes = notes;

  return patch;
}

// ============================================================================
// Stub Creation
// ============================================================================

/**
 * Title used for a given attempt: the original first, then "Title (2)", "Title (3)"...
 */
export function nameForAttempt(title: string, attempt: number): string {
  return attempt === 0 ? title : `${title} (${attempt + 1})`;
}

function parseSlug(data: unknown): string | null {
  return typeof data === "string" && data.trim() ? data.trim() : null;
}

/**
 * Create the stub, renaming on collisions up to maxRenameAttempts times
 * A dry run synthesizes the slug locally and never calls the target
 */
async function createStub(draft: TargetRecipeDraft, ctx: SyncContext): Promise<StubResult> {
  const { dryRun, maxRenameAttempts } = ctx.config.migration;

  for (let attempt = 0; attempt <= maxRenameAttempts; attempt++) {
    const name = nameForAttempt(draft.name, attempt);
    let slug: string | null;

    if (dryRun) {
      slug = slugify(name) || `recipe-${attempt + 1}`;
    } else {
      const response = await ctx.transport.invoke("POST", "/api/recipes", { name });

      if (response.status === 409) {
        ctx.logger.debug(`Recipe name "${name}" already exists on the target`);
        continue;
      }
      if (!isSuccess(response)) {
        return { ok: false, reason: "StubRejected", details: describeResponse(response) };
      }

      slug = parseSlug(response.data);
      if (!slug) {
        return {
          ok: false,
          reason: "StubRejected",
          details: `Expected a slug, got ${describeResponse(response)}`,
        };
      }
    }

    if (ctx.claimedSlugs.has(slug)) {
      ctx.logger.debug(`Slug "${slug}" already claimed this run`);
      continue;
    }

    ctx.claimedSlugs.add(slug);
    return { ok: true, slug, finalName: name };
  }

  return {
    ok: false,
    reason: "DuplicateUnresolved",
    details: `"${draft.name}" still collides after ${maxRenameAttempts} renames`,
  };
}

// ============================================================================
// Public API
// ============================================================================

function failed(stage: FailureStage, reason: FailureReason, details: string): SyncResult {
  return { outcome: { kind: "Failed", stage, reason, details } };
}

function transportFailure(stage: FailureStage, error: unknown): SyncResult {
  if (error instanceof TransportError) {
    return failed(stage, "TransportError", error.message);
  }
  throw error;
}

/**
 * Migrate one draft: reference check, stub, patch
 *
 * Organizer references are resolved before the stub is created, so a recipe that
 * would fail its patch with MissingOrganizer never leaves an empty stub behind.
 */
export async function syncRecipe(
  draft: TargetRecipeDraft,
  table: OrganizerTable,
  ctx: SyncContext,
): Promise<SyncResult> {
  const refs = resolveReferences(draft, table);
  if (refs.missing.length > 0) {
    return failed(
      "patch",
      "MissingOrganizer",
      `Unresolved organizers: ${refs.missing.join(", ")}`,
    );
  }

  let stub: StubResult;
  try {
    stub = await createStub(draft, ctx);
  } catch (error) {
    return transportFailure("stub", error);
  }

  if (!stub.ok) {
    return failed("stub", stub.reason, stub.details);
  }

  const created: CreatedOutcome | RenamedOutcome =
    stub.finalName === draft.name
      ? { kind: "Created", slug: stub.slug }
      : {
          kind: "CreatedWithRename",
          slug: stub.slug,
          originalName: draft.name,
          finalName: stub.finalName,
        };

  if (ctx.config.migration.dryRun) {
    return {
      outcome: { kind: "SkippedDryRun", predicted: created },
      handle: { slug: stub.slug, targetId: null },
    };
  }

  const patch = buildRecipePatch(draft, refs, stub.finalName);

  try {
    const response = await ctx.transport.invoke("PATCH", `/api/recipes/${stub.slug}`, patch);
    if (!isSuccess(response)) {
      return failed("patch", "PatchRejected", describeResponse(response));
    }

    const targetId =
      typeof response.data === "object" &&
      response.data !== null &&
      "id" in response.data &&
      typeof response.data.id === "string"
        ? response.data.id
        : null;

    return { outcome: created, handle: { slug: stub.slug, targetId } };
  } catch (error) {
    return transportFailure("patch", error);
  }
}
