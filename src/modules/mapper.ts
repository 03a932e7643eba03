/**
 * Mapper Module
 * Pure transform from decoded Mela recipes to Mealie-shaped drafts
 *
 * Never throws on malformed-but-present data: a bad field degrades to an
 * empty value so the recipe itself is always migrated.
 */

import type {
  DraftIngredient,
  DraftInstruction,
  DraftSummary,
  MigrationContext,
  MigrationOptions,
  OrganizerNames,
  SourceRecipe,
  TargetRecipeDraft,
} from "../types";
import { parseDuration } from "../utils";

export type MapperOptions = Pick<
  MigrationOptions,
  "importTag" | "favoriteTag" | "wantToCookTag"
>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Drop blanks and repeats, keeping the first occurrence (case-sensitive)
 */
function uniqueNames(names: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of names) {
    const name = raw.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    result.push(name);
  }
  return result;
}

function mapIngredients(recipe: SourceRecipe): DraftIngredient[] {
  return recipe.ingredients.map((entry): DraftIngredient =>
    entry.kind === "header"
      ? { type: "section", title: entry.text }
      : { type: "ingredient", note: entry.text },
  );
}

/**
 * One instruction per source step; "# Title" lines become titled steps without text
 */
function mapInstructions(recipe: SourceRecipe): DraftInstruction[] {
  return recipe.instructions.map((step) => {
    const isHeader = step.startsWith("#");
    return {
      title: isHeader ? step.replace(/^#+/, "").trim() : "",
      summary: "",
      text: isHeader ? "" : step,
      ingredientReferences: [],
    };
  });
}

function mapTags(recipe: SourceRecipe, options: MapperOptions): string[] {
  return uniqueNames([
    options.importTag,
    ...(recipe.favorite ? [options.favoriteTag] : []),
    ...(recipe.wantToCook ? [options.wantToCookTag] : []),
    ...recipe.tags,
  ]);
}

// ============================================================================
// Public API
// ============================================================================

export function mapRecipe(
  recipe: SourceRecipe,
  options: MapperOptions,
): TargetRecipeDraft {
  const draft: TargetRecipeDraft = {
    identity: recipe.identity,
    name: recipe.title,
    ingredients: mapIngredients(recipe),
    instructions: mapInstructions(recipe),
    categories: uniqueNames(recipe.categories),
    tags: mapTags(recipe, options),
    hasImage: recipe.hasImage,
  };

  // Optional fields are only set when the source has them
  if (recipe.description !== undefined) draft.description = recipe.description;
  if (recipe.yield !== undefined) draft.recipeYield = recipe.yield;

  const prepTime = parseDuration(recipe.prepTime);
  const performTime = parseDuration(recipe.cookTime);
  const totalTime = parseDuration(recipe.totalTime);
  if (prepTime) draft.prepTime = prepTime;
  if (performTime) draft.performTime = performTime;
  if (totalTime) draft.totalTime = totalTime;

  if (recipe.notes !== undefined) draft.notes = recipe.notes;
  if (recipe.nutrition !== undefined) draft.nutrition = recipe.nutrition;
  if (recipe.sourceUrl !== undefined) draft.orgURL = recipe.sourceUrl;

  if (recipe.createdAt !== undefined) {
    draft.createdAt = recipe.createdAt;
    draft.dateAdded = recipe.createdAt.slice(0, 10);
  }

  return draft;
}

/**
 * Render the parts of a draft a person checks after a migration
 */
export function summarizeDraft(draft: TargetRecipeDraft): DraftSummary {
  return {
    name: draft.name,
    categories: [...draft.categories],
    tags: [...draft.tags],
    ingredientCount: draft.ingredients.filter((i) => i.type === "ingredient").length,
    stepCount: draft.instructions.length,
  };
}

/**
 * Distinct organizer names across a batch, in first-seen order
 */
export function collectOrganizerNames(drafts: TargetRecipeDraft[]): OrganizerNames {
  return {
    categories: uniqueNames(drafts.flatMap((d) => d.categories)),
    tags: uniqueNames(drafts.flatMap((d) => d.tags)),
  };
}

/**
 * Pipeline stage: map every decoded recipe into ctx.drafts
 */
export function map(ctx: MigrationContext): void {
  if (!ctx.recipes) {
    throw new Error("Decoder must run before mapper");
  }
  ctx.drafts = ctx.recipes.map((recipe) => mapRecipe(recipe, ctx.config.migration));
}
