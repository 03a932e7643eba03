/**
 * Recipe model type definitions
 * Source side (decoded Mela records) and target side (drafts shaped for Mealie)
 */

import { z } from "zod";

// ============================================================================
// Source Records
// ============================================================================

// Malformed fields degrade to "absent" instead of rejecting the whole record
const text = z.string().optional().catch(undefined);
const flag = z.boolean().optional().catch(undefined);
const strings = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === "string"));

/**
 * Raw .melarecipe JSON record. Unknown keys are kept so newer exports still parse;
 * only a non-object record fails validation.
 */
export const MelaRecordSchema = z.looseObject({
  id: text,
  title: text,
  text: text,
  yield: text,
  prepTime: text,
  cookTime: text,
  totalTime: text,
  ingredients: text,
  instructions: text,
  notes: text,
  nutrition: text,
  link: text,
  date: z.number().optional().catch(undefined), // NSDate: seconds since 2001-01-01T00:00:00Z
  categories: strings,
  tags: strings,
  favorite: flag,
  wantToCook: flag,
  images: strings, // base64 blobs
});

export type MelaRecord = z.infer<typeof MelaRecordSchema>;

export type IngredientEntry =
  | { kind: "header"; text: string }
  | { kind: "line"; text: string };

export interface SourceRecipe {
  identity: string; // Mela id, or the entry path when the record has none
  title: string; // Never empty
  description?: string;
  yield?: string;
  ingredients: IngredientEntry[];
  instructions: string[];
  categories: string[];
  tags: string[];
  prepTime?: string; // Free text as written in the source ("1 hour 15 min")
  cookTime?: string;
  totalTime?: string;
  notes?: string;
  nutrition?: string;
  sourceUrl?: string;
  createdAt?: string; // ISO timestamp
  favorite: boolean;
  wantToCook: boolean;
  hasImage: boolean;
}

export type ImageFormat = "jpg" | "png" | "webp" | "gif";

export interface ImageBlob {
  bytes: Buffer;
  format: ImageFormat | null; // null when the signature is not recognized
}

// ============================================================================
// Target Drafts
// ============================================================================

export type DraftIngredient =
  | { type: "section"; title: string }
  | { type: "ingredient"; note: string };

export interface DraftInstruction {
  title: string;
  summary: string;
  text: string;
  ingredientReferences: string[];
}

export interface TargetRecipeDraft {
  identity: string;
  name: string;
  description?: string;
  recipeYield?: string;
  ingredients: DraftIngredient[];
  instructions: DraftInstruction[];
  prepTime?: string;
  performTime?: string;
  totalTime?: string;
  notes?: string;
  nutrition?: string;
  orgURL?: string;
  dateAdded?: string; // YYYY-MM-DD
  createdAt?: string; // ISO timestamp
  categories: string[];
  tags: string[];
  hasImage: boolean;
}

export interface DraftSummary {
  name: string;
  categories: string[];
  tags: string[];
  ingredientCount: number;
  stepCount: number;
}
