/**
 * Target-side (Mealie) type definitions
 */

import { z } from "zod";

export const OrganizerRefSchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
});

export const OrganizerPageSchema = z.object({
  items: z.array(OrganizerRefSchema.loose()),
});

export type OrganizerRef = z.infer<typeof OrganizerRefSchema>;
export type OrganizerKind = "categories" | "tags";

export interface OrganizerTable {
  categories: Map<string, OrganizerRef>;
  tags: Map<string, OrganizerRef>;
}

export interface OrganizerNames {
  categories: string[];
  tags: string[];
}

export interface RecipeHandle {
  slug: string;
  targetId: string | null; // Mealie answers stub creation with the slug only
}

// ============================================================================
// Request Payloads
// ============================================================================

export interface IngredientPayload {
  referenceId: string;
  note: string;
  title?: string;
}

export interface InstructionPayload {
  id: string;
  title: string;
  summary: string;
  text: string;
  ingredientReferences: string[];
}

export interface NotePayload {
  title: string;
  text: string;
}

// A type alias (not an interface) so it is accepted as a JSON request body
export type RecipePatch = {
  name: string;
  description?: string;
  recipeYield?: string;
  prepTime?: string;
  performTime?: string;
  totalTime?: string;
  orgURL?: string;
  dateAdded?: string;
  createdAt?: string;
  recipeIngredient: IngredientPayload[];
  recipeInstructions: InstructionPayload[];
  notes?: NotePayload[];
  recipeCategory: OrganizerRef[];
  tags: OrganizerRef[];
};
