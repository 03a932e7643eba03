/**
 * Source export accessor types
 */

import type { ImageBlob, SourceRecipe } from "./recipe";

export interface SourceExport {
  path: string;
  /**
   * Single-pass sequence of decoded records; a second call throws
   */
  recipes(): AsyncGenerator<SourceRecipe>;
  /**
   * Decode the first embedded image of a recipe on demand
   */
  image(identity: string): Promise<ImageBlob | null>;
}
