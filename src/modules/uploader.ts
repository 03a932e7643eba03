/**
 * Image Uploader Module
 * Attaches a recipe's first image to its target recipe
 */

import { describeResponse, isSuccess } from "../types";
import type { ImageBlob, ImageResult, MigrationContext, RecipeHandle } from "../types";
import { TransportError, mimeTypeFor } from "../utils";

type UploadContext = Pick<MigrationContext, "config" | "transport" | "logger">;

/**
 * Upload one image as multipart form data
 *
 * Returns "none" when there is nothing to upload; an unrecognized format fails
 * without a request. In a dry run a recognized image is reported as uploaded.
 */
export async function uploadImage(
  handle: RecipeHandle,
  blob: ImageBlob | null,
  ctx: UploadContext,
): Promise<ImageResult> {
  if (!blob || blob.bytes.length === 0) {
    return { status: "none" };
  }

  const { format } = blob;
  if (!format) {
    return {
      status: "failed",
      reason: "ImageUploadFailed",
      cause: "unsupported-format",
      details: "Image is not JPEG, PNG, WebP or GIF",
    };
  }

  if (ctx.config.migration.dryRun) {
    return { status: "uploaded", extension: format };
  }

  const form = new FormData();
  form.append(
    "image",
    new Blob([new Uint8Array(blob.bytes)], { type: mimeTypeFor(format) }),
    `recipe.${format}`,
  );
  form.append("extension", format);

  try {
    const response = await ctx.transport.invoke("PUT", `/api/recipes/${handle.slug}/image`, form);
    if (!isSuccess(response)) {
      return {
        status: "failed",
        reason: "ImageUploadFailed",
        cause: "upload-failed",
        details: describeResponse(response),
      };
    }
  } catch (error) {
    if (!(error instanceof TransportError)) throw error;
    return {
      status: "failed",
      reason: "ImageUploadFailed",
      cause: "upload-failed",
      details: error.message,
    };
  }

  ctx.logger.debug(`Uploaded ${format} image for ${handle.slug}`);
  return { status: "uploaded", extension: format };
}
