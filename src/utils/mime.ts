/**
 * MIME type resolution for downloaded content
 */

import type { ImageMimeType } from "../types";
import { stripQueryAndFragment } from "./url";

export const ACCEPTED_IMAGE_TYPES: readonly ImageMimeType[] = [
  "image/jpeg",
  "image/png",
  "image/gif",
];

const EXTENSION_TYPES: ReadonlyArray<[string, ImageMimeType]> = [
  [".jpg", "image/jpeg"],
  [".jpeg", "image/jpeg"],
  [".png", "image/png"],
  [".gif", "image/gif"],
];

/**
 * Media type of a Content-Type header, without parameters
 *
 * @example
 * parseContentType("Image/JPEG; charset=binary") // "image/jpeg"
 * parseContentType(null) // null
 */
export function parseContentType(header: string | null): string | null {
  if (!header) return null;
  const mediaType = header.split(";")[0].trim().toLowerCase();
  return mediaType || null;
}

export function typeFromExtension(url: string): ImageMimeType | null {
  const path = stripQueryAndFragment(url).toLowerCase();
  for (const [extension, type] of EXTENSION_TYPES) {
    if (path.endsWith(extension)) return type;
  }
  return null;
}

/**
 * Declared header first, then the URL extension, then "unknown"
 */
export function resolveContentType(header: string | null, url: string): string {
  return parseContentType(header) ?? typeFromExtension(url) ?? "unknown";
}

export function isAcceptedImageType(type: string): type is ImageMimeType {
  return ACCEPTED_IMAGE_TYPES.some((accepted) => accepted === type);
}
