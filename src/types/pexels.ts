/**
 * Pexels search API response types with Zod schemas
 * Absent or null fields decode to zero values; only src.large2x is required
 */

import { z } from "zod";

// Absent or null fields take their zero value
const text = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? "");
const integer = () =>
  z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? 0);
const flag = () =>
  z
    .boolean()
    .nullish()
    .transform((value) => value ?? false);

export const PhotoSourceSchema = z.object({
  original: text(),
  large2x: z.string(),
  large: text(),
  medium: text(),
  small: text(),
  portrait: text(),
  landscape: text(),
  tiny: text(),
});

export const PhotoSchema = z.object({
  id: integer(),
  width: integer(),
  height: integer(),
  url: text(),
  photographer: text(),
  photographer_url: text(),
  photographer_id: integer(),
  liked: flag(),
  src: PhotoSourceSchema,
});

export const PageSchema = z.object({
  total_results: integer(),
  page: integer(),
  per_page: integer(),
  photos: z
    .array(PhotoSchema)
    .nullish()
    .transform((photos) => photos ?? []),
  // Empty, null or absent all mean "no more pages"
  next_page: text(),
});

export type PhotoSource = z.infer<typeof PhotoSourceSchema>;
export type PhotoVariant = keyof PhotoSource;
export type Photo = z.infer<typeof PhotoSchema>;
export type Page = z.infer<typeof PageSchema>;

/**
 * The only variant ever downloaded
 */
export const DOWNLOAD_VARIANT = "large2x" satisfies PhotoVariant;
