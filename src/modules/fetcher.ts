/**
 * Photo Fetcher Module
 * Downloads one variant per photo and writes it under a name taken from its URL
 */

import { writeFile } from "fs/promises";
import { join } from "node:path";
import { DOWNLOAD_VARIANT } from "../types";
import type { HarvestContext, Photo } from "../types";
import { deriveFilename } from "../utils/derive-filename";
import { IOError } from "../utils/errors";
import { readBytes, sendRequest } from "../utils/http";
import type { Transport } from "../utils/http";

/**
 * Download image bytes; no credentials are sent to the image host
 */
export async function fetchImageBytes(
  transport: Transport,
  url: string,
): Promise<Uint8Array> {
  const response = await sendRequest(transport, url);
  return readBytes(response, url);
}

/**
 * Write bytes to destinationDir/filename, replacing any existing file
 * The directory must already exist
 */
export async function persist(
  bytes: Uint8Array,
  destinationDir: string,
  filename: string,
): Promise<string> {
  const fullPath = join(destinationDir, filename);

  try {
    await writeFile(fullPath, bytes);
  } catch (error) {
    throw new IOError("Cannot write file", fullPath, { cause: error });
  }

  return fullPath;
}

/**
 * Fetch and store a single photo, returning the number of bytes written
 */
export async function processPhoto(
  ctx: HarvestContext,
  photo: Photo,
): Promise<number> {
  const { config, transport, logger } = ctx;
  const url = photo.src[DOWNLOAD_VARIANT];

  const bytes = await fetchImageBytes(transport, url);
  const fullPath = await persist(
    bytes,
    config.output.directory,
    deriveFilename(url),
  );

  logger.debug(`saved photo ${photo.id} to ${fullPath} (${bytes.byteLength} bytes)`);
  return bytes.byteLength;
}
