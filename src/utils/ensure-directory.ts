import { mkdir } from "fs/promises";
import { IOError } from "./errors";

/**
 * Create the destination directory (parent must exist)
 * An existing directory is not an error
 */
export async function ensureDirectory(path: string): Promise<void> {
  try {
    await mkdir(path);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      return;
    }
    throw new IOError("Cannot create destination directory", path, {
      cause: error,
    });
  }
}
