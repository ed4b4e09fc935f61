/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir, stat } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a directory and its parents
 * An existing directory is fine. A file at the same path (a page written
 * without an extension whose subpages need a directory of the same name)
 * is an error, as is every other failure.
 */
export async function ensureDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      if ((await stat(path)).isDirectory()) {
        return;
      }
      throw new Error(
        `Cannot create directory '${path}': a file with that name exists`,
        { cause: error },
      );
    }
    throw error;
  }
}
