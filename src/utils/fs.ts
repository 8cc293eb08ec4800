/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { stat } from "fs/promises";
import { isErrnoException } from "./errors";

/**
 * Check if a path exists and is a regular file
 *
 * @returns False when the path is missing or is not a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}
