import { access } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists at the given path
 */
export async function fileExists(filepath: string): Promise<boolean> {
  try {
    await access(filepath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
