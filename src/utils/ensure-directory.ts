import { mkdir, stat } from "fs/promises";
import { fileExists } from "./file-exists";

/**
 * Create a single directory level if it is missing
 * Parent directories are not created
 */
export async function ensureDirectory(dir: string): Promise<void> {
  if (await fileExists(dir)) {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new Error(`${dir} exists and is not a directory`);
    }
    return;
  }

  await mkdir(dir);
}
