import { lstat } from "fs/promises";

/**
 * Check if anything occupies a path
 * Uses lstat so a dangling symlink still counts as taken
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}
