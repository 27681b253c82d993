import { stat } from "fs/promises";

/**
 * Whether anything exists at `path`
 * Only a missing entry counts as absent; other stat failures are rethrown.
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
