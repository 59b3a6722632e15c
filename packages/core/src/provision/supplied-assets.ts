import fs from "node:fs/promises";
import path from "node:path";

export type SuppliedAssetsResult =
  | { ok: true }
  | { ok: false; reason: string; missing: string[] };

async function isDirectory(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Checks that every expected filename is a direct child of `directory`.
 * `missing` keeps the order of `expected`.
 */
export async function validateSuppliedAssets(
  directory: string,
  expected: readonly string[],
): Promise<SuppliedAssetsResult> {
  if (directory.trim().length === 0 || !(await isDirectory(directory))) {
    return {
      ok: false,
      reason: "Folder does not exist or is not a directory",
      missing: [...expected],
    };
  }

  const missing: string[] = [];
  for (const filename of expected) {
    if (!(await pathExists(path.join(directory, filename)))) {
      missing.push(filename);
    }
  }

  if (missing.length > 0) {
    return { ok: false, reason: `Missing files: ${missing.join(", ")}`, missing };
  }
  return { ok: true };
}
