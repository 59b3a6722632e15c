import { execa } from "execa";
import type { ProgressListener, VerificationRecord } from "./types.js";

const IMPORT_TIMEOUT_MS = 120_000;

function lastLine(output: unknown): string | undefined {
  if (typeof output !== "string") {
    return undefined;
  }
  const lines = output.trim().split(/\r?\n/);
  return lines.at(-1) || undefined;
}

/**
 * Probes each module with the environment's interpreter (`python -c "import <name>"`).
 * Informational only: failures are returned, never thrown.
 */
export async function verifyPackages(
  python: string,
  modules: readonly string[],
  onProgress?: ProgressListener,
): Promise<VerificationRecord[]> {
  const records: VerificationRecord[] = [];

  for (const name of modules) {
    const result = await execa(python, ["-c", `import ${name}`], {
      reject: false,
      timeout: IMPORT_TIMEOUT_MS,
    });
    const probeSucceeded = !result.failed && result.exitCode === 0;
    records.push({ name, probeSucceeded });
    onProgress?.({
      phase: "verified",
      level: probeSucceeded ? "success" : "error",
      message: name,
      detail: probeSucceeded ? undefined : lastLine(result.stderr),
    });
  }

  return records;
}

export function failedVerifications(records: readonly VerificationRecord[]): string[] {
  return records.filter((record) => !record.probeSucceeded).map((record) => record.name);
}
