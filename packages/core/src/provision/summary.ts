import { BACKEND_LABELS, PRODUCT_LABELS } from "./menus.js";
import type { EnvironmentHandle, HostProfile, VariantSelection } from "./types.js";

export interface RunSummaryInput {
  selection: VariantSelection;
  host: HostProfile;
  environment: EnvironmentHandle;
  /** Package specs whose install failed after the retry. */
  failedPackages: readonly string[];
  /** Module names that did not import inside the environment. */
  failedVerifications: readonly string[];
  /** Optional-component problems; never failures. */
  warnings: readonly string[];
  modelDir: string;
}

export function hasProblems(
  input: Pick<RunSummaryInput, "failedPackages" | "failedVerifications">,
): boolean {
  return input.failedPackages.length > 0 || input.failedVerifications.length > 0;
}

export function formatSummary(input: RunSummaryInput): string[] {
  const { selection, host, environment } = input;
  const lines: string[] = [];

  if (hasProblems(input)) {
    lines.push("⚠️  Installation completed with warnings");
    if (input.failedPackages.length > 0) {
      lines.push(`Packages that failed to install: ${input.failedPackages.join(", ")}`);
    }
    if (input.failedVerifications.length > 0) {
      lines.push(`Modules that failed to import: ${input.failedVerifications.join(", ")}`);
    }
    lines.push("You may need to install these manually later.");
  } else {
    lines.push("✓ All components installed successfully!");
  }
  for (const warning of input.warnings) {
    lines.push(`⚠️  ${warning}`);
  }

  lines.push(
    "",
    "Configuration:",
    `  • Model: Chatterbox ${PRODUCT_LABELS[selection.productKind]}`,
    `  • Backend: ${BACKEND_LABELS[selection.backend]}`,
    `  • Model files: ${input.modelDir}`,
    "",
    "To use Chatterbox-TTS:",
    host.osFamily === "linux"
      ? `  source ${environment.activateScript}`
      : `  ${environment.activateScript}`,
    "  python your_script.py",
    "",
  );

  if (selection.backend === "cpu") {
    lines.push("Note: Using CPU backend. Use device='cpu' in your scripts.", "");
  }

  lines.push("For audio issues, install ffmpeg:");
  lines.push(
    host.osFamily === "linux"
      ? "  sudo apt-get install ffmpeg"
      : "  Download from: https://ffmpeg.org/download.html",
  );

  return lines;
}
