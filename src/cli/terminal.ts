import type {
  ProgressListener,
  ProvisionProgress,
} from "../../packages/core/src/provision/types.js";

const RULE = "=".repeat(70);

export function formatHeader(text: string): string[] {
  return ["", RULE, `  ${text}`, RULE, ""];
}

/** Terminal lines for one progress event; markers follow the success/warning/error convention. */
export function formatProgressLines(progress: ProvisionProgress): string[] {
  const { level, message, detail } = progress;
  switch (level) {
    case "section":
      return detail ? [...formatHeader(message), detail] : formatHeader(message);
    case "success":
      return [`✓ ${message}`];
    case "warning":
      return detail ? [`⚠️  ${message}`, `⚠️  ${detail}`] : [`⚠️  ${message}`];
    case "error":
      return detail ? [`✗ ${message}`, detail] : [`✗ ${message}`];
    case "info":
      return detail ? [message, `  ${detail}`] : [message];
  }
}

export function createProgressRenderer(write: (line: string) => void): ProgressListener {
  return (progress) => {
    for (const line of formatProgressLines(progress)) {
      write(line);
    }
  };
}
