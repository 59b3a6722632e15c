export type Severity = "fatal" | "recoverable" | "warning";

export type ProvisionErrorCode =
  | "HOST_UNSUPPORTED"
  | "PYTHON_NOT_FOUND"
  | "BACKEND_UNSUPPORTED"
  | "ENVIRONMENT_CREATE_FAILED"
  | "RELAUNCH_FAILED"
  | "PIP_BOOTSTRAP_FAILED"
  | "OPTIONAL_COMPONENT_FAILED"
  | "CARRIED_STATE_INVALID"
  | "ASSETS_INVALID"
  | "ASSET_FETCH_FAILED"
  | "ASSET_COPY_FAILED";

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly severity: Severity;
  readonly suggestion: string;

  constructor(
    message: string,
    code: ProvisionErrorCode,
    suggestion: string,
    severity: Severity = "fatal",
  ) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
    this.severity = severity;
    this.suggestion = suggestion;
  }
}

/** Raised at a menu prompt when the user interrupts or closes input. */
export class ProvisionCancelled extends Error {
  constructor(message = "Installation cancelled.") {
    super(message);
    this.name = "ProvisionCancelled";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return String(error);
}

export function getExecaErrorMessage(error: unknown): string {
  if (typeof error !== "object" || error === null) {
    return getErrorMessage(error);
  }

  const data = error as {
    stderr?: unknown;
    stdout?: unknown;
    shortMessage?: unknown;
  };
  for (const value of [data.stderr, data.stdout, data.shortMessage]) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }

  return getErrorMessage(error);
}
