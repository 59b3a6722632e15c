export type ProductKind = "standard" | "turbo";
export type SupplyMode = "download" | "user-supplied";
export type Backend = "cpu" | "rocm" | "cuda";
export type OSFamily = "linux" | "windows" | "unsupported";
export type SupportedOSFamily = Exclude<OSFamily, "unsupported">;

export interface VariantSelection {
  readonly productKind: ProductKind;
  readonly supplyMode: SupplyMode;
  readonly backend: Backend;
  /** Validated source directory; present only for user-supplied variants. */
  readonly suppliedDir?: string;
}

export interface HostProfile {
  readonly osFamily: SupportedOSFamily;
  /** Python wheel tag of the interpreter, e.g. `cp311`. */
  readonly runtimeTag: string;
}

export type EnvironmentTool = "python" | "pip";

export interface EnvironmentHandle {
  readonly rootPath: string;
  readonly osFamily: SupportedOSFamily;
  readonly activateScript: string;
  executableOf(tool: EnvironmentTool): string;
}

export type InstallStatus = "installed" | "installed-after-retry" | "failed";

export interface InstallationOutcome {
  specs: string[];
  status: InstallStatus;
  error?: string;
}

export interface VerificationRecord {
  name: string;
  probeSucceeded: boolean;
}

export type ProvisionPhase =
  | "start"
  | "probed"
  | "variant-chosen"
  | "backend-chosen"
  | "assets-validated"
  | "environment-ensured"
  | "runtime-installed"
  | "dependencies-installed"
  | "assets-acquired"
  | "verified"
  | "reported"
  | "complete"
  | "fatal"
  | "cancelled"
  | "relaunched";

export type ProgressLevel = "section" | "info" | "success" | "warning" | "error";

export interface ProvisionProgress {
  phase: ProvisionPhase;
  level: ProgressLevel;
  message: string;
  detail?: string;
}

export type ProgressListener = (progress: ProvisionProgress) => void;
