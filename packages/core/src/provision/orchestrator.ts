import { acquireAssets, type AssetFetcher } from "./asset-acquisition.js";
import { expectedFilenames } from "./asset-manifest.js";
import { consumeCarriedState } from "./carried-state.js";
import type { PromptIO } from "./choice-prompt.js";
import { resolveProvisionConfig } from "./config.js";
import { ensureEnvironment, ensurePip, resolveEnvironment } from "./environment.js";
import { ProvisionCancelled, ProvisionError } from "./errors.js";
import {
  assertBackendAllowed,
  detectHostProfile,
  probeHost,
  toOsLabel,
} from "./host-probe.js";
import {
  BACKEND_LABELS,
  PRODUCT_LABELS,
  collectSuppliedDirectory,
  confirmDownload,
  selectBackend,
  selectVariant,
} from "./menus.js";
import { installPackages } from "./package-installer.js";
import {
  CRITICAL_MODULES,
  DEPENDENCIES,
  MODEL_PACKAGE,
  flashAttentionWheelUrl,
  runtimeStackFor,
} from "./package-plan.js";
import { formatSummary } from "./summary.js";
import type {
  EnvironmentHandle,
  HostProfile,
  InstallationOutcome,
  ProgressListener,
  ProvisionPhase,
  ProvisionProgress,
  SupportedOSFamily,
  VariantSelection,
  VerificationRecord,
} from "./types.js";
import { failedVerifications, verifyPackages } from "./verifier.js";

export type ProvisionStatus = "complete" | "cancelled" | "fatal" | "relaunched";

export interface ProvisionerOptions {
  io: PromptIO;
  /** Script to relaunch inside the environment, normally `process.argv[1]`. */
  entryScript: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  fetcher?: AssetFetcher;
  onProgress?: ProgressListener;
}

export interface ProvisionResult {
  status: ProvisionStatus;
  exitCode: number;
  /** Last state reached before the run ended. */
  phase: ProvisionPhase;
  selection?: VariantSelection;
  installOutcomes: InstallationOutcome[];
  verification: VerificationRecord[];
  warnings: string[];
  summary: string[];
  error?: ProvisionError;
}

function emitProgress(options: ProvisionerOptions, progress: ProvisionProgress): void {
  if (!options.onProgress) {
    return;
  }

  try {
    options.onProgress(progress);
  } catch {
    // Progress rendering is best-effort.
  }
}

/**
 * Runs an optional step. Non-fatal {@link ProvisionError}s are recorded as warnings and the
 * run goes on; fatal ones and anything else propagate.
 */
async function tolerate(
  step: () => Promise<void>,
  phase: ProvisionPhase,
  options: ProvisionerOptions,
  warnings: string[],
): Promise<void> {
  try {
    await step();
  } catch (error) {
    if (!(error instanceof ProvisionError) || error.severity === "fatal") {
      throw error;
    }
    warnings.push(error.message);
    emitProgress(options, {
      phase,
      level: "warning",
      message: error.message,
      detail: error.suggestion,
    });
  }
}

async function collectSelection(
  io: PromptIO,
  osFamily: SupportedOSFamily,
  options: ProvisionerOptions,
  advance: (phase: ProvisionPhase) => void,
): Promise<VariantSelection> {
  emitProgress(options, { phase: "probed", level: "section", message: "Step 1: Model Selection" });
  io.write("Welcome! Ready to Install Chatterbox? Start by entering an option below:\n");
  const { productKind, supplyMode } = await selectVariant(io);
  const modelLabel = PRODUCT_LABELS[productKind];
  emitProgress(options, {
    phase: "variant-chosen",
    level: "info",
    message:
      supplyMode === "user-supplied"
        ? `You selected User Supplied ${modelLabel} model.`
        : `You selected ${modelLabel} model (download from repository).`,
  });
  advance("variant-chosen");

  emitProgress(options, {
    phase: "variant-chosen",
    level: "section",
    message: "Step 2: Backend Selection",
  });
  io.write("Great! Now, you'll need to choose your backend:\n");
  const backend = await selectBackend(io);
  assertBackendAllowed(backend, osFamily);
  emitProgress(options, {
    phase: "backend-chosen",
    level: "info",
    message: `You selected: ${BACKEND_LABELS[backend]}`,
  });
  advance("backend-chosen");

  if (supplyMode === "user-supplied") {
    const suppliedDir = await collectSuppliedDirectory(io, expectedFilenames(productKind));
    advance("assets-validated");
    return { productKind, supplyMode, backend, suppliedDir };
  }

  await confirmDownload(io);
  return { productKind, supplyMode, backend };
}

async function installRuntime(
  handle: EnvironmentHandle,
  host: HostProfile,
  selection: VariantSelection,
  options: ProvisionerOptions,
  outcomes: InstallationOutcome[],
  warnings: string[],
): Promise<void> {
  const stack = runtimeStackFor(selection.backend);
  emitProgress(options, {
    phase: "environment-ensured",
    level: "info",
    message: `Installing ${stack.label}...`,
  });
  outcomes.push(
    await installPackages(handle, stack.specs, {
      indexUrl: stack.indexUrl,
      phase: "runtime-installed",
      onProgress: options.onProgress,
    }),
  );

  if (selection.backend !== "cuda") {
    return;
  }

  emitProgress(options, {
    phase: "runtime-installed",
    level: "info",
    message: "Installing flash-attention for RTX 30+ series...",
  });
  await tolerate(
    async () => {
      const optional = await installPackages(handle, [flashAttentionWheelUrl(host)], {
        phase: "runtime-installed",
        onProgress: options.onProgress,
      });
      if (optional.status === "failed") {
        const reason = optional.error ?? "installer exited with an error";
        throw new ProvisionError(
          `flash-attention installation failed: ${reason}`,
          "OPTIONAL_COMPONENT_FAILED",
          "Continuing without flash-attention (may affect performance)",
          "warning",
        );
      }
      emitProgress(options, {
        phase: "runtime-installed",
        level: "success",
        message: "flash-attention installed",
      });
    },
    "runtime-installed",
    options,
    warnings,
  );
}

async function installDependencies(
  handle: EnvironmentHandle,
  options: ProvisionerOptions,
  outcomes: InstallationOutcome[],
): Promise<void> {
  emitProgress(options, {
    phase: "runtime-installed",
    level: "info",
    message: `Installing ${MODEL_PACKAGE} (without dependencies)...`,
  });
  outcomes.push(
    await installPackages(handle, [MODEL_PACKAGE], {
      noDeps: true,
      onProgress: options.onProgress,
    }),
  );

  emitProgress(options, {
    phase: "runtime-installed",
    level: "info",
    message: "Installing core dependencies...",
  });
  for (const dependency of DEPENDENCIES) {
    emitProgress(options, {
      phase: "runtime-installed",
      level: "info",
      message: `Installing ${dependency}...`,
    });
    outcomes.push(await installPackages(handle, [dependency], { onProgress: options.onProgress }));
  }
}

/**
 * Runs the whole provisioning flow. Menus are skipped when the process was relaunched
 * inside the environment with a carried selection.
 */
export async function runProvisioner(options: ProvisionerOptions): Promise<ProvisionResult> {
  const env = options.env ?? process.env;
  const installOutcomes: InstallationOutcome[] = [];
  const warnings: string[] = [];
  let verification: VerificationRecord[] = [];
  let selection: VariantSelection | undefined;
  let phase: ProvisionPhase = "start";
  const advance = (next: ProvisionPhase): void => {
    phase = next;
  };

  const finish = (
    status: ProvisionStatus,
    exitCode: number,
    extra: Partial<Pick<ProvisionResult, "summary" | "error">> = {},
  ): ProvisionResult => ({
    status,
    exitCode,
    phase,
    selection,
    installOutcomes,
    verification,
    warnings,
    summary: extra.summary ?? [],
    error: extra.error,
  });

  try {
    const probe = probeHost(options.platform ?? process.platform);
    if (!probe.ok) {
      emitProgress(options, {
        phase: "fatal",
        level: "error",
        message: probe.error.message,
        detail: probe.error.suggestion,
      });
      return finish("fatal", 1, { error: probe.error });
    }
    const osFamily = probe.osFamily;
    const config = resolveProvisionConfig(osFamily, env, options.cwd);
    advance("probed");

    if (config.carriedStatePath) {
      selection = await consumeCarriedState(config.carriedStatePath);
      assertBackendAllowed(selection.backend, osFamily);
      advance(selection.supplyMode === "user-supplied" ? "assets-validated" : "backend-chosen");
    } else {
      emitProgress(options, {
        phase: "probed",
        level: "section",
        message: "Chatterbox-TTS Installer",
        detail: `Detected OS: ${toOsLabel(osFamily)}`,
      });
      selection = await collectSelection(options.io, osFamily, options, advance);
    }
    // Nothing below prompts; release the terminal before any subprocess runs.
    options.io.close();

    const handle = resolveEnvironment(config.envRoot, osFamily);
    emitProgress(options, { phase, level: "section", message: "Step 3: Environment Setup" });
    const ensured = await ensureEnvironment(handle, {
      hostPython: config.hostPython,
      selection,
      entryScript: options.entryScript,
      env,
      onProgress: options.onProgress,
    });
    if (ensured.kind === "relaunched") {
      advance("relaunched");
      return finish("relaunched", ensured.exitCode);
    }
    await tolerate(
      () => ensurePip(handle, options.onProgress),
      "environment-ensured",
      options,
      warnings,
    );
    const host = await detectHostProfile(osFamily, handle.executableOf("python"));
    advance("environment-ensured");

    emitProgress(options, { phase, level: "section", message: "Step 4: Installing PyTorch" });
    await installRuntime(handle, host, selection, options, installOutcomes, warnings);
    advance("runtime-installed");

    emitProgress(options, {
      phase,
      level: "section",
      message: "Step 5: Installing Chatterbox-TTS Dependencies",
    });
    await installDependencies(handle, options, installOutcomes);
    advance("dependencies-installed");

    emitProgress(options, { phase, level: "section", message: "Step 6: Setting Up Model Files" });
    await acquireAssets(selection, config.modelDir, {
      fetcher: options.fetcher,
      onProgress: options.onProgress,
    });
    advance("assets-acquired");

    emitProgress(options, {
      phase,
      level: "section",
      message: "Step 7: Installation Verification",
    });
    verification = await verifyPackages(
      handle.executableOf("python"),
      CRITICAL_MODULES,
      options.onProgress,
    );
    advance("verified");

    const summary = formatSummary({
      selection,
      host,
      environment: handle,
      failedPackages: installOutcomes
        .filter((outcome) => outcome.status === "failed")
        .flatMap((outcome) => outcome.specs),
      failedVerifications: failedVerifications(verification),
      warnings,
      modelDir: config.modelDir,
    });
    advance("reported");
    emitProgress(options, { phase, level: "section", message: "Installation Complete!" });

    advance("complete");
    return finish("complete", 0, { summary });
  } catch (error) {
    if (error instanceof ProvisionCancelled) {
      emitProgress(options, { phase: "cancelled", level: "info", message: error.message });
      return finish("cancelled", 0);
    }
    if (error instanceof ProvisionError) {
      emitProgress(options, {
        phase: "fatal",
        level: "error",
        message: error.message,
        detail: error.suggestion,
      });
      return finish("fatal", 1, { error });
    }
    throw error;
  }
}
