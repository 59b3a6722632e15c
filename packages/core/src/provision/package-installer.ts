import { execa } from "execa";
import fs from "node:fs/promises";
import { getExecaErrorMessage } from "./errors.js";
import type {
  EnvironmentHandle,
  InstallationOutcome,
  ProgressListener,
  ProvisionPhase,
} from "./types.js";

export interface InstallOptions {
  indexUrl?: string;
  noDeps?: boolean;
  phase?: ProvisionPhase;
  onProgress?: ProgressListener;
}

export interface InstallCommand {
  command: string;
  args: string[];
}

async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function buildInstallCommand(
  handle: EnvironmentHandle,
  specs: readonly string[],
  options: Pick<InstallOptions, "indexUrl" | "noDeps">,
  pipAvailable: boolean,
): InstallCommand {
  const args = pipAvailable ? ["install", "--upgrade"] : ["-m", "pip", "install", "--upgrade"];
  args.push(...specs);
  if (options.indexUrl) {
    args.push("--index-url", options.indexUrl);
  }
  if (options.noDeps) {
    args.push("--no-deps");
  }
  return {
    command: handle.executableOf(pipAvailable ? "pip" : "python"),
    args,
  };
}

/**
 * Installs `specs` with upgrade semantics, retrying once with the same arguments.
 * Never throws on installer failure; the outcome records it.
 */
export async function installPackages(
  handle: EnvironmentHandle,
  specs: readonly string[],
  options: InstallOptions = {},
): Promise<InstallationOutcome> {
  const phase = options.phase ?? "dependencies-installed";
  const { command, args } = buildInstallCommand(
    handle,
    specs,
    options,
    await fileExists(handle.executableOf("pip")),
  );

  try {
    await execa(command, args, { stdio: "inherit" });
    return { specs: [...specs], status: "installed" };
  } catch (firstError) {
    options.onProgress?.({
      phase,
      level: "warning",
      message: `Install failed: ${getExecaErrorMessage(firstError)}`,
      detail: "Retrying once...",
    });
  }

  try {
    await execa(command, args, { stdio: "inherit" });
    return { specs: [...specs], status: "installed-after-retry" };
  } catch (secondError) {
    const error = getExecaErrorMessage(secondError);
    options.onProgress?.({
      phase,
      level: "warning",
      message: `Failed to install ${specs.join(" ")}: ${error}`,
      detail: "Continuing with remaining dependencies...",
    });
    return { specs: [...specs], status: "failed", error };
  }
}
