import { execa } from "execa";
import fs from "node:fs/promises";
import path from "node:path";
import { carriedStatePathFor, writeCarriedState } from "./carried-state.js";
import { CARRIED_STATE_VAR } from "./config.js";
import { ProvisionError, getExecaErrorMessage } from "./errors.js";
import type {
  EnvironmentHandle,
  EnvironmentTool,
  ProgressListener,
  SupportedOSFamily,
  VariantSelection,
} from "./types.js";

export type EnsureResult =
  | { kind: "inside"; created: boolean }
  | { kind: "relaunched"; created: boolean; exitCode: number };

export interface EnsureEnvironmentOptions {
  hostPython: string;
  selection: VariantSelection;
  /** Script the current process was started with; relaunched unchanged. */
  entryScript: string;
  execPath?: string;
  execArgv?: string[];
  env?: NodeJS.ProcessEnv;
  onProgress?: ProgressListener;
}

function binDirFor(rootPath: string, osFamily: SupportedOSFamily): string {
  return path.join(rootPath, osFamily === "windows" ? "Scripts" : "bin");
}

export function resolveEnvironment(
  envRoot: string,
  osFamily: SupportedOSFamily,
): EnvironmentHandle {
  const rootPath = path.resolve(envRoot);
  const binDir = binDirFor(rootPath, osFamily);
  return {
    rootPath,
    osFamily,
    activateScript: path.join(binDir, osFamily === "windows" ? "activate.ps1" : "activate"),
    executableOf(tool: EnvironmentTool): string {
      return path.join(binDir, osFamily === "windows" ? `${tool}.exe` : tool);
    },
  };
}

/**
 * Interpreter of the environment this process runs in, or null outside any environment.
 */
export function activeRuntimePath(
  env: NodeJS.ProcessEnv,
  osFamily: SupportedOSFamily,
): string | null {
  const virtualEnv = env.VIRTUAL_ENV?.trim();
  if (!virtualEnv) {
    return null;
  }
  return resolveEnvironment(virtualEnv, osFamily).executableOf("python");
}

export function isInsideEnvironment(handle: EnvironmentHandle, env: NodeJS.ProcessEnv): boolean {
  const active = activeRuntimePath(env, handle.osFamily);
  return active !== null && path.resolve(active) === path.resolve(handle.executableOf("python"));
}

/** Mirrors what the venv activation script does to the environment block. */
export function activatedEnv(
  handle: EnvironmentHandle,
  base: NodeJS.ProcessEnv,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  const pathKey = Object.keys(env).find((key) => key.toUpperCase() === "PATH") ?? "PATH";
  const binDir = binDirFor(handle.rootPath, handle.osFamily);
  const current = env[pathKey];
  env[pathKey] = current ? `${binDir}${path.delimiter}${current}` : binDir;
  env.VIRTUAL_ENV = handle.rootPath;
  delete env.PYTHONHOME;
  return env;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function createEnvironment(
  handle: EnvironmentHandle,
  hostPython: string,
  onProgress?: ProgressListener,
): Promise<boolean> {
  if (await pathExists(handle.rootPath)) {
    onProgress?.({
      phase: "environment-ensured",
      level: "success",
      message: "Virtual environment already exists",
      detail: handle.rootPath,
    });
    return false;
  }

  onProgress?.({
    phase: "environment-ensured",
    level: "info",
    message: "Creating virtual environment...",
    detail: handle.rootPath,
  });
  try {
    await execa(hostPython, ["-m", "venv", handle.rootPath], { stdio: "inherit" });
  } catch (error) {
    throw new ProvisionError(
      `Failed to create virtual environment: ${getExecaErrorMessage(error)}`,
      "ENVIRONMENT_CREATE_FAILED",
      "Make sure the Python venv module is installed (python3-venv on Debian/Ubuntu).",
    );
  }
  onProgress?.({
    phase: "environment-ensured",
    level: "success",
    message: "Virtual environment created",
  });
  return true;
}

async function relaunchInside(
  handle: EnvironmentHandle,
  options: EnsureEnvironmentOptions,
): Promise<number> {
  const base = options.env ?? process.env;
  const statePath = carriedStatePathFor(handle.rootPath);
  await writeCarriedState(statePath, options.selection);

  options.onProgress?.({
    phase: "relaunched",
    level: "info",
    message: "Activating virtual environment...",
  });

  const env = { ...activatedEnv(handle, base), [CARRIED_STATE_VAR]: statePath };
  // The relaunched process owns the terminal; Ctrl+C is handled there.
  const ignoreInterrupt = (): void => undefined;
  process.on("SIGINT", ignoreInterrupt);
  try {
    const result = await execa(
      options.execPath ?? process.execPath,
      [...(options.execArgv ?? process.execArgv), options.entryScript],
      { stdio: "inherit", env, extendEnv: false, reject: false },
    );
    if (result.exitCode === undefined) {
      if (result.signal) {
        return 1;
      }
      throw new ProvisionError(
        `Could not relaunch inside the environment: ${getExecaErrorMessage(result)}`,
        "RELAUNCH_FAILED",
        `Activate ${handle.activateScript} and run the installer again.`,
      );
    }
    return result.exitCode;
  } finally {
    process.off("SIGINT", ignoreInterrupt);
  }
}

export async function ensurePip(
  handle: EnvironmentHandle,
  onProgress?: ProgressListener,
): Promise<void> {
  if (await pathExists(handle.executableOf("pip"))) {
    return;
  }

  onProgress?.({
    phase: "environment-ensured",
    level: "info",
    message: "Ensuring pip is available...",
  });
  try {
    await execa(handle.executableOf("python"), ["-m", "ensurepip", "--upgrade"], {
      stdio: "inherit",
    });
  } catch (error) {
    throw new ProvisionError(
      `ensurepip failed: ${getExecaErrorMessage(error)}`,
      "PIP_BOOTSTRAP_FAILED",
      "Package installs will use python -m pip instead.",
      "recoverable",
    );
  }
}

/**
 * Creates the environment when absent, then makes sure the rest of the run happens inside it.
 * Outside the environment this relaunches the same entry script with the environment
 * activated and returns the relaunched process's exit code; inside it is a no-op.
 */
export async function ensureEnvironment(
  handle: EnvironmentHandle,
  options: EnsureEnvironmentOptions,
): Promise<EnsureResult> {
  const env = options.env ?? process.env;
  if (isInsideEnvironment(handle, env)) {
    return { kind: "inside", created: false };
  }

  const created = await createEnvironment(handle, options.hostPython, options.onProgress);
  const exitCode = await relaunchInside(handle, options);
  return { kind: "relaunched", created, exitCode };
}
