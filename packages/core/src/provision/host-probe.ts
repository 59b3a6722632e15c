import { execa } from "execa";
import { ProvisionError, getExecaErrorMessage } from "./errors.js";
import type { Backend, HostProfile, OSFamily, SupportedOSFamily } from "./types.js";

const VERSION_TIMEOUT_MS = 10_000;

export type ProbeResult =
  | { ok: true; osFamily: SupportedOSFamily }
  | { ok: false; error: ProvisionError };

export function normalizeOSFamily(platform: NodeJS.Platform): OSFamily {
  if (platform === "linux") {
    return "linux";
  }
  if (platform === "win32") {
    return "windows";
  }
  return "unsupported";
}

export function toOsLabel(osFamily: OSFamily): string {
  if (osFamily === "linux") {
    return "Linux";
  }
  if (osFamily === "windows") {
    return "Windows";
  }
  return "Unsupported OS";
}

export function probeHost(platform: NodeJS.Platform = process.platform): ProbeResult {
  const osFamily = normalizeOSFamily(platform);
  if (osFamily === "unsupported") {
    return {
      ok: false,
      error: new ProvisionError(
        `Unsupported operating system: ${platform}`,
        "HOST_UNSUPPORTED",
        "This installer only supports Windows and Linux.",
      ),
    };
  }
  return { ok: true, osFamily };
}

export function defaultPythonCommand(osFamily: SupportedOSFamily): string {
  return osFamily === "windows" ? "python" : "python3";
}

/** `Python 3.11.4` -> `cp311`. */
export function parseRuntimeTag(versionOutput: string): string | null {
  const match = versionOutput.match(/Python\s+(\d+)\.(\d+)/i);
  if (!match) {
    return null;
  }
  return `cp${match[1]}${match[2]}`;
}

export async function detectRuntimeTag(python: string): Promise<string> {
  let output: string;
  try {
    const result = await execa(python, ["--version"], {
      all: true,
      timeout: VERSION_TIMEOUT_MS,
    });
    output = result.all ?? result.stdout;
  } catch (error) {
    throw new ProvisionError(
      `Could not run ${python}: ${getExecaErrorMessage(error)}`,
      "PYTHON_NOT_FOUND",
      "Install Python 3.10 or newer, or point TTS_PROVISION_PYTHON at an interpreter.",
    );
  }

  const tag = parseRuntimeTag(output);
  if (!tag) {
    throw new ProvisionError(
      `Could not read the Python version from "${output.trim()}".`,
      "PYTHON_NOT_FOUND",
      "Point TTS_PROVISION_PYTHON at a CPython 3 interpreter.",
    );
  }
  return tag;
}

export async function detectHostProfile(
  osFamily: SupportedOSFamily,
  python: string,
): Promise<HostProfile> {
  const runtimeTag = await detectRuntimeTag(python);
  return { osFamily, runtimeTag };
}

export function assertBackendAllowed(backend: Backend, osFamily: SupportedOSFamily): void {
  if (backend === "rocm" && osFamily !== "linux") {
    throw new ProvisionError(
      "AMD ROCm is only supported on Linux!",
      "BACKEND_UNSUPPORTED",
      "Please restart and choose a different backend.",
    );
  }
}
