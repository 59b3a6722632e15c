import path from "node:path";
import { defaultPythonCommand } from "./host-probe.js";
import type { SupportedOSFamily } from "./types.js";

export const ENV_DIR_VAR = "TTS_PROVISION_ENV_DIR";
export const MODEL_DIR_VAR = "TTS_PROVISION_MODEL_DIR";
export const PYTHON_VAR = "TTS_PROVISION_PYTHON";
export const CARRIED_STATE_VAR = "TTS_PROVISION_CARRIED_STATE";

const DEFAULT_ENV_DIR = "Chatterbox_TTS";
const DEFAULT_MODEL_DIR = "Model";

export interface ProvisionConfig {
  readonly envRoot: string;
  readonly modelDir: string;
  /** Interpreter used to create the environment. */
  readonly hostPython: string;
  /** Set only in a process relaunched inside the environment. */
  readonly carriedStatePath: string | null;
}

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function resolveProvisionConfig(
  osFamily: SupportedOSFamily,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ProvisionConfig {
  const carried = readVar(env, CARRIED_STATE_VAR);
  return {
    envRoot: path.resolve(cwd, readVar(env, ENV_DIR_VAR) ?? DEFAULT_ENV_DIR),
    modelDir: path.resolve(cwd, readVar(env, MODEL_DIR_VAR) ?? DEFAULT_MODEL_DIR),
    hostPython: readVar(env, PYTHON_VAR) ?? defaultPythonCommand(osFamily),
    carriedStatePath: carried ? path.resolve(cwd, carried) : null,
  };
}
