import fs from "node:fs/promises";
import path from "node:path";
import { ProvisionError, getErrorMessage } from "./errors.js";
import type { Backend, ProductKind, SupplyMode, VariantSelection } from "./types.js";

const CARRIED_STATE_FILENAME = ".tts-provision-state.json";
const CARRIED_STATE_VERSION = 1;

interface CarriedStateFile {
  version: number;
  savedAt: string;
  selection: VariantSelection;
}

const PRODUCT_KINDS: readonly ProductKind[] = ["standard", "turbo"];
const SUPPLY_MODES: readonly SupplyMode[] = ["download", "user-supplied"];
const BACKENDS: readonly Backend[] = ["cpu", "rocm", "cuda"];

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

function invalid(filePath: string, reason: string): ProvisionError {
  return new ProvisionError(
    `Carried installer state at ${filePath} is unusable: ${reason}`,
    "CARRIED_STATE_INVALID",
    "Run the installer again from outside the environment.",
  );
}

export function carriedStatePathFor(envRoot: string): string {
  return path.join(envRoot, CARRIED_STATE_FILENAME);
}

export function parseCarriedSelection(raw: unknown, filePath: string): VariantSelection {
  if (typeof raw !== "object" || raw === null) {
    throw invalid(filePath, "not a JSON object");
  }
  const file = raw as { version?: unknown; selection?: unknown };
  if (file.version !== CARRIED_STATE_VERSION) {
    throw invalid(filePath, `unknown version ${String(file.version)}`);
  }

  if (typeof file.selection !== "object" || file.selection === null) {
    throw invalid(filePath, "missing selection");
  }
  const { productKind, supplyMode, backend, suppliedDir } = file.selection as {
    productKind?: unknown;
    supplyMode?: unknown;
    backend?: unknown;
    suppliedDir?: unknown;
  };

  if (
    !isOneOf(PRODUCT_KINDS, productKind) ||
    !isOneOf(SUPPLY_MODES, supplyMode) ||
    !isOneOf(BACKENDS, backend)
  ) {
    throw invalid(filePath, "selection fields are out of range");
  }

  if (supplyMode === "user-supplied") {
    if (typeof suppliedDir !== "string" || suppliedDir.length === 0) {
      throw invalid(filePath, "user-supplied selection has no directory");
    }
    return { productKind, supplyMode, backend, suppliedDir };
  }
  return { productKind, supplyMode, backend };
}

export async function writeCarriedState(
  filePath: string,
  selection: VariantSelection,
): Promise<void> {
  const state: CarriedStateFile = {
    version: CARRIED_STATE_VERSION,
    savedAt: new Date().toISOString(),
    selection,
  };
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
}

/**
 * Reads and removes the selection handed over by the outer process.
 * The file is removed whether or not it is usable.
 */
export async function consumeCarriedState(filePath: string): Promise<VariantSelection> {
  try {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      throw invalid(filePath, getErrorMessage(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw invalid(filePath, getErrorMessage(error));
    }

    return parseCarriedSelection(parsed, filePath);
  } finally {
    await fs.rm(filePath, { force: true });
  }
}
