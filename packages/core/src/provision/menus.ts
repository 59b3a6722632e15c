import { askDirectory, choose, confirm, type PromptIO } from "./choice-prompt.js";
import { ProvisionCancelled } from "./errors.js";
import { validateSuppliedAssets } from "./supplied-assets.js";
import type { Backend, ProductKind, SupplyMode } from "./types.js";

interface VariantOption {
  label: string;
  productKind: ProductKind;
  supplyMode: SupplyMode;
}

const VARIANT_OPTIONS: readonly VariantOption[] = [
  {
    label: "Chatterbox (Original): Zero-shot cloning, Multiple Languages, Slower",
    productKind: "standard",
    supplyMode: "download",
  },
  {
    label:
      "Chatterbox (Turbo): Paralinguistic Tags ([laugh]), Lower Compute and VRAM, Faster, May reduce quality",
    productKind: "turbo",
    supplyMode: "download",
  },
  {
    label:
      "Chatterbox (Original, User Supplied): Same as Option 1, but you will supply the model files",
    productKind: "standard",
    supplyMode: "user-supplied",
  },
  {
    label: "Chatterbox (Turbo, User Supplied): Same as Option 2, but you will supply files",
    productKind: "turbo",
    supplyMode: "user-supplied",
  },
];

const BACKEND_OPTIONS: ReadonlyArray<{ label: string; backend: Backend }> = [
  {
    label:
      "CPU: Choose this if you do not have a GPU or want to only use your CPU, CPU generation may be very slow on older/low power CPUs",
    backend: "cpu",
  },
  { label: "AMD (ROCm): Linux Only, AMD RX 6000 Series and newer", backend: "rocm" },
  { label: "Nvidia (CUDA): RTX 30 and newer only", backend: "cuda" },
];

export const BACKEND_LABELS: Record<Backend, string> = {
  cpu: "CPU",
  rocm: "AMD (ROCm)",
  cuda: "Nvidia (CUDA)",
};

export const PRODUCT_LABELS: Record<ProductKind, string> = {
  standard: "Original",
  turbo: "Turbo",
};

function pick<T>(options: readonly T[], choice: number): T {
  const option = options[choice - 1];
  if (option === undefined) {
    throw new RangeError(`Menu choice ${choice} is out of range.`);
  }
  return option;
}

export async function selectVariant(
  io: PromptIO,
): Promise<{ productKind: ProductKind; supplyMode: SupplyMode }> {
  io.write("Available Models:\n");
  const choice = await choose(
    io,
    "",
    VARIANT_OPTIONS.map((option) => option.label),
  );
  const { productKind, supplyMode } = pick(VARIANT_OPTIONS, choice);
  return { productKind, supplyMode };
}

export async function selectBackend(io: PromptIO): Promise<Backend> {
  const choice = await choose(
    io,
    "",
    BACKEND_OPTIONS.map((option) => option.label),
  );
  return pick(BACKEND_OPTIONS, choice).backend;
}

/**
 * Re-enter-or-cancel loop around the supplied-asset check. Returns the validated directory.
 */
export async function collectSuppliedDirectory(
  io: PromptIO,
  expected: readonly string[],
): Promise<string> {
  io.write("\nRequired files:");
  for (const filename of expected) {
    io.write(`  - ${filename}`);
  }

  while (true) {
    const directory = await askDirectory(io, "\nEnter the full path to your model folder: ");
    const result = await validateSuppliedAssets(directory, expected);
    if (result.ok) {
      io.write("✓ All files present");
      return directory;
    }

    io.write(`✗ ${result.reason}`);
    if (!(await confirm(io, "Try again?"))) {
      throw new ProvisionCancelled();
    }
  }
}

export async function confirmDownload(io: PromptIO): Promise<void> {
  io.write(
    "⚠️  These files are large and may incur data charges if you don't have an unlimited plan.",
  );
  if (!(await confirm(io, "Continue?"))) {
    throw new ProvisionCancelled();
  }
}
