import type { ProductKind } from "./types.js";

const STANDARD_REPO_URL = "https://huggingface.co/ResembleAI/chatterbox/resolve/main";
const TURBO_REPO_URL = "https://huggingface.co/ResembleAI/chatterbox-turbo/resolve/main";

export interface AssetManifestEntry {
  locator: string;
  expectedFilename: string;
}

function resolveLocator(repoUrl: string, filename: string): string {
  return `${repoUrl}/${filename}?download=true`;
}

const STANDARD_LOCATORS: readonly string[] = [
  "t3_cfg.safetensors",
  "s3gen.safetensors",
  "tokenizer.json",
  "ve.safetensors",
].map((filename) => resolveLocator(STANDARD_REPO_URL, filename));

const TURBO_LOCATORS: readonly string[] = [
  "s3gen.safetensors",
  "conds.pt",
  "added_tokens.json",
  "s3gen_meanflow.safetensors",
  "special_tokens_map.json",
  "t3_turbo_v1.safetensors",
  "t3_turbo_v1.yaml",
  "tokenizer_config.json",
  "ve.safetensors",
  "vocab.json",
  "merges.txt",
].map((filename) => resolveLocator(TURBO_REPO_URL, filename));

/**
 * Local filename for a remote locator: the final path segment, query string dropped.
 */
export function filenameFromLocator(locator: string): string {
  const withoutQuery = locator.split("?")[0] ?? "";
  const segment = withoutQuery.split("/").at(-1) ?? "";
  if (segment.trim().length === 0) {
    throw new Error(`Asset locator has no filename: ${locator}`);
  }
  return segment;
}

export function getManifest(kind: ProductKind): AssetManifestEntry[] {
  const locators = kind === "turbo" ? TURBO_LOCATORS : STANDARD_LOCATORS;
  return locators.map((locator) => ({
    locator,
    expectedFilename: filenameFromLocator(locator),
  }));
}

export function expectedFilenames(kind: ProductKind): string[] {
  return getManifest(kind).map((entry) => entry.expectedFilename);
}

/** Expected files of the "Original" (standard) product. */
export const ORIGINAL_EXPECTED: readonly string[] = expectedFilenames("standard");
