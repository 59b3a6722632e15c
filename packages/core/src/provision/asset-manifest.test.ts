import { describe, expect, it } from "vitest";
import {
  ORIGINAL_EXPECTED,
  expectedFilenames,
  filenameFromLocator,
  getManifest,
} from "./asset-manifest.js";

describe("filenameFromLocator", () => {
  it("takes the last path segment and drops the query string", () => {
    expect(
      filenameFromLocator(
        "https://huggingface.co/ResembleAI/chatterbox/resolve/main/t3_cfg.safetensors?download=true",
      ),
    ).toBe("t3_cfg.safetensors");
  });

  it("keeps locators without a query unchanged", () => {
    expect(filenameFromLocator("https://example.test/models/merges.txt")).toBe("merges.txt");
  });

  it("rejects locators that end in a slash", () => {
    expect(() => filenameFromLocator("https://example.test/models/?x=1")).toThrow(
      "Asset locator has no filename",
    );
  });
});

describe("getManifest", () => {
  it("lists the four standard assets in download order", () => {
    expect(ORIGINAL_EXPECTED).toEqual([
      "t3_cfg.safetensors",
      "s3gen.safetensors",
      "tokenizer.json",
      "ve.safetensors",
    ]);
    expect(getManifest("standard")).toHaveLength(4);
  });

  it("lists eleven turbo assets from the turbo repository", () => {
    const manifest = getManifest("turbo");
    expect(manifest).toHaveLength(11);
    expect(manifest.every((entry) => entry.locator.includes("/chatterbox-turbo/"))).toBe(true);
    expect(expectedFilenames("turbo")).toContain("vocab.json");
  });

  it("derives every expected filename from its own locator", () => {
    for (const kind of ["standard", "turbo"] as const) {
      for (const entry of getManifest(kind)) {
        expect(filenameFromLocator(entry.locator)).toBe(entry.expectedFilename);
      }
    }
  });
});
