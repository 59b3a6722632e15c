import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import {
  acquireAssets,
  copySuppliedAssets,
  downloadAssets,
  downloadToFile,
  type AssetFetcher,
} from "./asset-acquisition.js";
import { ORIGINAL_EXPECTED, expectedFilenames, getManifest } from "./asset-manifest.js";

let workDir: string;
let modelDir: string;

async function touch(dir: string, names: readonly string[]): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), `contents of ${name}`);
  }
}

function recordingFetcher(): Mock<AssetFetcher> {
  return vi.fn<AssetFetcher>(async (_url, destination) => {
    await fs.writeFile(destination, "weights");
  });
}

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), "tts-assets-"));
  modelDir = path.join(workDir, "Model");
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await fs.rm(workDir, { recursive: true, force: true });
});

describe("downloadAssets", () => {
  it("fetches every missing file in manifest order", async () => {
    const fetcher = recordingFetcher();

    const report = await downloadAssets(getManifest("standard"), modelDir, { fetcher });

    expect(report).toEqual({ fetched: [...ORIGINAL_EXPECTED], copied: [], skipped: [] });
    expect(fetcher.mock.calls).toEqual(
      getManifest("standard").map((entry) => [
        entry.locator,
        path.join(modelDir, entry.expectedFilename),
      ]),
    );
  });

  it("fetches nothing when every file is already present", async () => {
    await touch(modelDir, ORIGINAL_EXPECTED);
    const fetcher = recordingFetcher();
    const onProgress = vi.fn();

    const report = await downloadAssets(getManifest("standard"), modelDir, {
      fetcher,
      onProgress,
    });

    expect(fetcher).not.toHaveBeenCalled();
    expect(report.skipped).toEqual([...ORIGINAL_EXPECTED]);
    expect(onProgress).toHaveBeenCalledWith({
      phase: "assets-acquired",
      level: "success",
      message: "t3_cfg.safetensors already exists, skipping",
    });
  });

  it("only fetches the files that are missing", async () => {
    await touch(modelDir, ["t3_cfg.safetensors", "tokenizer.json"]);
    const fetcher = recordingFetcher();

    const report = await downloadAssets(getManifest("standard"), modelDir, { fetcher });

    expect(report.fetched).toEqual(["s3gen.safetensors", "ve.safetensors"]);
    expect(report.skipped).toEqual(["t3_cfg.safetensors", "tokenizer.json"]);
  });

  it("fails fatally when a fetch fails and keeps earlier files", async () => {
    const fetcher = vi.fn<AssetFetcher>(async (url, destination) => {
      if (url.includes("s3gen")) {
        throw new Error("HTTP 503");
      }
      await fs.writeFile(destination, "weights");
    });

    await expect(
      downloadAssets(getManifest("standard"), modelDir, { fetcher }),
    ).rejects.toMatchObject({
      code: "ASSET_FETCH_FAILED",
      severity: "fatal",
      message: "Failed to download s3gen.safetensors: HTTP 503",
    });
    expect(fetcher).toHaveBeenCalledTimes(2);
    await expect(fs.readdir(modelDir)).resolves.toEqual(["t3_cfg.safetensors"]);
  });
});

describe("copySuppliedAssets", () => {
  it("copies each expected file and skips them on a re-run", async () => {
    const sourceDir = path.join(workDir, "supplied");
    await touch(sourceDir, ORIGINAL_EXPECTED);

    const first = await copySuppliedAssets(sourceDir, ORIGINAL_EXPECTED, modelDir);
    const second = await copySuppliedAssets(sourceDir, ORIGINAL_EXPECTED, modelDir);

    expect(first.copied).toEqual([...ORIGINAL_EXPECTED]);
    expect(second).toEqual({ fetched: [], copied: [], skipped: [...ORIGINAL_EXPECTED] });
    await expect(fs.readFile(path.join(modelDir, "tokenizer.json"), "utf8")).resolves.toBe(
      "contents of tokenizer.json",
    );
  });

  it("preserves the source modification time", async () => {
    const sourceDir = path.join(workDir, "supplied");
    await touch(sourceDir, ["ve.safetensors"]);
    const stamp = new Date("2024-03-01T12:00:00Z");
    await fs.utimes(path.join(sourceDir, "ve.safetensors"), stamp, stamp);

    await copySuppliedAssets(sourceDir, ["ve.safetensors"], modelDir);

    const copied = await fs.stat(path.join(modelDir, "ve.safetensors"));
    expect(copied.mtime.getTime()).toBe(stamp.getTime());
  });

  it("turns a copy failure into ASSET_COPY_FAILED", async () => {
    const sourceDir = path.join(workDir, "supplied");
    await touch(sourceDir, ["vocab.json"]);
    const copier = vi.fn(async () => {
      throw new Error("ENOSPC: no space left on device");
    });

    await expect(
      copySuppliedAssets(sourceDir, ["vocab.json"], modelDir, { copier }),
    ).rejects.toMatchObject({
      code: "ASSET_COPY_FAILED",
      message: "Failed to copy vocab.json: ENOSPC: no space left on device",
    });
  });
});

describe("acquireAssets", () => {
  it("copies the turbo set for a user-supplied selection", async () => {
    const sourceDir = path.join(workDir, "turbo");
    await touch(sourceDir, expectedFilenames("turbo"));

    const report = await acquireAssets(
      { productKind: "turbo", supplyMode: "user-supplied", backend: "cpu", suppliedDir: sourceDir },
      modelDir,
    );

    expect(report.copied).toEqual(expectedFilenames("turbo"));
  });

  it("downloads the manifest for a download selection", async () => {
    const fetcher = recordingFetcher();

    await acquireAssets({ productKind: "turbo", supplyMode: "download", backend: "cuda" }, modelDir, {
      fetcher,
    });

    expect(fetcher).toHaveBeenCalledTimes(11);
  });

  it("rejects a user-supplied selection without a folder", async () => {
    await expect(
      acquireAssets({ productKind: "standard", supplyMode: "user-supplied", backend: "cpu" }, modelDir),
    ).rejects.toMatchObject({ code: "ASSETS_INVALID" });
  });
});

describe("downloadToFile", () => {
  it("streams the response body to disk", async () => {
    const fetchMock = vi.fn(async () => new Response("model-bytes", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    await fs.mkdir(modelDir, { recursive: true });
    const destination = path.join(modelDir, "tokenizer.json");

    await downloadToFile("https://models.example.test/tokenizer.json", destination);

    await expect(fs.readFile(destination, "utf8")).resolves.toBe("model-bytes");
    expect(fetchMock).toHaveBeenCalledWith("https://models.example.test/tokenizer.json", {
      headers: { "User-Agent": "tts-provision/0.1" },
    });
  });

  it("reports the HTTP status and writes no file", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("not found", { status: 404 })));
    await fs.mkdir(modelDir, { recursive: true });
    const destination = path.join(modelDir, "vocab.json");

    await expect(
      downloadToFile("https://models.example.test/vocab.json", destination),
    ).rejects.toThrow("HTTP 404: not found");
    await expect(fs.access(destination)).rejects.toThrow();
  });
});
