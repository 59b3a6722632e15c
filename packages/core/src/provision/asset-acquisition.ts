import fs from "node:fs/promises";
import path from "node:path";
import { getManifest, expectedFilenames, type AssetManifestEntry } from "./asset-manifest.js";
import { ProvisionError, getErrorMessage } from "./errors.js";
import type { ProgressListener, VariantSelection } from "./types.js";

/** Retrieves `url` into `destination`; rejects on any transport or HTTP failure. */
export type AssetFetcher = (url: string, destination: string) => Promise<void>;
export type AssetCopier = (source: string, destination: string) => Promise<void>;

export interface AcquisitionReport {
  fetched: string[];
  copied: string[];
  skipped: string[];
}

export interface AcquisitionOptions {
  fetcher?: AssetFetcher;
  copier?: AssetCopier;
  onProgress?: ProgressListener;
}

async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function readResponseTextSafe(response: Response): Promise<string> {
  try {
    return (await response.text()).trim();
  } catch {
    return "";
  }
}

export const downloadToFile: AssetFetcher = async (url, destination) => {
  const response = await fetch(url, { headers: { "User-Agent": "tts-provision/0.1" } });
  if (!response.ok) {
    const body = await readResponseTextSafe(response);
    throw new Error(
      body ? `HTTP ${response.status}: ${body.slice(0, 240)}` : `HTTP ${response.status}`,
    );
  }
  if (!response.body) {
    throw new Error("Download stream was empty.");
  }

  let completed = false;
  const fileHandle = await fs.open(destination, "w");
  try {
    const reader = response.body.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        if (value && value.byteLength > 0) {
          await fileHandle.write(value);
        }
      }
    } finally {
      reader.releaseLock();
    }
    completed = true;
  } finally {
    await fileHandle.close();
    if (!completed) {
      await fs.rm(destination, { force: true });
    }
  }
};

const copyWithMetadata: AssetCopier = async (source, destination) => {
  await fs.copyFile(source, destination);
  const stats = await fs.stat(source);
  await fs.utimes(destination, stats.atime, stats.mtime);
};

export async function downloadAssets(
  entries: readonly AssetManifestEntry[],
  modelDir: string,
  options: AcquisitionOptions = {},
): Promise<AcquisitionReport> {
  const fetcher = options.fetcher ?? downloadToFile;
  const report: AcquisitionReport = { fetched: [], copied: [], skipped: [] };
  await fs.mkdir(modelDir, { recursive: true });

  for (const entry of entries) {
    const destination = path.join(modelDir, entry.expectedFilename);
    if (await fileExists(destination)) {
      report.skipped.push(entry.expectedFilename);
      options.onProgress?.({
        phase: "assets-acquired",
        level: "success",
        message: `${entry.expectedFilename} already exists, skipping`,
      });
      continue;
    }

    options.onProgress?.({
      phase: "assets-acquired",
      level: "info",
      message: `📥 Downloading ${entry.expectedFilename}...`,
    });
    try {
      await fetcher(entry.locator, destination);
    } catch (error) {
      throw new ProvisionError(
        `Failed to download ${entry.expectedFilename}: ${getErrorMessage(error)}`,
        "ASSET_FETCH_FAILED",
        "Check your internet connection and run the installer again; finished files are kept.",
      );
    }
    report.fetched.push(entry.expectedFilename);
    options.onProgress?.({
      phase: "assets-acquired",
      level: "success",
      message: `Downloaded ${entry.expectedFilename}`,
    });
  }
  return report;
}

export async function copySuppliedAssets(
  sourceDir: string,
  filenames: readonly string[],
  modelDir: string,
  options: AcquisitionOptions = {},
): Promise<AcquisitionReport> {
  const copier = options.copier ?? copyWithMetadata;
  const report: AcquisitionReport = { fetched: [], copied: [], skipped: [] };
  await fs.mkdir(modelDir, { recursive: true });

  for (const filename of filenames) {
    const source = path.join(sourceDir, filename);
    const destination = path.join(modelDir, filename);
    if ((await fileExists(destination)) || !(await fileExists(source))) {
      report.skipped.push(filename);
      continue;
    }

    try {
      await copier(source, destination);
    } catch (error) {
      throw new ProvisionError(
        `Failed to copy ${filename}: ${getErrorMessage(error)}`,
        "ASSET_COPY_FAILED",
        `Check that ${modelDir} is writable and has enough free space.`,
      );
    }
    report.copied.push(filename);
    options.onProgress?.({
      phase: "assets-acquired",
      level: "success",
      message: `Copied ${filename}`,
    });
  }
  return report;
}

export async function acquireAssets(
  selection: VariantSelection,
  modelDir: string,
  options: AcquisitionOptions = {},
): Promise<AcquisitionReport> {
  if (selection.supplyMode === "user-supplied") {
    if (!selection.suppliedDir) {
      throw new ProvisionError(
        "No model folder was supplied.",
        "ASSETS_INVALID",
        "Run the installer again and enter the folder that holds the model files.",
      );
    }
    return copySuppliedAssets(
      selection.suppliedDir,
      expectedFilenames(selection.productKind),
      modelDir,
      options,
    );
  }
  return downloadAssets(getManifest(selection.productKind), modelDir, options);
}
