import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { expectedFilenames } from "./asset-manifest.js";
import { ProvisionCancelled } from "./errors.js";
import {
  collectSuppliedDirectory,
  confirmDownload,
  selectBackend,
  selectVariant,
} from "./menus.js";
import { createScriptedPrompt } from "./prompt.test-utils.js";

let workDir: string;

async function populate(dir: string, names: readonly string[]): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), "weights");
  }
}

describe("selectVariant", () => {
  it.each([
    ["1", { productKind: "standard", supplyMode: "download" }],
    ["2", { productKind: "turbo", supplyMode: "download" }],
    ["3", { productKind: "standard", supplyMode: "user-supplied" }],
    ["4", { productKind: "turbo", supplyMode: "user-supplied" }],
  ])("maps choice %s", async (answer, expected) => {
    await expect(selectVariant(createScriptedPrompt([answer]))).resolves.toEqual(expected);
  });
});

describe("selectBackend", () => {
  it.each([
    ["1", "cpu"],
    ["2", "rocm"],
    ["3", "cuda"],
  ])("maps choice %s to %s", async (answer, backend) => {
    await expect(selectBackend(createScriptedPrompt([answer]))).resolves.toBe(backend);
  });
});

describe("collectSuppliedDirectory", () => {
  const turbo = expectedFilenames("turbo");

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "tts-menus-"));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("re-prompts after a folder missing vocab.json", async () => {
    const incomplete = path.join(workDir, "incomplete");
    const complete = path.join(workDir, "complete");
    await populate(
      incomplete,
      turbo.filter((name) => name !== "vocab.json"),
    );
    await populate(complete, turbo);

    const io = createScriptedPrompt([incomplete, "y", `"${complete}"`]);
    await expect(collectSuppliedDirectory(io, turbo)).resolves.toBe(complete);

    expect(io.output).toContain("✗ Missing files: vocab.json");
    expect(io.output).toContain("✓ All files present");
    expect(
      io.questions.filter((question) => question.includes("full path to your model folder")),
    ).toHaveLength(2);
  });

  it("cancels when the user declines to retry", async () => {
    const io = createScriptedPrompt([path.join(workDir, "nowhere"), "n"]);

    await expect(collectSuppliedDirectory(io, turbo)).rejects.toBeInstanceOf(ProvisionCancelled);
    expect(io.output).toContain("✗ Folder does not exist or is not a directory");
  });

  it("lists the required files before asking", async () => {
    const io = createScriptedPrompt([]);
    await expect(collectSuppliedDirectory(io, ["a.bin", "b.json"])).rejects.toBeInstanceOf(
      ProvisionCancelled,
    );
    expect(io.output).toEqual(["\nRequired files:", "  - a.bin", "  - b.json"]);
  });
});

describe("confirmDownload", () => {
  it("continues on y and cancels otherwise", async () => {
    await expect(confirmDownload(createScriptedPrompt(["y"]))).resolves.toBeUndefined();
    await expect(confirmDownload(createScriptedPrompt(["n"]))).rejects.toBeInstanceOf(
      ProvisionCancelled,
    );
  });
});
