import { Command } from "commander";
import { readFileSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import {
  createTerminalPrompt,
  getErrorMessage,
  runProvisioner,
  type PromptIO,
} from "../../packages/core/src/index.js";
import { createProgressRenderer, formatHeader } from "./terminal.js";

export interface ProvisionCommandDeps {
  io?: PromptIO;
  write?: (line: string) => void;
  entryScript?: string;
}

function readPackageVersion(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(moduleDir, "../../package.json"),
    path.resolve(moduleDir, "../../../package.json"),
  ];

  for (const candidate of candidates) {
    try {
      const parsed = JSON.parse(readFileSync(candidate, "utf8")) as { version?: unknown };
      if (typeof parsed.version === "string" && parsed.version.trim().length > 0) {
        return parsed.version;
      }
    } catch {
      // keep searching
    }
  }

  return "0.0.0";
}

export async function runProvisionCommand(deps: ProvisionCommandDeps = {}): Promise<number> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const io = deps.io ?? createTerminalPrompt();

  try {
    const result = await runProvisioner({
      io,
      entryScript: deps.entryScript ?? process.argv[1] ?? "",
      onProgress: createProgressRenderer(write),
    });

    if (result.status === "complete") {
      for (const line of result.summary) {
        write(line);
      }
      for (const line of formatHeader("Thank you for installing Chatterbox-TTS!")) {
        write(line);
      }
    }
    return result.exitCode;
  } finally {
    io.close();
  }
}

export function buildProgram(onExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name("tts-provision")
    .description(
      "Interactive installer for a local Chatterbox text-to-speech runtime (Windows and Linux)",
    )
    .version(readPackageVersion())
    .action(async () => {
      onExitCode(await runProvisionCommand());
    });
  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  process.on("uncaughtException", (error) => {
    console.error(`✗ Installation failed: ${getErrorMessage(error)}`);
    process.exit(1);
  });

  let exitCode = 0;
  const program = buildProgram((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(`✗ Installation failed: ${getErrorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
  return exitCode;
}
