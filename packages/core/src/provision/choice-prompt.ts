import { createInterface, type Interface } from "node:readline/promises";
import { ProvisionCancelled } from "./errors.js";

/**
 * Line-oriented terminal I/O used by every menu.
 * `ask` rejects with {@link ProvisionCancelled} once the user interrupts or input ends.
 */
export interface PromptIO {
  ask(question: string): Promise<string>;
  write(line: string): void;
  close(): void;
}

/**
 * Terminal prompt. Readline (and with it raw mode on a TTY) is only opened by the first
 * `ask` and is released by `close`.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): PromptIO {
  const controller = new AbortController();
  let rl: Interface | undefined;
  let closed = false;

  const open = (): Interface => {
    if (!rl) {
      rl = createInterface({ input, output });
      rl.on("SIGINT", () => controller.abort());
      rl.on("close", () => controller.abort());
    }
    return rl;
  };

  return {
    async ask(question) {
      if (closed || controller.signal.aborted) {
        throw new ProvisionCancelled();
      }
      try {
        return await open().question(question, { signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new ProvisionCancelled();
        }
        throw error;
      }
    },
    write(line) {
      output.write(`${line}\n`);
    },
    close() {
      if (!closed) {
        closed = true;
        rl?.close();
      }
    },
  };
}

function parseChoice(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Numbered menu. Loops until a number in `1..options.length` is entered.
 */
export async function choose(
  io: PromptIO,
  prompt: string,
  options: readonly string[],
): Promise<number> {
  if (options.length === 0) {
    throw new Error("choose() needs at least one option.");
  }

  while (true) {
    if (prompt) {
      io.write(prompt);
    }
    options.forEach((option, index) => {
      io.write(`${index + 1}. ${option}`);
    });

    const choice = parseChoice(await io.ask("\nEnter your choice (number): "));
    if (choice === null) {
      io.write("✗ Please enter a valid number");
      continue;
    }
    if (choice < 1 || choice > options.length) {
      io.write(`✗ Please enter a number between 1 and ${options.length}`);
      continue;
    }
    return choice;
  }
}

export async function confirm(io: PromptIO, question: string): Promise<boolean> {
  const answer = await io.ask(`${question} (y/n): `);
  return answer.trim().toLowerCase() === "y";
}

/** Strips one pair of matching surrounding quotes, as pasted from a file manager. */
export function stripSurroundingQuotes(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

export async function askDirectory(io: PromptIO, prompt: string): Promise<string> {
  return stripSurroundingQuotes(await io.ask(prompt));
}
