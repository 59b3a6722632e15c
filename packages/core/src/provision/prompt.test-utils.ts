import type { PromptIO } from "./choice-prompt.js";
import { ProvisionCancelled } from "./errors.js";

export interface ScriptedPrompt extends PromptIO {
  readonly questions: string[];
  readonly output: string[];
  readonly closed: boolean;
}

/** Answers questions from `answers` in order; running out behaves like closed input. */
export function createScriptedPrompt(answers: string[]): ScriptedPrompt {
  const pending = [...answers];
  const questions: string[] = [];
  const output: string[] = [];
  let closed = false;

  return {
    questions,
    output,
    get closed() {
      return closed;
    },
    async ask(question) {
      questions.push(question);
      const answer = pending.shift();
      if (answer === undefined) {
        throw new ProvisionCancelled();
      }
      return answer;
    },
    write(line) {
      output.push(line);
    },
    close() {
      closed = true;
    },
  };
}
