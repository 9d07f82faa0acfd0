/**
 * Where menu answers come from: the terminal, or a script for automation and tests.
 */

import { createInterface } from "readline/promises";
import { stdin as input, stdout as output } from "process";
import { z } from "zod";
import { BootstrapError } from "../bootstrap/errors.js";

export interface PromptProvider {
  question(message: string): Promise<string>;
}

/** JSON array of answers, consumed in order; numbers are accepted for convenience */
export const PROMPT_ANSWERS_ENV = "SMARTMEMO_PROMPT_ANSWERS";

const scriptedAnswersSchema = z.array(z.union([z.string(), z.number().transform(String)]));

export function createTerminalPromptProvider(): PromptProvider {
  return {
    async question(message) {
      const rl = createInterface({ input, output });
      try {
        return await rl.question(message);
      } finally {
        rl.close();
      }
    },
  };
}

/**
 * Answers from a fixed list, then empty strings once it runs out.
 */
export function createScriptedPromptProvider(answers: readonly string[]): PromptProvider {
  const queue = [...answers];
  return {
    async question() {
      return queue.shift() ?? "";
    },
  };
}

/**
 * @throws BootstrapError with code ConfigInvalid when the value is not a JSON array of answers
 */
export function parseScriptedAnswers(raw: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new BootstrapError(
      "ConfigInvalid",
      `${PROMPT_ANSWERS_ENV} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = scriptedAnswersSchema.safeParse(value);
  if (!parsed.success) {
    throw new BootstrapError("ConfigInvalid", `${PROMPT_ANSWERS_ENV} must be a JSON array of answers`);
  }
  return parsed.data;
}

let override: PromptProvider | null = null;

/** Replace the prompt for library callers; null restores the default */
export function setPromptProvider(provider: PromptProvider | null): void {
  override = provider;
}

/**
 * The provider for this process: an override, then scripted answers from the
 * environment, then the terminal.
 */
export function getPromptProvider(env: NodeJS.ProcessEnv = process.env): PromptProvider {
  if (override) {
    return override;
  }

  const scripted = env[PROMPT_ANSWERS_ENV];
  if (scripted) {
    override = createScriptedPromptProvider(parseScriptedAnswers(scripted));
    return override;
  }

  return createTerminalPromptProvider();
}
