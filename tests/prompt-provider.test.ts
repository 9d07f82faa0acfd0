import { describe, it, expect, afterEach } from "vitest";
import {
  PROMPT_ANSWERS_ENV,
  createScriptedPromptProvider,
  getPromptProvider,
  parseScriptedAnswers,
  setPromptProvider,
} from "../src/cli/prompt-provider.js";

describe("parseScriptedAnswers", () => {
  it("accepts strings and numbers", () => {
    expect(parseScriptedAnswers('["2", 3]')).toEqual(["2", "3"]);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseScriptedAnswers("[1,")).toThrowError(
      expect.objectContaining({ code: "ConfigInvalid", message: expect.stringMatching(/^SMARTMEMO_PROMPT_ANSWERS is not valid JSON: /) }),
    );
  });

  it("rejects anything but an array of answers", () => {
    expect(() => parseScriptedAnswers('{"choice": "1"}')).toThrow(
      "SMARTMEMO_PROMPT_ANSWERS must be a JSON array of answers",
    );
  });
});

describe("getPromptProvider", () => {
  afterEach(() => {
    setPromptProvider(null);
  });

  it("answers from the environment in order, then with empty strings", async () => {
    const prompt = getPromptProvider({ [PROMPT_ANSWERS_ENV]: '["1", "2"]' });

    expect(await prompt.question("Enter choice [1-3]: ")).toBe("1");
    expect(await getPromptProvider().question("Enter choice [1-3]: ")).toBe("2");
    expect(await prompt.question("Enter choice [1-3]: ")).toBe("");
  });

  it("prefers an explicit provider", async () => {
    setPromptProvider(createScriptedPromptProvider(["3"]));

    const prompt = getPromptProvider({ [PROMPT_ANSWERS_ENV]: '["1"]' });

    expect(await prompt.question("Enter choice [1-3]: ")).toBe("3");
  });
});
