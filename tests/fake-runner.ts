/**
 * In-process stand-in for the child process runner
 */

import type { ProcessRunner, RunOptions, RunResult } from "../src/process/runner.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = (call: RecordedCall) => Partial<RunResult> | undefined;

export interface FakeRunner extends ProcessRunner {
  calls: RecordedCall[];
  /** Calls whose command is the given binary */
  callsTo(command: string): RecordedCall[];
}

/**
 * Every call succeeds with empty output unless a responder returns something else.
 * Responders are consulted in order; the first defined answer wins.
 */
export function createFakeRunner(...responders: Responder[]): FakeRunner {
  const calls: RecordedCall[] = [];

  return {
    calls,
    callsTo(command) {
      return calls.filter((call) => call.command === command);
    },
    async run(command, args, options = {}) {
      const call: RecordedCall = { command, args: [...args], options };
      calls.push(call);
      const answer = responders.map((responder) => responder(call)).find((result) => result !== undefined);
      return { code: 0, stdout: "", stderr: "", timedOut: false, ...answer };
    },
  };
}

/** Answer calls matching `command` and the leading `args` */
export function when(command: string, args: string[], result: Partial<RunResult>): Responder {
  return (call) =>
    call.command === command && args.every((arg, i) => call.args[i] === arg) ? result : undefined;
}

/** `docker container inspect` reports no such container */
export const noExistingContainer = when("docker", ["container", "inspect"], {
  code: 1,
  stderr: "Error: No such container: smartmemo-postgres",
});
