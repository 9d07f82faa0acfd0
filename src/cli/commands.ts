/**
 * Command implementations for the smartmemo-setup CLI
 *
 * These functions contain the core logic and can be tested independently
 * from the CLI/UI layer.
 */

import { BACKEND_OPTIONS, type BackendOption } from "../bootstrap/backends.js";
import { runBootstrap, type BootstrapDependencies, type BootstrapResult } from "../bootstrap/run.js";
import type { ResolvedConfig } from "../config/index.js";
import { loadConfig } from "../config/loader.js";
import type { LogFn } from "../log.js";
import { getPromptProvider, type PromptProvider } from "./prompt-provider.js";

export interface CommandOptions {
  /** Menu answer given on the command line; skips the prompt */
  backend?: string;
  config?: string;
}

export interface CommandContext {
  cwd: string;
  options: CommandOptions;
  log: LogFn;
  /** Interactive backend picker. Falls back to a plain-text prompt when absent. */
  promptBackend?: (options: readonly BackendOption[]) => Promise<string>;
  prompt?: PromptProvider;
  childStdio?: "inherit" | "pipe";
  deps?: Partial<BootstrapDependencies>;
}

export function formatBackendMenu(options: readonly BackendOption[] = BACKEND_OPTIONS): string {
  const lines = [
    "Select a database backend:",
    ...options.map((option) => `  ${option.choice}) ${option.label.padEnd(26)} ${option.description}`),
    "",
    `Enter choice [1-${options.length}]: `,
  ];
  return lines.join("\n");
}

/**
 * Load, validate and default the config file for this run.
 */
export async function loadSetupConfig(ctx: CommandContext): Promise<ResolvedConfig> {
  const { config, configPath } = await loadConfig(ctx.cwd, ctx.options.config);
  if (configPath) {
    ctx.log("info", `Using config ${configPath}`);
  }
  return config;
}

/**
 * setup command: the whole bootstrap run
 */
export async function runSetup(ctx: CommandContext): Promise<BootstrapResult> {
  const config = await loadSetupConfig(ctx);

  const chooseBackend = async (): Promise<string> => {
    if (ctx.options.backend !== undefined) {
      return ctx.options.backend;
    }
    if (ctx.promptBackend) {
      return ctx.promptBackend(BACKEND_OPTIONS);
    }
    const prompt = ctx.prompt ?? getPromptProvider();
    return prompt.question(formatBackendMenu());
  };

  return runBootstrap({
    cwd: ctx.cwd,
    config,
    chooseBackend,
    log: ctx.log,
    childStdio: ctx.childStdio,
    deps: ctx.deps,
  });
}
