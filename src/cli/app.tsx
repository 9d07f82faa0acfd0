/**
 * smartmemo-setup CLI - pick a database backend for the Smart Memo API,
 * provision it, run the migrations and start the application once.
 */

import React, { useEffect, useState } from "react";
import { render, Box, Text, useApp } from "ink";
import { Command } from "commander";
import { BACKEND_OPTIONS } from "../bootstrap/backends.js";
import { BootstrapError } from "../bootstrap/errors.js";
import type { BootstrapResult } from "../bootstrap/run.js";
import { createConsoleLogger, LOG_SYMBOLS, type LogFn, type LogLevel } from "../log.js";
import { runSetup, type CommandContext, type CommandOptions } from "./commands.js";
import { BackendMenu } from "./prompts.js";

export const VERSION = "0.1.0";

interface ParsedArgs {
  options: CommandOptions;
  ui: boolean;
}

function parseArgs(argv: string[]): ParsedArgs {
  const program = new Command()
    .name("smartmemo-setup")
    .description("Set up the Smart Memo database and check that the API starts")
    .version(VERSION)
    .option("-b, --backend <choice>", "Backend to use without prompting (1, 2 or 3)")
    .option("-c, --config <path>", "Path to smartmemo config file")
    .option("--no-ui", "Disable Ink UI (useful for CI/non-TTY)")
    .addHelpText(
      "after",
      [
        "",
        "Backends:",
        ...BACKEND_OPTIONS.map((option) => `  ${option.choice}  ${option.label}`),
        "",
        "Run from the Smart Memo API checkout: migrations and the application command",
        "(default: npm start) run in the current directory. Set application.command in",
        "smartmemo.config.ts to start the API some other way.",
      ].join("\n"),
    );

  program.parse(argv);
  const opts = program.opts<{ backend?: string; config?: string; ui: boolean }>();

  return {
    options: { backend: opts.backend, config: opts.config },
    ui: opts.ui,
  };
}

// Status component for showing messages
function Status({ type, message }: { type: LogLevel; message: string }) {
  const colors = {
    info: "blue",
    success: "green",
    error: "red",
    warning: "yellow",
  } as const;

  return (
    <Text color={colors[type]}>
      {LOG_SYMBOLS[type]} {message}
    </Text>
  );
}

function reportFailure(err: unknown, log: LogFn): void {
  if (err instanceof BootstrapError) {
    log("error", err.message);
  } else {
    log("error", `Error: ${err instanceof Error ? err.message : String(err)}`);
  }
}

interface SetupAppProps {
  options: CommandOptions;
}

function SetupApp({ options }: SetupAppProps) {
  const { exit } = useApp();
  const [phase, setPhase] = useState<"select" | "running" | "done">(
    options.backend === undefined ? "select" : "running",
  );
  const [choice, setChoice] = useState<string | undefined>(options.backend);
  const [logs, setLogs] = useState<Array<{ type: LogLevel; message: string }>>([]);

  const log: LogFn = (type, message) => {
    setLogs((prev) => [...prev, { type, message }]);
  };

  useEffect(() => {
    if (phase !== "running") return;

    const run = async () => {
      const ctx: CommandContext = {
        cwd: process.cwd(),
        options: { ...options, backend: choice },
        log,
        childStdio: "pipe",
      };

      let result: BootstrapResult | undefined;
      try {
        result = await runSetup(ctx);
      } catch (err) {
        reportFailure(err, log);
      }
      process.exitCode = result?.exitCode ?? 1;
      setPhase("done");
    };

    void run();
  }, [phase]);

  useEffect(() => {
    if (phase === "done") {
      const timer = setTimeout(() => exit(), 100);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [phase, exit]);

  return (
    <Box flexDirection="column" paddingY={1}>
      {phase === "select" && (
        <>
          <Box marginBottom={1}>
            <Text bold color="cyan">smartmemo-setup</Text>
            <Text dimColor> - Smart Memo database setup</Text>
          </Box>
          <BackendMenu
            options={BACKEND_OPTIONS}
            onSelect={(value) => {
              setChoice(value);
              setPhase("running");
            }}
          />
        </>
      )}

      {logs.map((l, i) => (
        <Status key={i} type={l.type} message={l.message} />
      ))}
    </Box>
  );
}

async function runSetupDirect(options: CommandOptions): Promise<void> {
  const log = createConsoleLogger();
  const ctx: CommandContext = {
    cwd: process.cwd(),
    options,
    log,
    childStdio: "inherit",
  };

  try {
    const result = await runSetup(ctx);
    process.exitCode = result.exitCode;
  } catch (err) {
    reportFailure(err, log);
    process.exitCode = 1;
  }
}

// Entry point
export async function runCli(argv: string[] = process.argv): Promise<void> {
  const { options, ui } = parseArgs(argv);
  const isInteractive = Boolean(process.stdout.isTTY && process.stdin.isTTY) && ui;

  if (!isInteractive) {
    await runSetupDirect(options);
    return;
  }

  const { waitUntilExit } = render(<SetupApp options={options} />);
  await waitUntilExit();
}
