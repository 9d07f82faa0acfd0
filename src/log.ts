import chalk from "chalk";

export type LogLevel = "info" | "success" | "error" | "warning";

export type LogFn = (type: LogLevel, message: string) => void;

export const LOG_SYMBOLS: Record<LogLevel, string> = {
  info: "ℹ",
  success: "✓",
  error: "✗",
  warning: "⚠",
};

const LOG_COLORS: Record<LogLevel, (text: string) => string> = {
  info: chalk.blue,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
};

/**
 * Plain-text logger used when the ink UI is disabled. Errors go to stderr.
 */
export function createConsoleLogger(): LogFn {
  return (type, message) => {
    const line = LOG_COLORS[type](`${LOG_SYMBOLS[type]} ${message}`);
    if (type === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}
