/**
 * CLI integration tests
 */

import { describe, it, expect, beforeEach, afterAll } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import { execFile } from "child_process";
import Database from "better-sqlite3";
import { createRequire } from "module";

const require = createRequire(import.meta.url);
const tsxLoader = require.resolve("tsx").replace(/\\/g, "/");
const cliPath = path.join(process.cwd(), "src", "cli", "index.ts");
const TEST_DIR = path.join(process.cwd(), "tests", "cli-test");

interface CliResult {
  code: number;
  stdout: string;
  stderr: string;
}

function runCli(args: string[], cwd: string, extraEnv: Record<string, string> = {}): Promise<CliResult> {
  return new Promise((resolve) => {
    execFile(
      process.execPath,
      ["--import", tsxLoader, cliPath, "--no-ui", ...args],
      { cwd, env: { ...process.env, FORCE_COLOR: "0", ...extraEnv } },
      (error, stdout, stderr) => {
        const code = error && typeof error.code === "number" ? error.code : error ? 1 : 0;
        resolve({ code, stdout, stderr });
      },
    );
  });
}

describe("smartmemo-setup CLI", () => {
  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it("exits 1 on an invalid menu answer", async () => {
    const result = await runCli([], TEST_DIR, { SMARTMEMO_PROMPT_ANSWERS: '["9"]' });

    expect(result.code).toBe(1);
    expect(result.stderr.trim()).toBe('✗ Invalid choice "9". Enter 1, 2 or 3.');
    expect(result.stdout).toBe("");
  });

  it("sets up a SQLite database and runs the application", async () => {
    const migrations = path.join(process.cwd(), "migration");
    await fs.writeFile(
      path.join(TEST_DIR, "smartmemo.config.mjs"),
      `export default ${JSON.stringify({
        migrations: { directory: migrations },
        application: { command: [process.execPath, "-e", "console.log(process.env.DATABASE_URL)"] },
      })};\n`,
      "utf-8",
    );

    const result = await runCli(["--backend", "2"], TEST_DIR);

    expect(result.code).toBe(0);
    expect(result.stdout).toContain("sqlite://./memo.db?mode=rwc\n");
    expect(result.stdout.trim().split("\n").at(-1)).toBe("✓ Setup complete");

    const db = new Database(path.join(TEST_DIR, "memo.db"), { readonly: true });
    try {
      const row: unknown = db.prepare("SELECT count(*) AS count FROM sqlite_master WHERE name = 'voice_memos1'").get();
      expect(row).toEqual({ count: 1 });
    } finally {
      db.close();
    }
  });

  it("exits 1 when an explicit config file is missing", async () => {
    const result = await runCli(["--backend", "2", "--config", "absent.config.ts"], TEST_DIR);

    expect(result.code).toBe(1);
    expect(result.stderr.trim()).toBe("✗ Config file not found: absent.config.ts");
  });

  it("lists the backends in --help", async () => {
    const result = await runCli(["--help"], TEST_DIR);

    expect(result.code).toBe(0);
    expect(result.stdout).toContain("-b, --backend <choice>");
    expect(result.stdout).toContain("  2  SQLite file");
    expect(result.stdout).toContain(
      "Run from the Smart Memo API checkout: migrations and the application command\n" +
        "(default: npm start) run in the current directory.",
    );
  });
});
