/**
 * Config file discovery and loading
 *
 * A config file is optional. `loadConfig` always returns a validated config: the file's
 * default export merged over the defaults, or the defaults alone when no file exists.
 */

import * as fs from "fs";
import * as path from "path";
import { pathToFileURL } from "url";
import { createRequire } from "module";
import { BootstrapError } from "../bootstrap/errors.js";
import { resolveConfig, type ResolvedConfig } from "./index.js";

const CONFIG_BASENAME = "smartmemo.config";
const CONFIG_EXTENSIONS = [".ts", ".js", ".mjs", ".cjs"] as const;

export interface LoadedConfig {
  config: ResolvedConfig;
  /** File the config came from; null when the defaults were used */
  configPath: string | null;
}

type ModuleLoader = (file: string) => Promise<unknown>;

const importNative: ModuleLoader = (file) => import(pathToFileURL(file).href);

const requireCommonJs: ModuleLoader = async (file) => createRequire(import.meta.url)(file);

const importWithJiti: ModuleLoader = async (file) => {
  const { default: jiti } = await import("jiti");
  return jiti(import.meta.url, { interopDefault: true })(file);
};

function loaderFor(file: string): ModuleLoader {
  switch (path.extname(file)) {
    case ".cjs":
      return requireCommonJs;
    case ".js":
    case ".mjs":
      return importNative;
    default:
      return importWithJiti;
  }
}

/**
 * Locate the config file: the explicit path when given (which must exist), otherwise
 * the first `smartmemo.config.*` in `cwd`.
 */
export function findConfigFile(cwd: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new BootstrapError("ConfigInvalid", `Config file not found: ${explicitPath}`);
    }
    return resolved;
  }

  for (const ext of CONFIG_EXTENSIONS) {
    const candidate = path.join(cwd, `${CONFIG_BASENAME}${ext}`);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

function defaultExport(mod: unknown): unknown {
  return typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
}

export async function loadConfig(cwd: string, explicitPath?: string): Promise<LoadedConfig> {
  const configPath = findConfigFile(cwd, explicitPath);
  if (!configPath) {
    return { config: resolveConfig(), configPath: null };
  }

  const mod = await loaderFor(configPath)(configPath);
  return { config: resolveConfig(defaultExport(mod)), configPath };
}
