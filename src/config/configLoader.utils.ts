import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ZodError } from "zod";
import { ConfigurationError } from "../errors/AnalysisError.js";
import {
  type AnalyzerConfig,
  type AnalyzerConfigInput,
  AnalyzerConfigSchema,
} from "./Config.schemas.js";

/**
 * Supported config file name, looked up in the project root.
 */
export const CONFIG_FILE_NAME = "code-census.config.json" as const;

/**
 * Render zod issues as "path: message" lines.
 */
const formatZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

/**
 * Validate a raw config object and fill in defaults.
 *
 * @throws ConfigurationError if the structure is invalid
 */
export const resolveConfig = (input: unknown): AnalyzerConfig => {
  try {
    return AnalyzerConfigSchema.parse(input);
  } catch (e) {
    if (e instanceof ZodError) {
      throw new ConfigurationError(`Invalid config: ${formatZodError(e)}`, {
        cause: e,
      });
    }
    throw e;
  }
};

/**
 * Type-safe helper for building a config in code (tests, embedding).
 */
export const defineConfig = (input: AnalyzerConfigInput = {}): AnalyzerConfig =>
  resolveConfig(input);

/**
 * Parse and validate config content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string from config file
 * @throws ConfigurationError if JSON or structure is invalid
 */
export const parseConfig = (content: string): AnalyzerConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new ConfigurationError("Invalid JSON");
  }

  return resolveConfig(rawConfig);
};

/**
 * Load and validate a JSON config file.
 * Thin I/O wrapper around parseConfig.
 */
export const loadConfig = (configPath: string): AnalyzerConfig => {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  try {
    return parseConfig(readFileSync(configPath, "utf-8"));
  } catch (e) {
    if (e instanceof ConfigurationError && e.message === "Invalid JSON") {
      throw new ConfigurationError(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }
};

/**
 * Result type for loadConfigOrDefault indicating how config was obtained.
 */
export type ConfigResult = {
  config: AnalyzerConfig;
  source: "explicit" | "default";
  configPath?: string;
};

/**
 * Load config from the project root, falling back to defaults.
 *
 * Priority:
 * 1. Explicit path passed by the caller (must exist)
 * 2. code-census.config.json in the project root
 * 3. Built-in defaults
 */
export const loadConfigOrDefault = (
  projectRoot: string,
  explicitPath?: string,
): ConfigResult => {
  if (explicitPath !== undefined) {
    return {
      config: loadConfig(explicitPath),
      source: "explicit",
      configPath: explicitPath,
    };
  }

  const configPath = join(projectRoot, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    return { config: loadConfig(configPath), source: "explicit", configPath };
  }

  return { config: defineConfig(), source: "default" };
};
