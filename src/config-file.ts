/**
 * Configuration file support for dockerfile-kit.
 *
 * Loads render defaults from dockerfile-kit.yaml or .dockerfilekitrc files.
 *
 * Config file locations (later entries override earlier ones):
 *   1. ~/.dockerfile-kit/config.yaml (global)
 *   2. ./dockerfile-kit.yaml, ./dockerfile-kit.yml or ./.dockerfilekitrc (project)
 *
 * CLI flags take precedence over both.
 *
 * Dependency direction:
 *   This module imports from: errors.ts, logger.ts
 *   It should NOT import from: cli, recipe-loader
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { ConfigError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";

export type LineEndingName = "lf" | "crlf";

/** Terminator stored after each Dockerfile line, per config name. */
export const LINE_ENDINGS: Record<LineEndingName, string> = {
  lf: "\n",
  crlf: "\r\n",
};

/**
 * dockerfile-kit configuration options.
 * All fields are optional.
 */
export interface KitConfig {
  /** `# syntax:` parser directive for recipes that set none */
  syntax?: string;
  /** `# escape:` parser directive for recipes that set none */
  escape?: string;
  lineEnding?: LineEndingName;
  /** Default output file (stdout when unset) */
  output?: string;
}

export const PROJECT_CONFIG_FILES = ["dockerfile-kit.yaml", "dockerfile-kit.yml", ".dockerfilekitrc"];
export const GLOBAL_CONFIG_PATH = join(homedir(), ".dockerfile-kit", "config.yaml");

const KNOWN_KEYS = new Set(["syntax", "escape", "lineEnding", "output"]);

/**
 * Parse YAML-like config (flat `key: value` lines).
 * Comments and blank lines are skipped; surrounding quotes are removed.
 */
export function parseSimpleYaml(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    const key = match?.[1];
    const value = match?.[2];
    if (key === undefined || value === undefined) {
      continue;
    }
    const cleanValue = value.replace(/^["']|["']$/g, "").trim();
    if (cleanValue !== "") {
      result[key] = cleanValue;
    }
  }

  return result;
}

function isLineEndingName(value: string): value is LineEndingName {
  return Object.hasOwn(LINE_ENDINGS, value);
}

/**
 * Map parsed key/value pairs onto KitConfig.
 *
 * @throws ConfigError for an unknown lineEnding value.
 */
export function toKitConfig(parsed: Record<string, string>, source: string): KitConfig {
  const config: KitConfig = {};

  for (const key of Object.keys(parsed)) {
    if (!KNOWN_KEYS.has(key)) {
      log.warn(`Ignoring unknown config key '${key}' in ${source}`);
    }
  }

  if (parsed.syntax !== undefined) {config.syntax = parsed.syntax;}
  if (parsed.escape !== undefined) {config.escape = parsed.escape;}
  if (parsed.output !== undefined) {config.output = parsed.output;}
  if (parsed.lineEnding !== undefined) {
    if (!isLineEndingName(parsed.lineEnding)) {
      throw new ConfigError(
        `Invalid lineEnding '${parsed.lineEnding}' in ${source}. Expected one of: ${Object.keys(LINE_ENDINGS).join(", ")}`
      );
    }
    config.lineEnding = parsed.lineEnding;
  }

  return config;
}

/**
 * Load configuration from one file.
 * Returns null if the file does not exist or cannot be read.
 */
function loadConfigFile(path: string): KitConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    log.warn(`Failed to read config file ${path}: ${extractErrorDetails(error, 200)}`);
    return null;
  }
  return toKitConfig(parseSimpleYaml(content), path);
}

function loadProjectConfig(projectPath: string): KitConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations with proper precedence.
 * Later values override earlier ones.
 */
export function mergeConfigs(...configs: (KitConfig | null)[]): KitConfig {
  const result: KitConfig = {};

  for (const config of configs) {
    if (!config) {continue;}

    if (config.syntax !== undefined) {result.syntax = config.syntax;}
    if (config.escape !== undefined) {result.escape = config.escape;}
    if (config.lineEnding !== undefined) {result.lineEnding = config.lineEnding;}
    if (config.output !== undefined) {result.output = config.output;}
  }

  return result;
}

/**
 * Load dockerfile-kit configuration.
 *
 * @param projectPath - Directory searched for a project config file.
 * @param globalPath - Global config file (overridable for tests).
 * @returns Merged configuration (global < project).
 * @throws ConfigError on invalid values.
 */
export function loadKitConfig(projectPath: string, globalPath = GLOBAL_CONFIG_PATH): KitConfig {
  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }
  return mergeConfigs(globalConfig, loadProjectConfig(projectPath));
}
