/**
 * Render command: recipe file -> Dockerfile.
 *
 * Parser directives: CLI flag > recipe > config file.
 * Line ending and output: CLI flag > config file.
 */

import { createWriteStream } from "node:fs";
import { resolve } from "node:path";
import { pipeline } from "node:stream/promises";

import { LINE_ENDINGS, loadKitConfig } from "../config-file.js";
import { log } from "../logger.js";
import { loadRecipe } from "../recipe-loader.js";

export interface RenderCommandOptions {
  output?: string;
  syntax?: string;
  escape?: string;
  crlf?: boolean;
  /** Directory searched for a project config file (default: cwd) */
  projectPath?: string;
  /** Global config file override */
  globalConfigPath?: string;
}

export interface RenderResult {
  /** Rendered Dockerfile text */
  content: string;
  /** File written, or undefined when the caller prints to stdout */
  outputPath?: string;
}

/**
 * Render a recipe. When an output path is configured the document is
 * streamed to that file; otherwise the caller receives the text to print.
 */
export async function renderRecipe(recipePath: string, options: RenderCommandOptions = {}): Promise<RenderResult> {
  const projectPath = options.projectPath ?? process.cwd();
  const config = loadKitConfig(projectPath, options.globalConfigPath);

  const lineEnding = options.crlf ? LINE_ENDINGS.crlf : LINE_ENDINGS[config.lineEnding ?? "lf"];
  const dockerfile = loadRecipe(recipePath, {
    syntax: options.syntax,
    escape: options.escape,
    lineEnding,
    defaults: { syntax: config.syntax, escape: config.escape },
  });

  const output = options.output ?? config.output;
  if (output === undefined) {
    return { content: dockerfile.render() };
  }

  const outputPath = resolve(projectPath, output);
  await pipeline(dockerfile.toStream(), createWriteStream(outputPath));
  log.success(`Wrote ${outputPath} (${dockerfile.lineCount} lines)`);
  return { content: dockerfile.render(), outputPath };
}
