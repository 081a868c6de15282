/**
 * Recipe file loading.
 *
 * Reads a JSON recipe, renders it into a Dockerfile and resolves include
 * steps. Each included recipe is built into its own Dockerfile (without
 * parser directives, which only belong at the top of a document) and merged
 * with Dockerfile.include().
 *
 * Dependency direction:
 *   This module imports from: dockerfile.ts, recipe.ts, errors.ts, logger.ts
 *   It should NOT import from: cli
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { Dockerfile, type DockerfileOptions } from "./dockerfile.js";
import { RecipeError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";
import { applyStep, isIncludeStep, parseRecipe, type Recipe } from "./recipe.js";

/** Parser directives used only when neither the options nor the recipe set them. */
export interface RecipeDefaults {
  syntax?: string;
  escape?: string;
}

/** Overrides applied to the top-level document. */
export interface LoadRecipeOptions extends DockerfileOptions {
  defaults?: RecipeDefaults;
}

/**
 * Read and validate a recipe file.
 *
 * @throws RecipeError if the file is missing, not JSON, or not a recipe.
 */
export function readRecipeFile(path: string): Recipe {
  if (!existsSync(path)) {
    throw new RecipeError(`Recipe not found: ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new RecipeError(`Failed to read recipe ${path}: ${extractErrorDetails(error, 200)}`);
  }
  return parseRecipe(data, path);
}

function buildInto(dockerfile: Dockerfile, recipe: Recipe, recipePath: string, chain: string[], lineEnding?: string): void {
  const baseDir = dirname(recipePath);

  for (const step of recipe.steps) {
    if (!isIncludeStep(step)) {
      applyStep(dockerfile, step);
      continue;
    }

    const includePath = resolve(baseDir, step.include);
    if (chain.includes(includePath)) {
      throw new RecipeError(`Include cycle: ${[...chain, includePath].join(" -> ")}`);
    }

    const included = readRecipeFile(includePath);
    if (included.syntax !== undefined || included.escape !== undefined) {
      log.debug(`Ignoring parser directives of included recipe ${includePath}`);
    }

    const part = new Dockerfile({ lineEnding });
    buildInto(part, included, includePath, [...chain, includePath], lineEnding);
    log.debug(`Included ${includePath} (${part.lineCount} lines)`);
    dockerfile.include(part);
  }
}

/**
 * Build a Dockerfile from a recipe file.
 *
 * Option values override the recipe's own `syntax` and `escape`; `defaults`
 * fill in only what both leave unset.
 *
 * @throws RecipeError on invalid recipes and include cycles.
 */
export function loadRecipe(path: string, options: LoadRecipeOptions = {}): Dockerfile {
  const recipePath = resolve(path);
  const recipe = readRecipeFile(recipePath);

  const dockerfile = new Dockerfile({
    syntax: options.syntax ?? recipe.syntax ?? options.defaults?.syntax,
    escape: options.escape ?? recipe.escape ?? options.defaults?.escape,
    lineEnding: options.lineEnding,
  });
  buildInto(dockerfile, recipe, recipePath, [recipePath], options.lineEnding);

  log.debug(`Rendered ${recipePath} (${dockerfile.lineCount} lines)`);
  return dockerfile;
}
