/**
 * dockerfile-kit - assemble Dockerfiles line by line.
 *
 * This is the main entry point for the dockerfile-kit npm package.
 */

export { VERSION } from "./constants.js";
export {
  Dockerfile,
  DEFAULT_LINE_ENDING,
  type DockerfileOptions,
  type AddOptions,
  type CopyOptions,
  type CopySource,
  type FromOptions,
  type Protocol,
} from "./dockerfile.js";
export { quote, quoteList } from "./encoding.js";
export { DockerfileKitError, ValidationError, ArgumentShapeError, RecipeError, ConfigError } from "./errors.js";
export {
  parseRecipe,
  applyStep,
  DIRECTIVE_FORMATS,
  DIRECTIVE_NAMES,
  type Recipe,
  type RecipeStep,
  type DirectiveStep,
  type DirectiveName,
  type IncludeStep,
} from "./recipe.js";
export { loadRecipe, readRecipeFile, type LoadRecipeOptions, type RecipeDefaults } from "./recipe-loader.js";
export { loadKitConfig, type KitConfig } from "./config-file.js";
