/**
 * Directives command: list supported directive kinds and their line formats.
 */

import { CLI_NAME } from "../constants.js";
import { log, style } from "../logger.js";
import { DIRECTIVE_FORMATS, DIRECTIVE_NAMES, type DirectiveName } from "../recipe.js";

/** Directive names, optionally filtered by a case-insensitive search term. */
export function filterDirectives(filter?: string): DirectiveName[] {
  const names = [...DIRECTIVE_NAMES];
  if (!filter) {
    return names;
  }
  const term = filter.toUpperCase();
  return names.filter((name) => name.includes(term));
}

export function listDirectives(filter?: string): void {
  const names = filterDirectives(filter);

  if (names.length === 0) {
    log.warn(`No directives found matching '${filter}'`);
    return;
  }

  log.raw(style.bold(filter ? `Directives matching '${filter}'` : "Supported directives"));
  for (const name of names) {
    log.raw(`  ${style.cyan(name.padEnd(11))}${style.dim(DIRECTIVE_FORMATS[name])}`);
  }
  log.info(`Usage: ${CLI_NAME} render <recipe.json>`);
}
