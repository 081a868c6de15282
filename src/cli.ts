#!/usr/bin/env node
/**
 * CLI entry point for dockerfile-kit.
 *
 * Commander.js-based CLI.
 */

import { Command } from "commander";

import { listDirectives } from "./commands/directives.js";
import { renderRecipe, type RenderCommandOptions } from "./commands/render.js";
import { CLI_NAME, VERSION } from "./constants.js";
import { exitCodeFor, logError } from "./error-handler.js";
import { LogLevel, enableQuietMode, setLogLevel } from "./logger.js";

type GlobalOptions = {
  quiet?: boolean;
  debug?: boolean;
};

const program = new Command();

program
  .name(CLI_NAME)
  .description("Assemble Dockerfiles from JSON recipes")
  .version(VERSION)
  .option("-q, --quiet", "Suppress all log output (exit code only)")
  .option("-d, --debug", "Show debug output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.debug) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

program
  .command("render")
  .description("Render a JSON recipe into a Dockerfile")
  .argument("<recipe>", "Recipe file (JSON)")
  .option("-o, --output <file>", "Write to file instead of stdout")
  .option("--syntax <value>", "Add a '# syntax:' parser directive")
  .option("--escape <value>", "Add a '# escape:' parser directive")
  .option("--crlf", "Terminate lines with CRLF")
  .action(async (recipe: string, options: RenderCommandOptions) => {
    try {
      const result = await renderRecipe(recipe, options);
      if (result.outputPath === undefined) {
        // The document is data, not a log message: bypasses quiet mode
        process.stdout.write(result.content);
      }
    } catch (error: unknown) {
      logError(error, "render recipe", { recipe, output: options.output });
      process.exitCode = exitCodeFor(error);
    }
  });

program
  .command("directives")
  .description("List supported directives and their line formats")
  .option("-f, --filter <term>", "Filter by directive name")
  .action((options: { filter?: string }) => {
    listDirectives(options.filter);
  });

// Parse and run (async for proper error handling in async actions)
program.parseAsync().catch((error: unknown) => {
  logError(error, "run command");
  process.exitCode = exitCodeFor(error);
});
