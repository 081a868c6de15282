/**
 * Recipe format: a JSON description of Dockerfile directive calls.
 *
 * Validation covers the JSON shape only (field presence and types). Directive
 * arguments are passed to the builder as written, without semantic checks.
 *
 * Dependency direction:
 *   This module imports from: dockerfile.ts, errors.ts
 *   It should NOT import from: cli, recipe-loader
 */

import type { CopySource, Dockerfile, Protocol } from "./dockerfile.js";
import { RecipeError } from "./errors.js";

export type DirectiveStep =
  | { directive: "ADD"; src: string; dest: string; chown?: string }
  | { directive: "ARG"; name: string; default?: string }
  | { directive: "COPY"; src: CopySource; dest: string; from?: string; chown?: string }
  | { directive: "CMD" | "ENTRYPOINT" | "RUN"; command: string; args: string[] }
  | { directive: "ENV"; name: string; value: string }
  | { directive: "EXPOSE"; port: number; protocol?: Protocol }
  | { directive: "FROM"; image: string; as?: string; platform?: string }
  | { directive: "LABEL"; key: string; value: string }
  | { directive: "SHELL"; executable: string; params: string[] }
  | { directive: "USER"; user: string; group?: string }
  | { directive: "VOLUME"; paths: [string, ...string[]] }
  | { directive: "WORKDIR"; path: string };

export type DirectiveName = DirectiveStep["directive"];

/** Merge another recipe file (path relative to the including recipe). */
export interface IncludeStep {
  include: string;
}

export type RecipeStep = DirectiveStep | IncludeStep;

export interface Recipe {
  syntax?: string;
  escape?: string;
  steps: RecipeStep[];
}

export const DIRECTIVE_NAMES = [
  "ADD",
  "ARG",
  "CMD",
  "COPY",
  "ENTRYPOINT",
  "ENV",
  "EXPOSE",
  "FROM",
  "LABEL",
  "RUN",
  "SHELL",
  "USER",
  "VOLUME",
  "WORKDIR",
] as const satisfies readonly DirectiveName[];

/** Line format of each directive, for help output. */
export const DIRECTIVE_FORMATS: Record<DirectiveName, string> = {
  ADD: "ADD [--chown=<owner> ]<src> <dest>",
  ARG: 'ARG <name>[="<default>"]',
  CMD: 'CMD <command> | CMD ["<command>", "<arg>", ...]',
  COPY: 'COPY [--from=<stage> ][--chown=<owner> ]<src> <dest> | ["<src>", ..., "<dest>"]',
  ENTRYPOINT: 'ENTRYPOINT <command> | ENTRYPOINT ["<command>", "<arg>", ...]',
  ENV: 'ENV <name>="<value>"',
  EXPOSE: "EXPOSE <port>/<tcp|udp>",
  FROM: "FROM [--platform=<platform>]<image>[ as <name>]",
  LABEL: 'LABEL "<key>"="<value>"',
  RUN: 'RUN <command> | RUN ["<command>", "<arg>", ...]',
  SHELL: 'SHELL ["<executable>", "<param>", ...]',
  USER: "USER <user>[:<group>]",
  VOLUME: 'VOLUME ["<path>", ...]',
  WORKDIR: "WORKDIR <path>",
};

const PROTOCOLS: readonly Protocol[] = ["tcp", "udp"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isProtocol(value: unknown): value is Protocol {
  return PROTOCOLS.some((protocol) => protocol === value);
}

/** Typed field access on one raw step, with errors naming the step. */
class StepReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly where: string
  ) {}

  fail(message: string): never {
    throw new RecipeError(`${this.where}: ${message}`);
  }

  value(field: string): unknown {
    return this.raw[field];
  }

  string(field: string): string {
    const value = this.raw[field];
    if (typeof value !== "string") {
      return this.fail(`'${field}' must be a string`);
    }
    return value;
  }

  optionalString(field: string): string | undefined {
    return this.raw[field] === undefined ? undefined : this.string(field);
  }

  stringList(field: string): string[] {
    const value = this.raw[field];
    if (value === undefined) {
      return [];
    }
    if (!isStringList(value)) {
      return this.fail(`'${field}' must be an array of strings`);
    }
    return value;
  }

  port(field: string): number {
    const value = this.raw[field];
    if (typeof value !== "number" || !Number.isInteger(value)) {
      return this.fail(`'${field}' must be an integer`);
    }
    return value;
  }
}

function parseDirective(reader: StepReader, directive: string): DirectiveStep {
  switch (directive) {
    case "ADD":
      return {
        directive,
        src: reader.string("src"),
        dest: reader.string("dest"),
        chown: reader.optionalString("chown"),
      };
    case "ARG":
      return { directive, name: reader.string("name"), default: reader.optionalString("default") };
    case "COPY": {
      const src = reader.value("src");
      if (typeof src === "string" || isStringList(src)) {
        return {
          directive,
          src,
          dest: reader.string("dest"),
          from: reader.optionalString("from"),
          chown: reader.optionalString("chown"),
        };
      }
      return reader.fail("'src' must be a string or an array of strings");
    }
    case "CMD":
    case "ENTRYPOINT":
    case "RUN":
      return { directive, command: reader.string("command"), args: reader.stringList("args") };
    case "ENV":
      return { directive, name: reader.string("name"), value: reader.string("value") };
    case "EXPOSE": {
      const port = reader.port("port");
      const protocol = reader.value("protocol");
      if (protocol === undefined) {
        return { directive, port };
      }
      if (!isProtocol(protocol)) {
        return reader.fail(`'protocol' must be one of ${PROTOCOLS.join(", ")}`);
      }
      return { directive, port, protocol };
    }
    case "FROM":
      return {
        directive,
        image: reader.string("image"),
        as: reader.optionalString("as"),
        platform: reader.optionalString("platform"),
      };
    case "LABEL":
      return { directive, key: reader.string("key"), value: reader.string("value") };
    case "SHELL":
      return { directive, executable: reader.string("executable"), params: reader.stringList("params") };
    case "USER":
      return { directive, user: reader.string("user"), group: reader.optionalString("group") };
    case "VOLUME": {
      const [first, ...rest] = reader.stringList("paths");
      if (first === undefined) {
        return reader.fail("'paths' must name at least one path");
      }
      return { directive, paths: [first, ...rest] };
    }
    case "WORKDIR":
      return { directive, path: reader.string("path") };
    default:
      return reader.fail(`unknown directive '${directive}'`);
  }
}

function parseStep(raw: unknown, where: string): RecipeStep {
  if (!isRecord(raw)) {
    throw new RecipeError(`${where}: step must be an object`);
  }
  const reader = new StepReader(raw, where);
  if (raw.include !== undefined) {
    return { include: reader.string("include") };
  }
  return parseDirective(reader, reader.string("directive"));
}

/**
 * Validate parsed JSON as a recipe.
 *
 * @param data - Parsed JSON value.
 * @param source - Name used in error messages (usually the file path).
 * @throws RecipeError on any shape mismatch.
 */
export function parseRecipe(data: unknown, source = "recipe"): Recipe {
  if (!isRecord(data)) {
    throw new RecipeError(`${source}: recipe must be a JSON object`);
  }
  const header = new StepReader(data, source);
  const steps = data.steps;
  if (!Array.isArray(steps)) {
    return header.fail("'steps' must be an array");
  }

  return {
    syntax: header.optionalString("syntax"),
    escape: header.optionalString("escape"),
    steps: steps.map((step, index) => parseStep(step, `${source}: step ${index}`)),
  };
}

export function isIncludeStep(step: RecipeStep): step is IncludeStep {
  return "include" in step;
}

/** Apply one directive step to a builder. */
export function applyStep(dockerfile: Dockerfile, step: DirectiveStep): void {
  switch (step.directive) {
    case "ADD":
      dockerfile.add(step.src, step.dest, { chown: step.chown });
      break;
    case "ARG":
      dockerfile.arg(step.name, step.default);
      break;
    case "COPY":
      dockerfile.copy(step.src, step.dest, { from: step.from, chown: step.chown });
      break;
    case "CMD":
      dockerfile.cmd(step.command, ...step.args);
      break;
    case "ENTRYPOINT":
      dockerfile.entrypoint(step.command, ...step.args);
      break;
    case "RUN":
      dockerfile.run(step.command, ...step.args);
      break;
    case "ENV":
      dockerfile.env(step.name, step.value);
      break;
    case "EXPOSE":
      dockerfile.expose(step.port, step.protocol);
      break;
    case "FROM":
      dockerfile.from(step.image, { as: step.as, platform: step.platform });
      break;
    case "LABEL":
      dockerfile.label(step.key, step.value);
      break;
    case "SHELL":
      dockerfile.shell(step.executable, ...step.params);
      break;
    case "USER":
      dockerfile.user(step.user, step.group);
      break;
    case "VOLUME":
      dockerfile.volume(...step.paths);
      break;
    case "WORKDIR":
      dockerfile.workdir(step.path);
      break;
  }
}
