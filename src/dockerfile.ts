/**
 * Dockerfile builder.
 *
 * A barebones way to assemble a Dockerfile: each directive method appends one
 * formatted line, render() joins them. No consistency checks of any kind are
 * performed (image names, stage references and protocols are written as given).
 *
 * Format reference: https://docs.docker.com/engine/reference/builder/
 */

import { Readable } from "node:stream";

import { quote, quoteList } from "./encoding.js";
import { ArgumentShapeError } from "./errors.js";

/** Default line terminator stored after every line. */
export const DEFAULT_LINE_ENDING = "\n";

/** Construction options. */
export interface DockerfileOptions {
  /** Value of the leading `# syntax:` parser directive */
  syntax?: string;
  /** Value of the `# escape:` parser directive */
  escape?: string;
  /** Terminator appended to each line (default: "\n") */
  lineEnding?: string;
}

/** Options for ADD. */
export interface AddOptions {
  /** Owner spec, e.g. "app:app" */
  chown?: string;
}

/** Options for COPY. */
export interface CopyOptions {
  /** Build stage (or image) to copy from */
  from?: string;
  /** Owner spec, e.g. "app:app" */
  chown?: string;
}

/** Options for FROM. */
export interface FromOptions {
  /** Stage name (`FROM image as <name>`) */
  as?: string;
  /** Target platform, e.g. "linux/amd64" */
  platform?: string;
}

export type Protocol = "tcp" | "udp";

/** A single source path, or a list of source paths (written in JSON form). */
export type CopySource = string | readonly string[];

function isCopySource(src: unknown): src is CopySource {
  return typeof src === "string" || (Array.isArray(src) && src.every((item) => typeof item === "string"));
}

export class Dockerfile {
  private readonly lines: string[] = [];
  private readonly lineEnding: string;

  constructor(options: DockerfileOptions = {}) {
    this.lineEnding = options.lineEnding ?? DEFAULT_LINE_ENDING;

    // https://docs.docker.com/engine/reference/builder/#parser-directives
    if (options.syntax !== undefined) {
      this.append(`# syntax: ${options.syntax}`);
    }
    if (options.escape !== undefined) {
      this.append(`# escape: ${options.escape}`);
    }
  }

  /** Number of stored lines, parser directives included. */
  get lineCount(): number {
    return this.lines.length;
  }

  render(): string {
    return this.lines.join("");
  }

  toString(): string {
    return this.render();
  }

  /**
   * Return the rendered Dockerfile as a readable stream, e.g. for handing it
   * to a Docker client that takes the build file as a stream.
   */
  toStream(): Readable {
    return Readable.from([this.render()]);
  }

  /**
   * Include another Dockerfile as if its lines had been added here directly.
   * The lines are copied; later changes to `other` do not show up here.
   */
  include(other: Dockerfile): void {
    this.lines.push(...other.lines);
  }

  // ══════════════════════════════════════════════════════════════════════════
  // Directives
  // ══════════════════════════════════════════════════════════════════════════

  add(src: string, dest: string, options: AddOptions = {}): void {
    const chown = options.chown !== undefined ? `--chown=${options.chown} ` : "";
    this.append(`ADD ${chown}${src} ${dest}`);
  }

  /** The default value is quoted automatically. */
  arg(name: string, defaultValue?: string): void {
    const value = defaultValue !== undefined ? `=${quote(defaultValue)}` : "";
    this.append(`ARG ${name}${value}`);
  }

  /**
   * A single source is written as `src dest`; a list of sources uses the
   * JSON form `["a", "b", "dest"]`.
   *
   * @throws ArgumentShapeError if src is neither a string nor a string array
   */
  copy(src: CopySource, dest: string, options: CopyOptions = {}): void {
    // Recipes and plain JS callers can bypass the static type
    const source: unknown = src;
    if (!isCopySource(source)) {
      throw new ArgumentShapeError();
    }

    const from = options.from !== undefined ? `--from=${options.from} ` : "";
    const chown = options.chown !== undefined ? `--chown=${options.chown} ` : "";
    const payload = typeof source === "string" ? `${source} ${dest}` : quoteList([...source, dest]);

    this.append(`COPY ${from}${chown}${payload}`);
  }

  /** Shell form when only `command` is given, exec form otherwise. */
  cmd(command: string, ...args: string[]): void {
    this.appendCommand("CMD", command, args);
  }

  /** Shell form when only `command` is given, exec form otherwise. */
  entrypoint(command: string, ...args: string[]): void {
    this.appendCommand("ENTRYPOINT", command, args);
  }

  /** One variable per instruction; the value is always quoted. */
  env(name: string, value: string): void {
    this.append(`ENV ${name}=${quote(value)}`);
  }

  expose(port: number, protocol: Protocol = "tcp"): void {
    this.append(`EXPOSE ${port}/${protocol}`);
  }

  from(baseImage: string, options: FromOptions = {}): void {
    // No space after the platform flag: kept as the established output format
    const platform = options.platform !== undefined ? `--platform=${options.platform}` : "";
    const alias = options.as !== undefined ? ` as ${options.as}` : "";
    this.append(`FROM ${platform}${baseImage}${alias}`);
  }

  /** One label per instruction. */
  label(key: string, value: string): void {
    this.append(`LABEL ${quote(key)}=${quote(value)}`);
  }

  /** Shell form when only `command` is given, exec form otherwise. */
  run(command: string, ...args: string[]): void {
    this.appendCommand("RUN", command, args);
  }

  shell(executable: string, ...params: string[]): void {
    this.append(`SHELL ${quoteList([executable, ...params])}`);
  }

  user(user: string, group?: string): void {
    const suffix = group !== undefined ? `:${group}` : "";
    this.append(`USER ${user}${suffix}`);
  }

  /** Always uses the JSON list form. */
  volume(path: string, ...additionalPaths: string[]): void {
    this.append(`VOLUME ${quoteList([path, ...additionalPaths])}`);
  }

  workdir(path: string): void {
    this.append(`WORKDIR ${path}`);
  }

  private appendCommand(keyword: string, command: string, args: readonly string[]): void {
    if (args.length === 0) {
      this.append(`${keyword} ${command}`);
    } else {
      this.append(`${keyword} ${quoteList([command, ...args])}`);
    }
  }

  private append(line: string): void {
    this.lines.push(line + this.lineEnding);
  }
}
