import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { filterDirectives, listDirectives } from "../src/commands/directives.js";
import { renderRecipe } from "../src/commands/render.js";
import { disableQuietMode, enableQuietMode, log } from "../src/logger.js";
import { DIRECTIVE_FORMATS, DIRECTIVE_NAMES } from "../src/recipe.js";

describe("renderRecipe", () => {
  let dir: string;
  let recipePath: string;

  function options(extra: Parameters<typeof renderRecipe>[1] = {}): Parameters<typeof renderRecipe>[1] {
    return { projectPath: dir, globalConfigPath: join(dir, "no-global.yaml"), ...extra };
  }

  beforeEach(() => {
    enableQuietMode();
    dir = mkdtempSync(join(tmpdir(), "dockerfile-kit-render-"));
    recipePath = join(dir, "recipe.json");
    writeFileSync(
      recipePath,
      JSON.stringify({
        steps: [
          { directive: "FROM", image: "golang:1.22", as: "build" },
          { directive: "RUN", command: "go", args: ["build", "./..."] },
        ],
      })
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    disableQuietMode();
  });

  it("should return the rendered text when no output is configured", async () => {
    const result = await renderRecipe(recipePath, options());

    expect(result).toEqual({ content: 'FROM golang:1.22 as build\nRUN ["go", "build", "./..."]\n' });
  });

  it("should apply config file defaults", async () => {
    writeFileSync(join(dir, "dockerfile-kit.yaml"), "syntax: docker/dockerfile:1\nlineEnding: crlf\n");

    const result = await renderRecipe(recipePath, options());

    expect(result.content).toBe('# syntax: docker/dockerfile:1\r\nFROM golang:1.22 as build\r\nRUN ["go", "build", "./..."]\r\n');
  });

  it("should keep the recipe's own syntax over the config file", async () => {
    writeFileSync(join(dir, "dockerfile-kit.yaml"), "syntax: docker/dockerfile:1\nescape: `\n");
    writeFileSync(
      recipePath,
      JSON.stringify({ syntax: "docker/dockerfile:1.7", steps: [{ directive: "FROM", image: "alpine" }] })
    );

    const result = await renderRecipe(recipePath, options());

    expect(result.content).toBe("# syntax: docker/dockerfile:1.7\n# escape: `\nFROM alpine\n");
  });

  it("should let CLI options override the config file", async () => {
    writeFileSync(join(dir, "dockerfile-kit.yaml"), "syntax: docker/dockerfile:1\n");

    const result = await renderRecipe(recipePath, options({ syntax: "docker/dockerfile:1.7", crlf: true }));

    expect(result.content.split("\r\n")[0]).toBe("# syntax: docker/dockerfile:1.7");
  });

  it("should stream the document to the output file", async () => {
    const result = await renderRecipe(recipePath, options({ output: "Dockerfile" }));

    expect(result.outputPath).toBe(join(dir, "Dockerfile"));
    expect(readFileSync(join(dir, "Dockerfile"), "utf-8")).toBe(result.content);
    expect(result.content).toBe('FROM golang:1.22 as build\nRUN ["go", "build", "./..."]\n');
  });

  it("should take the output file from the config", async () => {
    writeFileSync(join(dir, ".dockerfilekitrc"), "output: Dockerfile.generated\n");

    const result = await renderRecipe(recipePath, options());

    expect(result.outputPath).toBe(join(dir, "Dockerfile.generated"));
    expect(readFileSync(join(dir, "Dockerfile.generated"), "utf-8")).toBe(result.content);
  });
});

describe("filterDirectives", () => {
  it("should list all directives without a filter", () => {
    expect(filterDirectives()).toEqual([
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
    ]);
  });

  it("should match case-insensitively", () => {
    expect(filterDirectives("en")).toEqual(["ENTRYPOINT", "ENV"]);
    expect(filterDirectives("healthcheck")).toEqual([]);
  });

  it("should name every directive that has a line format", () => {
    expect([...DIRECTIVE_NAMES]).toEqual(Object.keys(DIRECTIVE_FORMATS));
  });
});

describe("listDirectives", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should end the listing with a usage hint", () => {
    const raw = vi.spyOn(log, "raw").mockImplementation(() => {});
    const info = vi.spyOn(log, "info").mockImplementation(() => {});

    listDirectives("workdir");

    expect(raw).toHaveBeenCalledTimes(2);
    expect(info).toHaveBeenCalledWith("Usage: dockerfile-kit render <recipe.json>");
  });
});
