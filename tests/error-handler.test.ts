import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { ExitCode, exitCodeFor, logError } from "../src/error-handler.js";
import { ArgumentShapeError, ConfigError, DockerfileKitError, RecipeError, extractErrorDetails } from "../src/errors.js";
import { log } from "../src/logger.js";

describe("exitCodeFor", () => {
  it("should treat bad input as a usage error", () => {
    expect(exitCodeFor(new ArgumentShapeError())).toBe(ExitCode.USAGE);
    expect(exitCodeFor(new RecipeError("bad step"))).toBe(ExitCode.USAGE);
    expect(exitCodeFor(new ConfigError("bad value"))).toBe(ExitCode.USAGE);
  });

  it("should treat anything else as a failure", () => {
    expect(exitCodeFor(new Error("EACCES"))).toBe(ExitCode.FAILURE);
    expect(exitCodeFor(new DockerfileKitError("other"))).toBe(ExitCode.FAILURE);
    expect(exitCodeFor("thrown string")).toBe(ExitCode.FAILURE);
  });
});

describe("logError", () => {
  beforeEach(() => {
    vi.spyOn(log, "error").mockImplementation(() => {});
    vi.spyOn(log, "dim").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log the operation and message", () => {
    logError(new RecipeError("recipe.json: step 0: unknown directive 'NOPE'"), "render recipe.json");

    expect(log.error).toHaveBeenCalledWith("Failed to render recipe.json: recipe.json: step 0: unknown directive 'NOPE'");
    expect(log.dim).not.toHaveBeenCalled();
  });

  it("should log recipe context the way the render command passes it", () => {
    logError(new RecipeError("bad step"), "render recipe", { recipe: "app.json", output: undefined });

    expect(log.error).toHaveBeenCalledWith("Failed to render recipe: bad step");
    expect(log.dim).toHaveBeenCalledWith('Context: recipe="app.json", output=undefined');
  });

  it("should log context details", () => {
    logError("boom", "write output", { path: "Dockerfile", lines: 3 });

    expect(log.error).toHaveBeenCalledWith("Failed to write output: boom");
    expect(log.dim).toHaveBeenCalledWith('Context: path="Dockerfile", lines=3');
  });
});

describe("errors", () => {
  it("should keep the class hierarchy and names", () => {
    const error = new ArgumentShapeError();
    expect(error).toBeInstanceOf(DockerfileKitError);
    expect(error.name).toBe("ArgumentShapeError");
    expect(error.message).toBe("src must be a string or an array of strings");
  });

  it("should truncate extracted details", () => {
    expect(extractErrorDetails(new Error("abcdef"), 3)).toBe("abc");
    expect(extractErrorDetails(404)).toBe("404");
  });
});
