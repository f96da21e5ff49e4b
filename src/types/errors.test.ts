import { describe, expect, it } from "vitest";
import {
  ControlOperationFailedError,
  DefinitionNotFoundError,
  MalformedDefinitionError,
  SproutError,
  formatErrorChain,
} from "./errors.js";

describe("SproutError hierarchy", () => {
  it("carries a code, a user message and the cause", () => {
    const cause = new Error("ENOENT: no such file or directory");
    const error = new DefinitionNotFoundError("/cfg/sprout/dev.yaml", { cause });

    expect(error).toBeInstanceOf(SproutError);
    expect(error.name).toBe("DefinitionNotFoundError");
    expect(error.code).toBe("SPROUT_DEFINITION_NOTFOUND_001");
    expect(error.userMessage).toBe("No session definition could be read from /cfg/sprout/dev.yaml.");
    expect(error.cause).toBe(cause);
  });

  it("joins definition issues into the message", () => {
    const error = new MalformedDefinitionError("dev.yaml", ["name: Required", "windows: Expected array, received string"]);
    expect(error.message).toBe(
      "Malformed session definition (dev.yaml): name: Required; windows: Expected array, received string",
    );
  });
});

describe("formatErrorChain", () => {
  it("lists the error and each cause, outermost first", () => {
    const root = new Error("spawn tmux ENOENT");
    const error = new ControlOperationFailedError("create-session", ["tmux", "new-session"], {
      cause: root,
    });

    expect(formatErrorChain(error)).toEqual([
      "tmux create-session failed: tmux new-session",
      "spawn tmux ENOENT",
    ]);
  });

  it("stringifies non-Error causes", () => {
    const error = new Error("outer", { cause: "exit code 1" });
    expect(formatErrorChain(error)).toEqual(["outer", "exit code 1"]);
  });
});
