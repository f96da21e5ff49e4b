import { describe, expect, it } from "vitest";
import { decodeDefinition, parseDefinition, validateSessionName } from "./decoder.js";
import { MalformedDefinitionError } from "../types/errors.js";

function issuesOf(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (error: unknown) {
    if (error instanceof MalformedDefinitionError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a MalformedDefinitionError");
}

describe("parseDefinition", () => {
  it("decodes the full tree and applies defaults", () => {
    const definition = parseDefinition(
      [
        "name: dev",
        "root: /work/dev",
        "windows:",
        "  - name: edit",
        "    cmd: vim",
        "  - name: run",
        "    layout: main-vertical",
        "    root: /work/dev/app",
        "    panes:",
        "      - npm start",
        "      -",
        "      - npm test",
      ].join("\n"),
    );

    expect(definition).toEqual({
      name: "dev",
      root: "/work/dev",
      windows: [
        { name: "edit", layout: "even-horizontal", cmd: "vim" },
        {
          name: "run",
          layout: "main-vertical",
          root: "/work/dev/app",
          panes: [{ command: "npm start" }, {}, { command: "npm test" }],
        },
      ],
    });
  });

  it("defaults windows to an empty list", () => {
    expect(parseDefinition("name: solo\n")).toEqual({ name: "solo", windows: [] });
  });

  it("uses the configured default layout", () => {
    const definition = parseDefinition("name: dev\nwindows:\n  - name: a\n", {
      defaultLayout: "tiled",
    });
    expect(definition.windows[0]?.layout).toBe("tiled");
  });

  it("expands ~ in roots", () => {
    const definition = parseDefinition(
      'name: dev\nroot: ~/code\nwindows:\n  - root: "~"\n',
      { home: "/home/tester" },
    );
    expect(definition.root).toBe("/home/tester/code");
    expect(definition.windows[0]?.root).toBe("/home/tester");
  });

  it("ignores unknown keys", () => {
    expect(parseDefinition("name: dev\nstartup: true\n")).toEqual({ name: "dev", windows: [] });
  });

  it("reports invalid YAML with its source", () => {
    expect(() => parseDefinition("name: [unclosed", { source: "dev.yaml" })).toThrow(
      /^Malformed session definition \(dev\.yaml\): invalid YAML: /,
    );
  });
});

describe("decodeDefinition", () => {
  it("requires a session name", () => {
    expect(issuesOf(() => decodeDefinition({ windows: [] }))).toEqual(["name: Required"]);
  });

  it("rejects an empty session name", () => {
    expect(issuesOf(() => decodeDefinition({ name: "" }))).toEqual([
      "name: Session name must not be empty",
    ]);
  });

  it("rejects session names tmux would rewrite", () => {
    expect(issuesOf(() => decodeDefinition({ name: "api.v2" }))).toEqual([
      'name: Session name must not contain ":" or "."',
    ]);
  });

  it("rejects a document that is not a mapping", () => {
    expect(issuesOf(() => decodeDefinition(null))).toEqual([
      "<root>: Expected object, received null",
    ]);
  });

  it("rejects windows that are not a list", () => {
    expect(issuesOf(() => decodeDefinition({ name: "dev", windows: "edit" }))).toEqual([
      "windows: Expected array, received string",
    ]);
  });

  it("rejects an unknown layout with its position", () => {
    expect(
      issuesOf(() =>
        decodeDefinition({ name: "dev", windows: [{ name: "a" }, { layout: "diagonal" }] }),
      ),
    ).toEqual([
      'windows.1.layout: unknown layout "diagonal" ' +
        "(expected one of: tiled, even-horizontal, even-vertical, main-horizontal, main-vertical)",
    ]);
  });

  it("rejects a window with both cmd and panes", () => {
    expect(
      issuesOf(() =>
        decodeDefinition({ name: "dev", windows: [{ cmd: "vim", panes: ["htop"] }] }),
      ),
    ).toEqual(['windows.0: a window takes either "cmd" or "panes", not both']);
  });

  it("reserves the placeholder window's name", () => {
    expect(issuesOf(() => decodeDefinition({ name: "dev", windows: [{ name: "999" }] }))).toEqual([
      'windows.0.name: "999" is reserved for the placeholder window',
    ]);
  });

  it("names the source in the error message", () => {
    expect(() => decodeDefinition({}, { source: "/tmp/dev.yaml" })).toThrow(
      "Malformed session definition (/tmp/dev.yaml): name: Required",
    );
  });

  it("treats blank commands as idle panes", () => {
    const definition = decodeDefinition({
      name: "dev",
      windows: [{ cmd: "  ", panes: ["", "make"] }],
    });
    expect(definition.windows[0]).toEqual({
      layout: "even-horizontal",
      panes: [{}, { command: "make" }],
    });
  });
});

describe("validateSessionName", () => {
  it("returns a usable name unchanged", () => {
    expect(validateSessionName("my-app", "alias")).toBe("my-app");
  });

  it("applies the definition's name rules", () => {
    expect(issuesOf(() => validateSessionName("my.app", "alias"))).toEqual([
      'name: Session name must not contain ":" or "."',
    ]);
    expect(() => validateSessionName("", "alias")).toThrow(
      "Malformed session definition (alias): name: Session name must not be empty",
    );
  });
});
