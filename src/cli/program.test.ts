import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { reportError, run } from "./program.js";
import { ControlOperationFailedError } from "../types/errors.js";

const ANSI = /\x1b\[[0-9;]*m/g;

function written(spy: MockInstance<typeof process.stderr.write>): string {
  return spy.mock.calls.map((call) => String(call[0])).join("").replace(ANSI, "");
}

describe("sprout program", () => {
  let workDir: string;
  let stderr: MockInstance<typeof process.stderr.write>;
  let stdout: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "sprout-cli-"));
    vi.stubEnv("SPROUT_CONFIG_DIR", workDir);
    stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    stderr.mockRestore();
    stdout.mockRestore();
    vi.unstubAllEnvs();
    rmSync(workDir, { recursive: true, force: true });
  });

  describe("run", () => {
    it("reports a missing definition and exits with 1", async () => {
      const missing = join(workDir, "absent.yaml");

      await expect(run(["node", "sprout", "start", "-f", missing])).resolves.toBe(1);

      const lines = written(stderr).split("\n");
      expect(lines[0]).toBe(`Error: Cannot read session definition: ${missing}`);
      expect(lines[1]).toBe(`  caused by: ENOENT: no such file or directory, open '${missing}'`);
      expect(lines[2]).toBe("Pass a file with -f, or run `sprout list` to see the known sessions.");
    });

    it("lists the stored definitions on stdout", async () => {
      writeFileSync(join(workDir, "b.yml"), "name: b\n");
      writeFileSync(join(workDir, "a.yaml"), "name: a\n");

      await expect(run(["node", "sprout", "list"])).resolves.toBe(0);

      expect(written(stdout)).toBe("a\nb\n");
      expect(stderr).not.toHaveBeenCalled();
    });

    it("says so when there are no definitions", async () => {
      await expect(run(["node", "sprout", "list"])).resolves.toBe(0);

      expect(written(stderr)).toBe(`No session definitions in ${workDir}\n`);
      expect(stdout).not.toHaveBeenCalled();
    });
  });

  describe("reportError", () => {
    it("prints the cause chain, diagnostic and recovery", () => {
      const error = new ControlOperationFailedError(
        "renumber-windows",
        ["tmux", "move-window", "-r", "-t", "dev"],
        { cause: new Error("can't find session: dev"), diagnosticMessage: "Session \"dev\" declares no windows." },
      );

      reportError(error);

      expect(written(stderr)).toBe(
        "Error: tmux renumber-windows failed: tmux move-window -r -t dev\n" +
          "  caused by: can't find session: dev\n" +
          'Session "dev" declares no windows.\n' +
          "Inspect it with `tmux ls` and remove it with `tmux kill-session -t <name>`.\n",
      );
    });

    it("prints only the message of a plain error", () => {
      reportError(new Error("boom"));

      expect(written(stderr)).toBe("Error: boom\n");
    });
  });
});
