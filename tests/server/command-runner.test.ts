import os from "node:os";

import { describe, expect, it } from "vitest";

import { commandSucceeded, describeCommandFailure, execCommand } from "../../server/updater/commandRunner.js";

const options = { cwd: os.tmpdir(), timeoutMs: 10_000 };

describe("command runner", () => {
  it("captures output of a successful command", async () => {
    const result = await execCommand(process.execPath, ["-e", "process.stdout.write('hello')"], options);

    expect(result).toEqual({ exitCode: 0, stdout: "hello", stderr: "", timedOut: false });
    expect(commandSucceeded(result)).toBe(true);
  });

  it("reports the exit code and stderr of a failing command", async () => {
    const result = await execCommand(
      process.execPath,
      ["-e", "process.stderr.write('broken'); process.exit(3)"],
      options
    );

    expect(result).toMatchObject({ exitCode: 3, stderr: "broken", timedOut: false });
    expect(describeCommandFailure("Lookup", result, 10_000)).toBe("Lookup failed (exit 3): broken");
  });

  it("flags a command that outlives its timeout", async () => {
    const result = await execCommand(process.execPath, ["-e", "setTimeout(() => {}, 20000)"], {
      ...options,
      timeoutMs: 300
    });

    expect(result.timedOut).toBe(true);
    expect(commandSucceeded(result)).toBe(false);
    expect(describeCommandFailure("Lookup", result, 300)).toBe("Lookup timed out after 300ms");
  });

  it("reports a binary that cannot be started", async () => {
    const result = await execCommand("release-updater-missing-binary", [], options);

    expect(result.exitCode).toBeNull();
    expect(result.spawnError).toBeDefined();
    expect(describeCommandFailure("Lookup", result, 10_000)).toMatch(/^Lookup could not be started: /);
  });
});
