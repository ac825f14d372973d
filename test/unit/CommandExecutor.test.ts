import { describe, it, expect } from "vitest";
import {
  ExecaCommandExecutor,
  describeCommand,
  formatDuration,
  shellQuote,
  type OutputLogger,
} from "../../src/core/exec/CommandExecutor.js";

class CollectingOutput implements OutputLogger {
  readonly out: string[] = [];
  readonly err: string[] = [];

  stdout(line: string): void {
    this.out.push(line);
  }

  stderr(line: string): void {
    this.err.push(line);
  }
}

describe("shellQuote", () => {
  it("wraps plain values in single quotes", () => {
    expect(shellQuote("libX11-devel")).toBe("'libX11-devel'");
  });

  it("escapes embedded single quotes", () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("describeCommand", () => {
  it("returns unprivileged commands unchanged", () => {
    expect(describeCommand({ command: "make" }, "sudo")).toBe("make");
  });

  it("wraps privileged commands in the privilege command", () => {
    expect(describeCommand({ command: "make install", privileged: true }, "sudo")).toBe(
      "sudo sh -c 'make install'",
    );
  });

  it("runs privileged commands directly without a privilege command", () => {
    expect(describeCommand({ command: "make install", privileged: true }, null)).toBe("make install");
  });
});

describe("formatDuration", () => {
  it("formats milliseconds", () => {
    expect(formatDuration(456)).toBe("456ms");
  });

  it("formats seconds", () => {
    expect(formatDuration(1234)).toBe("1.23s");
  });
});

describe("ExecaCommandExecutor", () => {
  it("streams output lines and reports success", async () => {
    const output = new CollectingOutput();
    const executor = new ExecaCommandExecutor({ privilegeCommand: null, output });

    const result = await executor.run({ command: "echo one; echo two" });

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.command).toBe("echo one; echo two");
    expect(result.error).toBeUndefined();
    expect(output.out).toEqual(["one", "two"]);
  });

  it("joins a line written in several pieces", async () => {
    const output = new CollectingOutput();
    const executor = new ExecaCommandExecutor({ privilegeCommand: null, output });

    await executor.run({ command: "printf 'Compiling spec'; sleep 0.2; printf 'trwm.c\\ndone\\n'" });

    expect(output.out).toEqual(["Compiling spectrwm.c", "done"]);
  });

  it("keeps the stderr tail when stderr is streamed", async () => {
    const output = new CollectingOutput();
    const executor = new ExecaCommandExecutor({ privilegeCommand: null, output });

    const result = await executor.run({ command: "echo 'cannot find -lX11' >&2; exit 2" });

    expect(output.err).toEqual(["cannot find -lX11"]);
    expect(result.error).toBe("cannot find -lX11");
  });

  it("reports the exit code and stderr tail on failure", async () => {
    const executor = new ExecaCommandExecutor({ privilegeCommand: null });

    const result = await executor.run({ command: "echo broken >&2; exit 3" });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.error).toBe("broken");
  });

  it("does not stream quiet commands", async () => {
    const output = new CollectingOutput();
    const executor = new ExecaCommandExecutor({ privilegeCommand: null, output });

    await executor.run({ command: "echo installed", quiet: true });

    expect(output.out).toEqual([]);
  });

  it("passes cwd and extra environment", async () => {
    const output = new CollectingOutput();
    const executor = new ExecaCommandExecutor({ privilegeCommand: null, output });

    await executor.run({ command: 'echo "$(pwd) $RIG_TEST_VALUE"', cwd: "/", env: { RIG_TEST_VALUE: "set" } });

    expect(output.out).toEqual(["/ set"]);
  });

  it("runs privileged commands through the privilege command", async () => {
    const output = new CollectingOutput();
    const executor = new ExecaCommandExecutor({ privilegeCommand: "env", output });

    const result = await executor.run({ command: "echo elevated", privileged: true });

    expect(result.command).toBe("env sh -c 'echo elevated'");
    expect(result.success).toBe(true);
    expect(output.out).toEqual(["elevated"]);
  });
});
