import { describe, expect, it } from "vitest";
import { UnavailableToolError } from "../src/errors.js";
import { ShellCommandRunner } from "../src/services/commandRunner.js";

const node = process.execPath;

describe("ShellCommandRunner", () => {
  it("captures stdout and the exit code", async () => {
    const runner = new ShellCommandRunner();

    const result = await runner.run(node, ["-e", "process.stdout.write('hello\\n'); process.exit(3)"]);

    expect(result).toEqual({ code: 3, stdout: "hello", stderr: "" });
  });

  it("streams output chunks as they arrive", async () => {
    const runner = new ShellCommandRunner();
    const chunks: string[] = [];

    const result = await runner.stream(node, ["-e", "console.log('step output')"], {
      onOutput: (chunk) => chunks.push(chunk)
    });

    expect(result).toEqual({ code: 0, output: "step output", aborted: false });
    expect(chunks.join("")).toBe("step output\n");
  });

  it("kills the running command when aborted", async () => {
    const runner = new ShellCommandRunner();
    const controller = new AbortController();

    const pending = runner.stream(node, ["-e", "setTimeout(() => {}, 10000)"], { signal: controller.signal });
    setTimeout(() => controller.abort(), 50);
    const result = await pending;

    expect(result.aborted).toBe(true);
  });

  it("does not start a command when already aborted", async () => {
    const runner = new ShellCommandRunner();
    const controller = new AbortController();
    controller.abort();

    expect(await runner.stream(node, ["-e", ""], { signal: controller.signal })).toEqual({
      code: 130,
      output: "",
      aborted: true
    });
  });

  it("reports a missing executable as an unavailable tool", async () => {
    const runner = new ShellCommandRunner();

    await expect(runner.run("brewsync-missing-binary", ["--version"])).rejects.toBeInstanceOf(UnavailableToolError);
  });
});
