import { spawn } from "node:child_process";
import { UnavailableToolError } from "../errors.js";
import { CommandResult, StreamingExecutor, StreamOptions, StreamResult } from "../types.js";

const OUTPUT_TAIL_LIMIT = 8_000;

export class ShellCommandRunner implements StreamingExecutor {
  async run(cmd: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (error) => {
        reject(toRunnerError(cmd, error));
      });

      child.on("close", (code) => {
        resolve({
          code: code ?? 1,
          stdout: stdout.trim(),
          stderr: stderr.trim()
        });
      });
    });
  }

  async stream(cmd: string, args: readonly string[], options: StreamOptions = {}): Promise<StreamResult> {
    const { onOutput, signal } = options;
    if (signal?.aborted) {
      return { code: 130, output: "", aborted: true };
    }

    return new Promise((resolve, reject) => {
      const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
      let output = "";
      let aborted = false;

      const onAbort = (): void => {
        aborted = true;
        child.kill("SIGINT");
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const collect = (chunk: Buffer): void => {
        const text = chunk.toString();
        output = (output + text).slice(-OUTPUT_TAIL_LIMIT);
        onOutput?.(text);
      };
      child.stdout.on("data", collect);
      child.stderr.on("data", collect);

      child.on("error", (error) => {
        signal?.removeEventListener("abort", onAbort);
        reject(toRunnerError(cmd, error));
      });

      child.on("close", (code) => {
        signal?.removeEventListener("abort", onAbort);
        resolve({
          code: code ?? (aborted ? 130 : 1),
          output: output.trim(),
          aborted
        });
      });
    });
  }
}

function toRunnerError(cmd: string, error: Error): Error {
  if ("code" in error && error.code === "ENOENT") {
    return new UnavailableToolError(cmd, "executable not found on PATH");
  }
  return error;
}
