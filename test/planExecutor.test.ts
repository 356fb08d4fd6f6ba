import { describe, expect, it } from "vitest";
import { buildPlan } from "../src/core/planBuilder.js";
import { PlanExecutor } from "../src/core/planExecutor.js";
import { UnavailableToolError } from "../src/errors.js";
import { PackageRecord } from "../src/types.js";
import { FakeRunner } from "./fakes.js";

const ledger: PackageRecord[] = [
  {
    name: "firefox",
    kind: "cask",
    localVersion: "126.0",
    stableVersion: "126.0",
    outdated: false,
    preReleaseName: "firefox@beta",
    preReleaseVersion: "127.0b3",
    preReleaseKind: "cask",
    priority: 2
  }
];

const plan = buildPlan(ledger, { applyUpgrades: false, swapSelection: "all" });

describe("PlanExecutor", () => {
  it("makes no invocations in dry-run mode and returns the chain", async () => {
    const runner = new FakeRunner();
    const executor = new PlanExecutor(runner);

    const report = await executor.execute(plan, { mode: "dry-run" });

    expect(runner.calls).toEqual([]);
    expect(runner.streamCalls).toEqual([]);
    expect(report.chain).toBe(
      "brew update && brew uninstall --force --cask firefox && brew install --cask firefox@beta && brew cleanup -s && brew doctor"
    );
    expect(report.ok).toBe(true);
    expect(report.steps.map((outcome) => outcome.status)).toEqual([
      "skipped",
      "skipped",
      "skipped",
      "skipped",
      "skipped"
    ]);
  });

  it("runs every step in order and streams output", async () => {
    const chunks: string[] = [];
    const runner = new FakeRunner(undefined, (_cmd, args, options) => {
      options.onOutput?.(`ran ${args[0]}\n`);
      return { code: 0, output: `ran ${args[0]}`, aborted: false };
    });
    const executor = new PlanExecutor(runner);

    const report = await executor.execute(plan, { mode: "live", onOutput: (chunk) => chunks.push(chunk) });

    expect(runner.streamCalls.map((call) => call.args[0])).toEqual(["update", "uninstall", "install", "cleanup", "doctor"]);
    expect(chunks).toEqual(["ran update\n", "ran uninstall\n", "ran install\n", "ran cleanup\n", "ran doctor\n"]);
    expect(report.ok).toBe(true);
    expect(report.failure).toBeUndefined();
  });

  it("stops at the first failing step and reports it", async () => {
    const runner = new FakeRunner(undefined, (_cmd, args) =>
      args[0] === "uninstall"
        ? { code: 1, output: "Error: Directory not empty", aborted: false }
        : { code: 0, output: "", aborted: false }
    );
    const executor = new PlanExecutor(runner);

    const report = await executor.execute(plan, { mode: "live" });

    expect(runner.streamCalls.map((call) => call.args[0])).toEqual(["update", "uninstall"]);
    expect(report.ok).toBe(false);
    expect(report.steps.map((outcome) => outcome.status)).toEqual([
      "succeeded",
      "failed",
      "skipped",
      "skipped",
      "skipped"
    ]);
    expect(report.failure?.step.name).toBe("remove");
    expect(report.failure?.exitCode).toBe(1);
    expect(report.failure?.commandLine).toBe("brew uninstall --force --cask firefox");
    expect(report.failure?.output).toBe("Error: Directory not empty");
  });

  it("marks an interrupted step and skips the rest", async () => {
    const controller = new AbortController();
    const runner = new FakeRunner(undefined, (_cmd, args) => {
      if (args[0] === "install") {
        controller.abort();
        return { code: 130, output: "", aborted: true };
      }
      return { code: 0, output: "", aborted: false };
    });
    const executor = new PlanExecutor(runner);

    const report = await executor.execute(plan, { mode: "live", signal: controller.signal });

    expect(report.interrupted).toBe(true);
    expect(report.ok).toBe(false);
    expect(report.failure).toBeUndefined();
    expect(report.steps.map((outcome) => outcome.status)).toEqual([
      "succeeded",
      "succeeded",
      "interrupted",
      "skipped",
      "skipped"
    ]);
  });

  it("records a step that cannot be spawned as failed and keeps earlier outcomes", async () => {
    const runner = new FakeRunner(undefined, (_cmd, args) => {
      if (args[0] === "install") {
        throw new Error("spawn EACCES");
      }
      return { code: 0, output: "", aborted: false };
    });
    const executor = new PlanExecutor(runner);

    const report = await executor.execute(plan, { mode: "live" });

    expect(runner.streamCalls.map((call) => call.args[0])).toEqual(["update", "uninstall", "install"]);
    expect(report.ok).toBe(false);
    expect(report.steps.map((outcome) => outcome.status)).toEqual([
      "succeeded",
      "succeeded",
      "failed",
      "skipped",
      "skipped"
    ]);
    expect(report.failure?.step.name).toBe("install");
    expect(report.failure?.startError).toBe("spawn EACCES");
    expect(report.failure?.message).toBe('Step "install" could not run (spawn EACCES): brew install --cask firefox@beta');
  });

  it("propagates a missing brew binary", async () => {
    const runner = new FakeRunner(undefined, () => {
      throw new UnavailableToolError("brew");
    });
    const executor = new PlanExecutor(runner);

    await expect(executor.execute(plan, { mode: "live" })).rejects.toBeInstanceOf(UnavailableToolError);
  });
});
