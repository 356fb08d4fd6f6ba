import { PlanStep } from "./types.js";

export type ErrorCode = "UNAVAILABLE_TOOL" | "FETCH_FAILED" | "PLAN_STEP_FAILED" | "CONFIG_INVALID";

export class BrewSyncError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "BrewSyncError";
  }
}

/** The package manager binary cannot be run at all. Fatal for the session. */
export class UnavailableToolError extends BrewSyncError {
  constructor(
    public readonly tool: string,
    detail?: string
  ) {
    super(`${tool} is not available${detail ? `: ${detail}` : ""}`, "UNAVAILABLE_TOOL");
    this.name = "UnavailableToolError";
  }
}

/** One inventory or metadata call failed or returned output that could not be parsed. */
export class FetchError extends BrewSyncError {
  constructor(
    public readonly operation: string,
    detail: string
  ) {
    super(`${operation} failed: ${detail}`, "FETCH_FAILED");
    this.name = "FetchError";
  }
}

/** A plan step that exited non-zero, or that could not be started at all (`startError`, exit code -1). */
export class PlanStepFailure extends BrewSyncError {
  constructor(
    public readonly step: PlanStep,
    public readonly commandLine: string,
    public readonly exitCode: number,
    public readonly output: string,
    public readonly startError?: string
  ) {
    super(
      startError
        ? `Step "${step.name}" could not run (${startError}): ${commandLine}`
        : `Step "${step.name}" exited with code ${exitCode}: ${commandLine}`,
      "PLAN_STEP_FAILED"
    );
    this.name = "PlanStepFailure";
  }
}

export class ConfigError extends BrewSyncError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
