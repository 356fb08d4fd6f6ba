import { PlanStepFailure, UnavailableToolError, messageOf } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { CommandPlan, ExecutionMode, StepOutcome, StreamResult, StreamingExecutor } from "../types.js";
import { renderPlan, renderStep } from "./planBuilder.js";

export interface ExecuteOptions {
  mode: ExecutionMode;
  onOutput?: (chunk: string) => void;
  onStepStart?: (index: number, commandLine: string) => void;
  signal?: AbortSignal;
}

export interface ExecutionReport {
  mode: ExecutionMode;
  chain: string;
  ok: boolean;
  interrupted: boolean;
  steps: StepOutcome[];
  failure?: PlanStepFailure;
}

/**
 * Runs a plan one step at a time. The first failing or interrupted step ends
 * the run; the remaining steps are reported as skipped. Completed steps are
 * never rolled back.
 */
export class PlanExecutor {
  constructor(
    private readonly runner: StreamingExecutor,
    private readonly logger: Logger = silentLogger
  ) {}

  async execute(plan: CommandPlan, options: ExecuteOptions): Promise<ExecutionReport> {
    const chain = renderPlan(plan);

    if (options.mode === "dry-run") {
      this.logger.info("Dry run: plan not executed", { steps: plan.length });
      return {
        mode: "dry-run",
        chain,
        ok: true,
        interrupted: false,
        steps: plan.map((step): StepOutcome => ({ step, status: "skipped" }))
      };
    }

    const steps: StepOutcome[] = [];
    let failure: PlanStepFailure | undefined;
    let interrupted = false;

    for (const [index, step] of plan.entries()) {
      if (failure || interrupted) {
        steps.push({ step, status: "skipped" });
        continue;
      }

      const commandLine = renderStep(step);
      options.onStepStart?.(index, commandLine);
      this.logger.info(`Running step ${index + 1}/${plan.length}: ${commandLine}`);

      let result: StreamResult;
      try {
        result = await this.runner.stream(step.command, step.args, {
          onOutput: options.onOutput,
          signal: options.signal
        });
      } catch (error) {
        // A missing brew ends the session; any other spawn error fails only this step.
        if (error instanceof UnavailableToolError) {
          throw error;
        }
        failure = new PlanStepFailure(step, commandLine, -1, "", messageOf(error));
        steps.push({ step, status: "failed" });
        this.logger.error(failure.message, { mustNotFail: step.mustNotFail });
        continue;
      }

      if (result.aborted) {
        interrupted = true;
        steps.push({ step, status: "interrupted", code: result.code });
        this.logger.warn(`Interrupted during step "${step.name}"`);
        continue;
      }

      if (result.code !== 0) {
        failure = new PlanStepFailure(step, commandLine, result.code, result.output);
        steps.push({ step, status: "failed", code: result.code });
        this.logger.error(failure.message, { mustNotFail: step.mustNotFail });
        continue;
      }

      steps.push({ step, status: "succeeded", code: 0 });
    }

    const report: ExecutionReport = {
      mode: "live",
      chain,
      ok: !failure && !interrupted,
      interrupted,
      steps
    };
    if (failure) {
      report.failure = failure;
    }
    return report;
  }
}
