import { SessionContext, buildLedger } from "../core/auditSession.js";
import { summarizeLedger } from "../core/classifier.js";
import { buildPlan, parseSwapSelection, renderPlan, resolveSwapTargets } from "../core/planBuilder.js";
import { formatReport } from "../tui/format.js";
import { OperatorDecisions } from "../types.js";
import { ConsoleTool, ConsoleUi, ToolMetadata } from "./types.js";

/** Audits installed packages, then walks the operator through one sync plan. */
export class AuditTool implements ConsoleTool {
  metadata(): ToolMetadata {
    return {
      id: "audit",
      key: "a",
      name: "Audit & Update",
      description: "Check for updates and pre-release alternatives",
      order: 1
    };
  }

  async run(context: SessionContext, ui: ConsoleUi): Promise<void> {
    ui.clearOutput();
    ui.setStatus("Scanning Homebrew system...");
    const { ledger, warnings } = await ui.runBlocking(() => buildLedger(context));
    ui.showLedger(ledger);
    for (const warning of warnings) {
      ui.appendOutput(`Warning: ${warning}`);
    }

    const summary = summarizeLedger(ledger);
    ui.setStatus(
      `${summary.total} package(s): ${summary.outdated} outdated, ${summary.swapCandidates} with a pre-release alternative.`
    );

    const decisions: OperatorDecisions = { applyUpgrades: false, swapSelection: "none" };

    if (summary.outdated > 0) {
      decisions.applyUpgrades = await ui.confirm(`Include upgrades for ${summary.outdated} outdated package(s)?`);
    } else {
      ui.appendOutput("System is up to date.");
    }

    if (summary.swapCandidates > 0) {
      const answer = await ui.ask(
        `Found ${summary.swapCandidates} possible pre-release swap(s). Names to swap (space separated), 'all' or 'no'`,
        "no"
      );
      decisions.swapSelection = parseSwapSelection(answer ?? "");
      const { unmatched } = resolveSwapTargets(ledger, decisions.swapSelection);
      if (unmatched.length > 0) {
        ui.appendOutput(`Ignoring names without a pre-release match: ${unmatched.join(", ")}`);
      }
    }

    const plan = buildPlan(ledger, decisions, context.config.brewBin);
    ui.appendOutput("Final command to run:");
    ui.appendOutput(renderPlan(plan));

    if (context.config.dryRun) {
      const report = await context.executor.execute(plan, { mode: "dry-run" });
      ui.setStatus(formatReport(report));
      return;
    }

    if (!(await ui.confirm("Run this now?"))) {
      ui.setStatus("Aborted.");
      return;
    }

    ui.appendOutput("Executing...");
    const report = await ui.runInterruptible((signal) =>
      context.executor.execute(plan, {
        mode: "live",
        signal,
        onOutput: (chunk) => ui.appendOutput(chunk.replace(/\n$/, "")),
        onStepStart: (index, commandLine) => ui.setStatus(`Step ${index + 1}/${plan.length}: ${commandLine}`)
      })
    );
    ui.setStatus(formatReport(report));
  }
}
