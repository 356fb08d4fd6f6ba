import { CommandPlan, OperatorDecisions, PackageKind, PackageRecord, PlanStep, SwapSelection } from "../types.js";

const DECLINE_WORDS = new Set(["", "n", "no", "none"]);
const SAFE_ARG_RE = /^[A-Za-z0-9@%+=:,./_-]+$/;

export interface SwapTargets {
  records: PackageRecord[];
  unmatched: string[];
}

export function parseSwapSelection(input: string): SwapSelection {
  const normalized = input.trim();
  const lowered = normalized.toLowerCase();
  if (lowered === "all") {
    return "all";
  }
  if (DECLINE_WORDS.has(lowered)) {
    return "none";
  }
  return new Set(normalized.split(/\s+/));
}

/**
 * Records selected for a pre-release swap. A selection token may name either the
 * installed package or its pre-release counterpart; records without a
 * pre-release match are never selected. A name installed as both a formula and
 * a cask yields one record: the one whose kind matches its candidate, otherwise
 * the first in ledger order.
 */
export function resolveSwapTargets(ledger: readonly PackageRecord[], selection: SwapSelection): SwapTargets {
  const swappable = ledger.filter((record) => record.preReleaseName !== "");
  if (selection === "none") {
    return { records: [], unmatched: [] };
  }
  if (selection === "all") {
    return { records: onePerName(swappable), unmatched: [] };
  }

  const records = onePerName(
    swappable.filter((record) => selection.has(record.name) || selection.has(record.preReleaseName))
  );
  const unmatched = [...selection].filter(
    (token) => !records.some((record) => record.name === token || record.preReleaseName === token)
  );
  return { records, unmatched };
}

export function buildPlan(
  ledger: readonly PackageRecord[],
  decisions: OperatorDecisions,
  brewBin = "brew"
): CommandPlan {
  const steps: PlanStep[] = [
    step(brewBin, "refresh", "Refresh package definitions", ["update"])
  ];

  if (decisions.applyUpgrades && ledger.some((record) => record.priority === 1)) {
    steps.push(step(brewBin, "upgrade", "Upgrade every outdated package", ["upgrade", "--greedy"]));
  }

  const targets = resolveSwapTargets(ledger, decisions.swapSelection).records;
  if (targets.length > 0) {
    // Removal must finish before the replacement from the same family can install.
    steps.push(
      step(
        brewBin,
        "remove",
        "Remove packages being swapped",
        [
          "uninstall",
          "--force",
          ...kindFlag(targets.map((record) => record.kind)),
          ...targets.map((record) => record.name)
        ],
        true
      )
    );
    // One invocation takes a single kind flag, so mixed or unknown candidate kinds go without one.
    steps.push(
      step(brewBin, "install", "Install pre-release variants", [
        "install",
        ...kindFlag(targets.map((record) => record.preReleaseKind)),
        ...new Set(targets.map((record) => record.preReleaseName))
      ])
    );
  }

  steps.push(step(brewBin, "cleanup", "Remove stale downloads and old versions", ["cleanup", "-s"]));
  steps.push(step(brewBin, "doctor", "Run Homebrew diagnostics", ["doctor"]));

  return Object.freeze(steps.map((entry) => Object.freeze(entry)));
}

export function renderStep(planStep: PlanStep): string {
  return [planStep.command, ...planStep.args].map(quoteArg).join(" ");
}

/** The whole plan as one short-circuiting shell chain, exactly as it will run. */
export function renderPlan(plan: CommandPlan): string {
  return plan.map(renderStep).join(" && ");
}

function step(
  command: string,
  name: PlanStep["name"],
  description: string,
  args: string[],
  mustNotFail = false
): PlanStep {
  return { name, description, command, args: Object.freeze([...args]), mustNotFail };
}

function onePerName(records: readonly PackageRecord[]): PackageRecord[] {
  const byName = new Map<string, PackageRecord>();
  for (const record of records) {
    const kept = byName.get(record.name);
    if (!kept || (kept.kind !== kept.preReleaseKind && record.kind === record.preReleaseKind)) {
      byName.set(record.name, record);
    }
  }
  return records.filter((record) => byName.get(record.name) === record);
}

function kindFlag(kinds: ReadonlyArray<PackageKind | undefined>): string[] {
  if (kinds.length > 0 && kinds.every((kind) => kind === "cask")) {
    return ["--cask"];
  }
  if (kinds.length > 0 && kinds.every((kind) => kind === "formula")) {
    return ["--formula"];
  }
  return [];
}

function quoteArg(arg: string): string {
  if (SAFE_ARG_RE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
