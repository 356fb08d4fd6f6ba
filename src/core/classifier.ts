import { PackageRecord, Priority } from "../types.js";
import { CorrelatedEntry, compareBytes } from "./correlator.js";

export interface LedgerSummary {
  total: number;
  outdated: number;
  swapCandidates: number;
}

export function priorityOf(outdated: boolean, preReleaseName: string): Priority {
  if (outdated) {
    return 1;
  }
  return preReleaseName ? 2 : 3;
}

/** Assigns priorities and sorts by (priority, name, kind). The input is left untouched. */
export function rankLedger(entries: readonly CorrelatedEntry[]): PackageRecord[] {
  return entries
    .map((entry) => ({ ...entry, priority: priorityOf(entry.outdated, entry.preReleaseName) }))
    .sort(
      (a, b) =>
        a.priority - b.priority || compareBytes(a.name, b.name) || compareBytes(a.kind, b.kind)
    );
}

export function summarizeLedger(ledger: readonly PackageRecord[]): LedgerSummary {
  return {
    total: ledger.length,
    outdated: ledger.filter((record) => record.priority === 1).length,
    swapCandidates: ledger.filter((record) => record.preReleaseName !== "").length
  };
}
