import { describe, expect, it } from "vitest";
import { priorityOf, rankLedger, summarizeLedger } from "../src/core/classifier.js";
import { CorrelatedEntry } from "../src/core/correlator.js";

function row(name: string, overrides: Partial<CorrelatedEntry> = {}): CorrelatedEntry {
  return {
    name,
    kind: "formula",
    localVersion: "1.0",
    stableVersion: "1.0",
    outdated: false,
    preReleaseName: "",
    preReleaseVersion: "",
    ...overrides
  };
}

describe("priorityOf", () => {
  it("ranks outdated first regardless of pre-release data", () => {
    expect(priorityOf(true, "")).toBe(1);
    expect(priorityOf(true, "foo-beta")).toBe(1);
  });

  it("ranks pre-release alternatives second and everything else third", () => {
    expect(priorityOf(false, "foo-beta")).toBe(2);
    expect(priorityOf(false, "")).toBe(3);
  });
});

describe("rankLedger", () => {
  it("orders update, then pre-release, then nominal", () => {
    const ledger = rankLedger([
      row("tool"),
      row("gadget", { preReleaseName: "gadget-beta" }),
      row("widget", { outdated: true })
    ]);

    expect(ledger.map((record) => [record.name, record.priority])).toEqual([
      ["widget", 1],
      ["gadget", 2],
      ["tool", 3]
    ]);
  });

  it("sorts names byte-wise within a tier and kind last", () => {
    const ledger = rankLedger([
      row("zsh"),
      row("Zoom", { kind: "cask" }),
      row("git", { kind: "cask" }),
      row("git"),
      row("awk")
    ]);

    expect(ledger.map((record) => `${record.kind}:${record.name}`)).toEqual([
      "cask:Zoom",
      "formula:awk",
      "cask:git",
      "formula:git",
      "formula:zsh"
    ]);
  });

  it("is stable under re-run and leaves the input untouched", () => {
    const input = [row("b", { outdated: true }), row("a")];

    const first = rankLedger(input);
    const second = rankLedger(input);

    expect(second).toEqual(first);
    expect(input.map((entry) => entry.name)).toEqual(["b", "a"]);
    expect("priority" in input[0]).toBe(false);
  });
});

describe("summarizeLedger", () => {
  it("counts outdated records and swap candidates", () => {
    const ledger = rankLedger([
      row("a", { outdated: true, preReleaseName: "a@beta" }),
      row("b", { preReleaseName: "b-dev" }),
      row("c")
    ]);

    expect(summarizeLedger(ledger)).toEqual({ total: 3, outdated: 1, swapCandidates: 2 });
  });
});
