import { describe, expect, it } from "vitest";
import { buildPlan } from "../src/core/planBuilder.js";
import { ExecutionReport } from "../src/core/planExecutor.js";
import { PlanStepFailure } from "../src/errors.js";
import { formatCount, formatLedgerRow, formatPackageInfo, formatReport, truncate } from "../src/tui/format.js";
import { PackageRecord } from "../src/types.js";

const record: PackageRecord = {
  name: "firefox",
  kind: "cask",
  localVersion: "126.0",
  stableVersion: "126.0",
  outdated: false,
  preReleaseName: "firefox@beta",
  preReleaseVersion: "127.0b3",
  priority: 2
};

describe("truncate", () => {
  it("cuts long text with an ellipsis", () => {
    expect(truncate("1.2.3_4", 10)).toBe("1.2.3_4");
    expect(truncate("2024.05.01,abcdef0123", 8)).toBe("2024.05…");
  });
});

describe("formatLedgerRow", () => {
  it("pads columns and appends the pre-release", () => {
    expect(formatLedgerRow(record)).toBe(
      `${"firefox".padEnd(28)} ${"cask".padEnd(8)} ${"126.0".padEnd(25)} ${"126.0".padEnd(25)} firefox@beta 127.0b3`
    );
  });

  it("drops trailing padding when there is no pre-release", () => {
    const row = formatLedgerRow({ ...record, preReleaseName: "", preReleaseVersion: "", priority: 3 });
    expect(row).toBe(`${"firefox".padEnd(28)} ${"cask".padEnd(8)} ${"126.0".padEnd(25)} 126.0`);
  });
});

describe("formatPackageInfo", () => {
  it("renders a formula summary", () => {
    expect(
      formatPackageInfo({
        kind: "formula",
        name: "wget",
        description: "Internet file retriever",
        homepage: "https://example.test/wget",
        version: "1.24.5",
        installed: [],
        license: "GPL-3.0-or-later"
      })
    ).toBe(
      [
        "Formula: wget",
        "Desc: Internet file retriever",
        "Homepage: https://example.test/wget",
        "Version: 1.24.5",
        "Installed: No",
        "License: GPL-3.0-or-later"
      ].join("\n")
    );
  });
});

describe("formatCount", () => {
  it("groups thousands", () => {
    expect(formatCount(403123)).toBe("403,123");
    expect(formatCount(999)).toBe("999");
  });
});

describe("formatReport", () => {
  const plan = buildPlan([record], { applyUpgrades: false, swapSelection: "all" });

  it("warns when a swap removal fails", () => {
    const step = plan[1];
    const failure = new PlanStepFailure(step, "brew uninstall --force firefox", 1, "");
    const report: ExecutionReport = {
      mode: "live",
      chain: "",
      ok: false,
      interrupted: false,
      steps: [],
      failure
    };

    expect(formatReport(report)).toBe(
      'Step "remove" failed with exit code 1: brew uninstall --force firefox. Packages may have been removed without their replacement.'
    );
  });

  it("names the start error of a step that could not run", () => {
    const failure = new PlanStepFailure(plan[2], "brew install firefox@beta", -1, "", "spawn EACCES");
    const report: ExecutionReport = { mode: "live", chain: "", ok: false, interrupted: false, steps: [], failure };

    expect(formatReport(report)).toBe('Step "install" could not run (spawn EACCES): brew install firefox@beta.');
  });

  it("counts completed steps on interrupt", () => {
    const report: ExecutionReport = {
      mode: "live",
      chain: "",
      ok: false,
      interrupted: true,
      steps: [
        { step: plan[0], status: "succeeded", code: 0 },
        { step: plan[1], status: "interrupted", code: 130 },
        { step: plan[2], status: "skipped" }
      ]
    };

    expect(formatReport(report)).toBe("Interrupted after 1 of 3 step(s). Completed steps were not rolled back.");
  });
});
