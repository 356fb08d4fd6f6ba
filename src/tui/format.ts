import { ExecutionReport } from "../core/planExecutor.js";
import { PackageInfo, PackageRecord, TopPackage } from "../types.js";

export const MAX_VERSION_WIDTH = 25;
const NAME_WIDTH = 28;
const KIND_WIDTH = 8;

export function truncate(text: string, limit: number): string {
  if (text.length > limit) {
    return `${text.slice(0, limit - 1)}…`;
  }
  return text;
}

export function formatLedgerHeader(): string {
  return [
    "App Name".padEnd(NAME_WIDTH),
    "Type".padEnd(KIND_WIDTH),
    "Your Ver".padEnd(MAX_VERSION_WIDTH),
    "Stable".padEnd(MAX_VERSION_WIDTH),
    "Avail Beta"
  ].join(" ");
}

export function formatLedgerRow(record: PackageRecord): string {
  const preRelease = record.preReleaseName
    ? `${record.preReleaseName} ${truncate(record.preReleaseVersion, MAX_VERSION_WIDTH)}`
    : "";
  return [
    truncate(record.name, NAME_WIDTH).padEnd(NAME_WIDTH),
    record.kind.padEnd(KIND_WIDTH),
    truncate(record.localVersion, MAX_VERSION_WIDTH).padEnd(MAX_VERSION_WIDTH),
    truncate(record.stableVersion, MAX_VERSION_WIDTH).padEnd(MAX_VERSION_WIDTH),
    preRelease
  ]
    .join(" ")
    .trimEnd();
}

export function formatRecordDetails(record: PackageRecord): string {
  const tier = record.priority === 1 ? "update available" : record.priority === 2 ? "pre-release available" : "up to date";
  const lines = [
    `Name: ${record.name}`,
    `Type: ${record.kind}`,
    `Installed: ${record.localVersion}`,
    `Stable: ${record.stableVersion}`,
    `Status: ${tier}`
  ];
  if (record.preReleaseName) {
    lines.push(`Pre-release: ${record.preReleaseName} (${record.preReleaseVersion})`);
  }
  return lines.join("\n");
}

export function formatPackageInfo(info: PackageInfo): string {
  const lines = [
    `${info.kind === "formula" ? "Formula" : "Cask"}: ${info.name}`,
    `Desc: ${info.description}`,
    `Homepage: ${info.homepage || "-"}`,
    `Version: ${info.version}`,
    `Installed: ${info.installed.length > 0 ? info.installed.join(", ") : "No"}`
  ];
  if (info.license) {
    lines.push(`License: ${info.license}`);
  }
  return lines.join("\n");
}

export function formatNumberedList(names: readonly string[]): string {
  const width = String(names.length).length;
  return names.map((name, index) => `${String(index + 1).padStart(width)}. ${name}`).join("\n");
}

export function formatTopPackages(packages: readonly TopPackage[]): string {
  const width = String(packages.length).length;
  return packages
    .map(
      (pkg, index) =>
        `${String(index + 1).padStart(width)}. ${pkg.name.padEnd(20)} ${formatCount(pkg.count).padStart(11)}  ${truncate(pkg.description, 50)}`
    )
    .join("\n");
}

export function formatCount(count: number): string {
  return String(Math.trunc(count)).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

export function formatReport(report: ExecutionReport): string {
  if (report.mode === "dry-run") {
    return "[Dry run] Plan not executed.";
  }
  if (report.interrupted) {
    const done = report.steps.filter((outcome) => outcome.status === "succeeded").length;
    return `Interrupted after ${done} of ${report.steps.length} step(s). Completed steps were not rolled back.`;
  }
  if (report.failure) {
    const { step, startError, exitCode, commandLine } = report.failure;
    const critical = step.mustNotFail ? " Packages may have been removed without their replacement." : "";
    const reason = startError ? `could not run (${startError})` : `failed with exit code ${exitCode}`;
    return `Step "${step.name}" ${reason}: ${commandLine}.${critical}`;
  }
  return `All ${report.steps.length} step(s) completed.`;
}
