export type PackageKind = "formula" | "cask";

export type Priority = 1 | 2 | 3;

export const NOT_INSTALLED = "not installed";
export const UNKNOWN_VERSION = "unknown";

export interface InstalledEntry {
  name: string;
  kind: PackageKind;
  localVersion: string;
  stableVersion: string;
  outdated: boolean;
}

export interface PackageRecord extends InstalledEntry {
  preReleaseName: string;
  preReleaseVersion: string;
  /** Kind of the pre-release candidate, when the search listed it under a section. */
  preReleaseKind?: PackageKind;
  priority: Priority;
}

/** Pre-release names found by search, with the section each one was listed under. */
export type PreReleaseCandidates = ReadonlyMap<string, PackageKind | undefined>;

export interface ParsedInventory {
  entries: InstalledEntry[];
  errors: string[];
}

export interface PackageInfo {
  kind: PackageKind;
  name: string;
  description: string;
  homepage: string;
  version: string;
  installed: string[];
  license?: string;
}

export interface TopPackage {
  name: string;
  description: string;
  count: number;
}

export type StepName = "refresh" | "upgrade" | "remove" | "install" | "cleanup" | "doctor";

export interface PlanStep {
  name: StepName;
  description: string;
  command: string;
  args: readonly string[];
  mustNotFail: boolean;
}

export type CommandPlan = readonly PlanStep[];

export type SwapSelection = "all" | "none" | ReadonlySet<string>;

export interface OperatorDecisions {
  applyUpgrades: boolean;
  swapSelection: SwapSelection;
}

export type ExecutionMode = "dry-run" | "live";

export type StepStatus = "succeeded" | "failed" | "skipped" | "interrupted";

export interface StepOutcome {
  step: PlanStep;
  status: StepStatus;
  code?: number;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandExecutor {
  run(cmd: string, args: readonly string[]): Promise<CommandResult>;
}

export interface StreamOptions {
  onOutput?: (chunk: string) => void;
  signal?: AbortSignal;
}

export interface StreamResult {
  code: number;
  output: string;
  aborted: boolean;
}

export interface StreamingExecutor extends CommandExecutor {
  stream(cmd: string, args: readonly string[], options?: StreamOptions): Promise<StreamResult>;
}
