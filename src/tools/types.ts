import { SessionContext } from "../core/auditSession.js";
import { PackageRecord } from "../types.js";

export interface ToolMetadata {
  id: string;
  /** Key that launches the tool from the console. */
  key: string;
  name: string;
  description: string;
  order: number;
}

/** What a tool may ask of the operator console. */
export interface ConsoleUi {
  confirm(message: string): Promise<boolean>;
  /** Resolves null when the operator cancels the input. */
  ask(label: string, initialValue?: string): Promise<string | null>;
  showLedger(ledger: readonly PackageRecord[]): void;
  showDetails(text: string): void;
  appendOutput(text: string): void;
  clearOutput(): void;
  setStatus(message: string): void;
  /** Runs a task that holds the console until it finishes. */
  runBlocking<T>(task: () => Promise<T>): Promise<T>;
  /**
   * Like `runBlocking`, but Ctrl-C aborts the signal handed to the task.
   * Only plan execution is interruptible.
   */
  runInterruptible<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T>;
}

export interface ConsoleTool {
  metadata(): ToolMetadata;
  run(context: SessionContext, ui: ConsoleUi): Promise<void>;
}
