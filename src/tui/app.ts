import blessed from "blessed";
import { SessionContext } from "../core/auditSession.js";
import { UnavailableToolError, messageOf } from "../errors.js";
import { findToolByKey, listTools } from "../tools/registry.js";
import { ConsoleTool, ConsoleUi } from "../tools/types.js";
import { PackageRecord } from "../types.js";
import { formatLedgerHeader, formatLedgerRow, formatRecordDetails, formatTopPackages } from "./format.js";

const INSTALL_HINT =
  "Homebrew is not installed or could not be started.\n\n" +
  "Install it with:\n" +
  '/bin/bash -c "$(curl -fsSL https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh)"';

export class BrewSyncApp implements ConsoleUi {
  private readonly screen = blessed.screen({
    smartCSR: true,
    fullUnicode: true,
    title: "brewsync"
  });

  private readonly header = blessed.box({
    parent: this.screen,
    top: 0,
    left: 1,
    width: "60%-1",
    height: 1,
    tags: false,
    content: formatLedgerHeader()
  });

  private readonly list = blessed.list({
    parent: this.screen,
    top: 1,
    left: 0,
    width: "60%",
    height: "88%-1",
    border: "line",
    label: " Packages ",
    tags: true,
    keys: false,
    vi: false,
    mouse: true,
    scrollbar: {
      ch: " "
    },
    style: {
      selected: {
        bg: "blue",
        fg: "white"
      }
    }
  });

  private readonly details = blessed.box({
    parent: this.screen,
    top: 0,
    left: "60%",
    width: "40%",
    height: "44%",
    border: "line",
    label: " Details ",
    tags: false,
    scrollable: true,
    alwaysScroll: true,
    keys: false,
    mouse: true,
    vi: true,
    content: "Press a to audit installed packages."
  });

  private readonly output = blessed.log({
    parent: this.screen,
    top: "44%",
    left: "60%",
    width: "40%",
    height: "44%",
    border: "line",
    label: " Output ",
    tags: false,
    scrollable: true,
    scrollback: 2000,
    mouse: true
  });

  private readonly footer = blessed.box({
    parent: this.screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: "12%",
    border: "line",
    tags: false,
    content: ""
  });

  private readonly question = blessed.question({
    parent: this.screen,
    border: "line",
    height: 8,
    width: "70%",
    top: "center",
    left: "center",
    label: " Confirm ",
    tags: false,
    keys: true,
    vi: true
  });

  private readonly prompt = blessed.prompt({
    parent: this.screen,
    border: "line",
    height: 9,
    width: "70%",
    top: "center",
    left: "center",
    label: " Input ",
    tags: false,
    keys: true,
    vi: true
  });

  private readonly tools: ConsoleTool[] = listTools();
  private readonly keyHints: string;
  private ledger: readonly PackageRecord[] = [];
  private activeTool: ConsoleTool | undefined;
  private busy: { controller?: AbortController } | undefined;
  private unavailable = false;

  constructor(private readonly context: SessionContext) {
    this.keyHints = [
      ...this.tools.map((tool) => `${tool.metadata().key}:${tool.metadata().name}`),
      "q:quit"
    ].join("  ");
    if (context.config.dryRun) {
      this.keyHints += "  [dry run]";
    }
  }

  async start(): Promise<void> {
    this.context.logger.setSink((_level, line) => this.appendOutput(line));
    this.bindKeys();
    this.setStatus("Ready.");
    this.screen.render();
    await this.loadDashboard();
  }

  confirm(message: string): Promise<boolean> {
    return new Promise((resolve) => {
      (this.question as unknown as { ask: (msg: string, cb: (...args: unknown[]) => void) => void }).ask(
        message,
        (...args: unknown[]) => {
          const answer = args[args.length - 1];
          resolve(Boolean(answer));
        }
      );
    });
  }

  ask(label: string, initialValue = ""): Promise<string | null> {
    return new Promise((resolve) => {
      (
        this.prompt as unknown as {
          input: (msg: string, value: string, cb: (err: unknown, result: string | null) => void) => void;
        }
      ).input(`${label}:`, initialValue, (_err: unknown, value: string | null) => {
        resolve(value ?? null);
      });
    });
  }

  showLedger(ledger: readonly PackageRecord[]): void {
    this.ledger = ledger;
    if (ledger.length === 0) {
      this.list.setItems(["(empty)"]);
      this.list.select(0);
      this.details.setContent("No installed packages found.");
    } else {
      this.list.setItems(ledger.map(colorRow));
      this.list.select(0);
      this.renderSelectedDetails();
    }
    this.screen.render();
  }

  showDetails(text: string): void {
    this.details.setContent(text);
    this.details.setScrollPerc(0);
    this.screen.render();
  }

  appendOutput(text: string): void {
    for (const line of text.split("\n")) {
      this.output.add(line);
    }
    this.screen.render();
  }

  clearOutput(): void {
    this.output.setContent("");
    this.screen.render();
  }

  setStatus(message: string): void {
    this.footer.setContent(`${this.keyHints}\n${message}`);
    this.screen.render();
  }

  async runBlocking<T>(task: () => Promise<T>): Promise<T> {
    this.busy = {};
    try {
      return await task();
    } finally {
      this.busy = undefined;
    }
  }

  async runInterruptible<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    this.busy = { controller };
    try {
      return await task(controller.signal);
    } finally {
      this.busy = undefined;
    }
  }

  private bindKeys(): void {
    this.screen.key(["C-c"], () => {
      if (this.busy?.controller) {
        this.busy.controller.abort();
        this.setStatus("Interrupting...");
        return;
      }
      if (this.busy) {
        this.setStatus("Please wait; Ctrl-C only interrupts a running plan.");
        return;
      }
      this.quit();
    });

    this.screen.key(["q"], () => {
      if (!this.activeTool && !this.busy) {
        this.quit();
      }
    });

    this.screen.key(["j", "down"], () => this.moveSelection(1));
    this.screen.key(["k", "up"], () => this.moveSelection(-1));

    this.screen.key(this.tools.map((tool) => tool.metadata().key), (_ch, key) => {
      const tool = findToolByKey(key.full);
      if (tool) {
        void this.launch(tool);
      }
    });

    this.list.on("select", () => {
      this.renderSelectedDetails();
      this.screen.render();
    });
  }

  private async launch(tool: ConsoleTool): Promise<void> {
    if (this.activeTool || this.busy) {
      return;
    }
    if (this.unavailable) {
      this.setStatus("Homebrew is unavailable. Press q to quit.");
      return;
    }

    this.activeTool = tool;
    try {
      await tool.run(this.context, this);
    } catch (error) {
      this.onError(error);
    } finally {
      this.activeTool = undefined;
      this.screen.render();
    }
  }

  private async loadDashboard(): Promise<void> {
    const { analytics } = this.context.config;
    if (!analytics.enabled) {
      return;
    }

    try {
      this.setStatus("Loading popular packages...");
      const top = await this.runBlocking(() => this.context.analytics.fetchTopPackages(analytics.limit));
      if (top.length > 0) {
        this.showDetails(`Popular packages (30 days):\n${formatTopPackages(top)}\n\nPress a to audit installed packages.`);
      }
      this.setStatus("Ready.");
    } catch (error) {
      this.onError(error);
    }
  }

  private moveSelection(delta: number): void {
    if (this.ledger.length === 0 || this.activeTool) {
      return;
    }

    const next = Math.max(0, Math.min(this.ledger.length - 1, this.selectedIndex() + delta));
    this.list.select(next);
    this.renderSelectedDetails();
    this.screen.render();
  }

  private renderSelectedDetails(): void {
    const record = this.ledger[this.selectedIndex()];
    if (record) {
      this.details.setContent(formatRecordDetails(record));
    }
  }

  private selectedIndex(): number {
    const list = this.list as unknown as { selected?: number };
    return list.selected ?? 0;
  }

  private onError(error: unknown): void {
    if (error instanceof UnavailableToolError) {
      this.unavailable = true;
      this.showDetails(INSTALL_HINT);
    }
    this.context.logger.error(messageOf(error));
    this.setStatus(`Error: ${messageOf(error)}`);
  }

  private quit(): void {
    this.screen.destroy();
    process.exit(0);
  }
}

function colorRow(record: PackageRecord): string {
  const row = escapeTags(formatLedgerRow(record));
  if (record.priority === 1) {
    return `{yellow-fg}{bold}${row}{/bold}{/yellow-fg}`;
  }
  if (record.priority === 2) {
    return `{green-fg}${row}{/green-fg}`;
  }
  return `{gray-fg}${row}{/gray-fg}`;
}

function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}
