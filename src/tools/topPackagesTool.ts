import { SessionContext } from "../core/auditSession.js";
import { formatTopPackages } from "../tui/format.js";
import { showPackageInfo } from "./infoTool.js";
import { pickByNumber } from "./searchTool.js";
import { ConsoleTool, ConsoleUi, ToolMetadata } from "./types.js";

export class TopPackagesTool implements ConsoleTool {
  metadata(): ToolMetadata {
    return {
      id: "top",
      key: "t",
      name: "Top Packages",
      description: "Most installed formulae over the last 30 days",
      order: 4
    };
  }

  async run(context: SessionContext, ui: ConsoleUi): Promise<void> {
    const { analytics } = context.config;
    if (!analytics.enabled) {
      ui.setStatus("Popular packages are disabled (--no-analytics).");
      return;
    }

    ui.setStatus("Fetching analytics data...");
    const packages = await ui.runBlocking(() => context.analytics.fetchTopPackages(analytics.limit));
    if (packages.length === 0) {
      ui.showDetails("Popular packages are unavailable right now.");
      ui.setStatus("No analytics data.");
      return;
    }

    ui.showDetails(`Top Homebrew packages (30 days):\n${formatTopPackages(packages)}`);
    ui.setStatus(`${packages.length} popular package(s).`);

    const choice = await ui.ask("Enter rank to see info (empty to go back)");
    const picked = pickByNumber(packages, choice);
    if (picked) {
      await showPackageInfo(context, ui, picked.name);
    } else if (choice?.trim()) {
      ui.setStatus("Invalid selection.");
    }
  }
}
