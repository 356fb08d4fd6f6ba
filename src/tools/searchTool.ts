import { SessionContext } from "../core/auditSession.js";
import { formatNumberedList } from "../tui/format.js";
import { showPackageInfo } from "./infoTool.js";
import { ConsoleTool, ConsoleUi, ToolMetadata } from "./types.js";

export class SearchTool implements ConsoleTool {
  metadata(): ToolMetadata {
    return {
      id: "search",
      key: "s",
      name: "Search Packages",
      description: "Find formulae and casks by name",
      order: 2
    };
  }

  async run(context: SessionContext, ui: ConsoleUi): Promise<void> {
    const query = await ui.ask("Enter search term");
    if (!query?.trim()) {
      ui.setStatus("Search canceled.");
      return;
    }

    ui.setStatus(`Searching for '${query.trim()}'...`);
    const results = await ui.runBlocking(() => context.inventory.search(query));
    if (results.length === 0) {
      ui.showDetails("No results found.");
      ui.setStatus("No results.");
      return;
    }

    ui.showDetails(`Search results for '${query.trim()}':\n${formatNumberedList(results)}`);
    ui.setStatus(`${results.length} result(s).`);

    const choice = await ui.ask("Enter number to see info (empty to go back)");
    const picked = pickByNumber(results, choice);
    if (picked) {
      await showPackageInfo(context, ui, picked);
    }
  }
}

export function pickByNumber<T>(items: readonly T[], input: string | null): T | undefined {
  const trimmed = input?.trim() ?? "";
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return items[Number(trimmed) - 1];
}
