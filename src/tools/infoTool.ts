import { SessionContext } from "../core/auditSession.js";
import { FetchError } from "../errors.js";
import { formatPackageInfo } from "../tui/format.js";
import { ConsoleTool, ConsoleUi, ToolMetadata } from "./types.js";

export class InfoTool implements ConsoleTool {
  metadata(): ToolMetadata {
    return {
      id: "info",
      key: "i",
      name: "Package Info",
      description: "Details for a single package",
      order: 3
    };
  }

  async run(context: SessionContext, ui: ConsoleUi): Promise<void> {
    const name = await ui.ask("Enter package name to look up");
    if (!name?.trim()) {
      ui.setStatus("Lookup canceled.");
      return;
    }
    await showPackageInfo(context, ui, name.trim());
  }
}

export async function showPackageInfo(context: SessionContext, ui: ConsoleUi, name: string): Promise<void> {
  ui.setStatus(`Fetching info for ${name}...`);
  try {
    const result = await ui.runBlocking(() => context.inventory.info(name));
    const text =
      result.packages.length > 0
        ? result.packages.map(formatPackageInfo).join("\n\n")
        : result.text || "(no output)";
    ui.showDetails(text);
    ui.setStatus(`Loaded info for ${name}.`);
  } catch (error) {
    if (!(error instanceof FetchError)) {
      throw error;
    }
    ui.showDetails(`Failed to fetch info for ${name}.`);
    ui.setStatus(`Error: ${error.message}`);
  }
}
