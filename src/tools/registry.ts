import { AuditTool } from "./auditTool.js";
import { InfoTool } from "./infoTool.js";
import { SearchTool } from "./searchTool.js";
import { TopPackagesTool } from "./topPackagesTool.js";
import { ConsoleTool } from "./types.js";

const TOOLS: readonly ConsoleTool[] = [new AuditTool(), new SearchTool(), new InfoTool(), new TopPackagesTool()];

export function listTools(): ConsoleTool[] {
  return [...TOOLS].sort((a, b) => a.metadata().order - b.metadata().order);
}

export function findToolByKey(key: string): ConsoleTool | undefined {
  return TOOLS.find((tool) => tool.metadata().key === key);
}
