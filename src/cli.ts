#!/usr/bin/env node
import { createSessionContext } from "./core/auditSession.js";
import { loadConfig, normalizeTerminalEnv } from "./config.js";
import { ConsoleLogger } from "./logger.js";
import { ShellCommandRunner } from "./services/commandRunner.js";
import { BrewSyncApp } from "./tui/app.js";

async function main(): Promise<void> {
  normalizeTerminalEnv();
  const config = loadConfig(process.argv.slice(2));
  const logger = new ConsoleLogger(config.logLevel);
  const context = createSessionContext(config, { runner: new ShellCommandRunner(), logger });
  const app = new BrewSyncApp(context);
  await app.start();
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`brewsync failed: ${message}`);
  process.exit(1);
});
