import { AppConfig } from "../config.js";
import { FetchError, messageOf } from "../errors.js";
import { Logger } from "../logger.js";
import { AnalyticsClient, FetchLike } from "../services/analyticsClient.js";
import { InventoryClient } from "../services/inventoryClient.js";
import { InstalledEntry, PackageRecord, StreamingExecutor } from "../types.js";
import { rankLedger } from "./classifier.js";
import { applyPreReleaseVersions, collectLookupNames, correlate } from "./correlator.js";
import { PlanExecutor } from "./planExecutor.js";

/**
 * Everything one console session needs. Built when the session starts and
 * dropped when it ends; no ledger or plan outlives it.
 */
export interface SessionContext {
  config: AppConfig;
  logger: Logger;
  runner: StreamingExecutor;
  inventory: InventoryClient;
  analytics: AnalyticsClient;
  executor: PlanExecutor;
}

export interface SessionDeps {
  runner: StreamingExecutor;
  logger: Logger;
  fetchJson?: FetchLike;
}

export interface LedgerResult {
  ledger: PackageRecord[];
  warnings: string[];
  brewVersion: string;
}

export function createSessionContext(config: AppConfig, deps: SessionDeps): SessionContext {
  const inventory = new InventoryClient(deps.runner, config.brewBin, deps.logger);
  return {
    config,
    logger: deps.logger,
    runner: deps.runner,
    inventory,
    analytics: new AnalyticsClient(inventory, config.analytics.url, deps.fetchJson, deps.logger),
    executor: new PlanExecutor(deps.runner, deps.logger)
  };
}

/**
 * Re-derives the package ledger from the live system: installed inventory,
 * pre-release correlation, one batched version lookup, then ranking.
 */
export async function buildLedger(context: SessionContext): Promise<LedgerResult> {
  const { inventory, logger } = context;
  const warnings: string[] = [];

  const brewVersion = await inventory.checkAvailable();

  let entries: InstalledEntry[] = [];
  try {
    const installed = await inventory.fetchInstalled();
    entries = installed.entries;
    if (installed.errors.length > 0) {
      warnings.push(`${installed.errors.length} installed entr${installed.errors.length === 1 ? "y" : "ies"} could not be read`);
    }
  } catch (error) {
    if (!(error instanceof FetchError)) {
      throw error;
    }
    logger.warn(messageOf(error));
    warnings.push(error.message);
  }

  const candidates = await inventory.fetchPreReleaseNames();
  const correlated = correlate(entries, candidates);

  const lookupNames = collectLookupNames(correlated);
  const metadata = await inventory.fetchMetadata(lookupNames);
  if (lookupNames.length > 0 && metadata.size === 0) {
    warnings.push("Pre-release versions could not be looked up");
  }

  const ledger = rankLedger(applyPreReleaseVersions(correlated, metadata));
  logger.info("Ledger built", { packages: ledger.length, preReleaseLookups: lookupNames.length });
  return { ledger, warnings, brewVersion };
}
