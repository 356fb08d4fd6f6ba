import { z } from "zod";
import { UnavailableToolError, messageOf } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { TopPackage } from "../types.js";
import { InventoryClient } from "./inventoryClient.js";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string) => Promise<HttpResponseLike>;

const analyticsSchema = z.object({
  items: z.array(
    z.object({
      formula: z.string().min(1),
      count: z.union([z.string(), z.number()])
    })
  )
});

/** Popular-package feed. Advisory only: failures produce an empty list. */
export class AnalyticsClient {
  constructor(
    private readonly inventory: InventoryClient,
    private readonly url: string,
    private readonly fetchJson: FetchLike = (target) => fetch(target),
    private readonly logger: Logger = silentLogger
  ) {}

  async fetchTopPackages(limit: number): Promise<TopPackage[]> {
    let items: Array<{ name: string; count: number }>;
    try {
      const response = await this.fetchJson(this.url);
      if (!response.ok) {
        throw new Error(`analytics feed returned HTTP ${response.status}`);
      }
      const parsed = analyticsSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("analytics feed has an unexpected shape");
      }
      items = parsed.data.items
        .slice(0, limit)
        .map((item) => ({ name: item.formula, count: parseCount(item.count) }));
    } catch (error) {
      this.logger.warn(`Popular packages unavailable: ${messageOf(error)}`);
      return [];
    }

    if (items.length === 0) {
      return [];
    }

    let descriptions = new Map<string, string>();
    try {
      descriptions = await this.inventory.fetchDescriptions(items.map((item) => item.name));
    } catch (error) {
      if (!(error instanceof UnavailableToolError)) {
        throw error;
      }
      this.logger.warn(messageOf(error));
    }

    return items
      .map((item) => ({
        name: item.name,
        description: descriptions.get(item.name) ?? "No description",
        count: item.count
      }))
      .sort((a, b) => b.count - a.count);
  }
}

export function parseCount(value: string | number): number {
  if (typeof value === "number") {
    return value;
  }
  const parsed = Number(value.replace(/,/g, ""));
  return Number.isFinite(parsed) ? parsed : 0;
}
