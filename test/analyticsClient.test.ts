import { describe, expect, it, vi } from "vitest";
import { AnalyticsClient, FetchLike, parseCount } from "../src/services/analyticsClient.js";
import { InventoryClient } from "../src/services/inventoryClient.js";
import { FakeRunner, fail, ok } from "./fakes.js";

const FEED_URL = "https://analytics.example.test/30d.json";

function feed(items: unknown[]): FetchLike {
  return vi.fn(async () => ({ ok: true, status: 200, json: async () => ({ items }) }));
}

describe("AnalyticsClient", () => {
  it("ranks feed items by count and adds descriptions from one brew info call", async () => {
    const runner = new FakeRunner(() =>
      ok(
        JSON.stringify({
          formulae: [
            { name: "git", desc: "Distributed revision control system" },
            { name: "wget", desc: "Internet file retriever" }
          ]
        })
      )
    );
    const fetchJson = feed([
      { formula: "wget", count: "1,234" },
      { formula: "git", count: "98,765" },
      { formula: "jq", count: 10 }
    ]);
    const client = new AnalyticsClient(new InventoryClient(runner), FEED_URL, fetchJson);

    const top = await client.fetchTopPackages(2);

    expect(fetchJson).toHaveBeenCalledWith(FEED_URL);
    expect(runner.calls).toEqual([{ cmd: "brew", args: ["info", "--json=v2", "wget", "git"] }]);
    expect(top).toEqual([
      { name: "git", description: "Distributed revision control system", count: 98765 },
      { name: "wget", description: "Internet file retriever", count: 1234 }
    ]);
  });

  it("keeps the feed when descriptions cannot be loaded", async () => {
    const runner = new FakeRunner(() => fail("offline"));
    const client = new AnalyticsClient(new InventoryClient(runner), FEED_URL, feed([{ formula: "jq", count: "7" }]));

    expect(await client.fetchTopPackages(5)).toEqual([{ name: "jq", description: "No description", count: 7 }]);
  });

  it("returns nothing when the feed fails", async () => {
    const runner = new FakeRunner();
    const fetchJson: FetchLike = async () => ({ ok: false, status: 503, json: async () => ({}) });
    const client = new AnalyticsClient(new InventoryClient(runner), FEED_URL, fetchJson);

    expect(await client.fetchTopPackages(5)).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  it("returns nothing when the feed has an unexpected shape", async () => {
    const runner = new FakeRunner();
    const client = new AnalyticsClient(new InventoryClient(runner), FEED_URL, feed([{ name: "wget" }]));

    expect(await client.fetchTopPackages(5)).toEqual([]);
  });
});

describe("parseCount", () => {
  it("strips thousands separators", () => {
    expect(parseCount("403,123")).toBe(403123);
    expect(parseCount(12)).toBe(12);
    expect(parseCount("n/a")).toBe(0);
  });
});
