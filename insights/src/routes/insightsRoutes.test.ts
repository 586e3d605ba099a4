import assert from "node:assert/strict";
import { Server } from "node:http";
import test from "node:test";
import { z } from "zod";
import { createApp } from "../app";
import { parseConfig } from "../config";
import { FakeFetcher, MemoryRepository, silentLogger } from "../testing/fakes";
import { InsightsService } from "../services/insights";
import { BrandInsights, BrandInsightsSchema } from "../types";

const BASE = "https://shop.test";

const pages = {
  [`${BASE}/products.json`]: JSON.stringify({
    products: [
      { id: 1, title: "Tee", handle: "tee", variants: [{ price: "19.99" }] },
      { id: 2, title: "Cap", handle: "cap", variants: [{ price: "9.50" }] }
    ]
  }),
  [BASE]: '<html><head><meta name="description" content="Great products"></head><body></body></html>'
};

const healthSchema = z.object({ ok: z.boolean(), persistence: z.string() });

class FailingRepository extends MemoryRepository {
  async replaceBrandInsights(_baseUrl: string, _insights: BrandInsights): Promise<void> {
    throw new Error("connection refused");
  }
}

async function withServer(
  repository: MemoryRepository,
  run: (baseUrl: string) => Promise<void>
): Promise<void> {
  const service = new InsightsService(parseConfig({}), repository, {
    fetcher: new FakeFetcher(pages),
    logger: silentLogger()
  });
  const app = createApp(service, silentLogger());
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });

  try {
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("GET / and /health describe the service", async () => {
  await withServer(new MemoryRepository(), async (server) => {
    const root = await fetch(`${server}/`);
    assert.equal(root.status, 200);
    assert.deepEqual(await root.json(), { message: "Storefront insights service is running." });

    const health = await fetch(`${server}/health`);
    assert.equal(health.status, 200);
    const payload = healthSchema.parse(await health.json());
    assert.equal(payload.ok, true);
    assert.equal(payload.persistence, "enabled");
  });
});

test("POST /fetch-insights maps failures to status codes", async () => {
  await withServer(new MemoryRepository(), async (server) => {
    const missing = await postJson(`${server}/fetch-insights`, {});
    assert.equal(missing.status, 400);

    const malformed = await postJson(`${server}/fetch-insights`, { website_url: "not a url" });
    assert.equal(malformed.status, 400);
    assert.deepEqual(await malformed.json(), { error: "Invalid website_url format." });

    const unknown = await postJson(`${server}/fetch-insights`, { website_url: "closed.test" });
    assert.equal(unknown.status, 401);
    assert.deepEqual(await unknown.json(), { error: "Website not found or no products available." });
  });

  await withServer(new FailingRepository(), async (server) => {
    const failed = await postJson(`${server}/fetch-insights`, { website_url: "shop.test" });
    assert.equal(failed.status, 500);
    assert.deepEqual(await failed.json(), { error: "Internal server error. Please try again later." });
  });
});

test("POST /fetch-insights returns the snapshot and GET /insights pages through it", async () => {
  const repository = new MemoryRepository();
  await withServer(repository, async (server) => {
    const fetched = await postJson(`${server}/fetch-insights`, { website_url: "shop.test" });
    assert.equal(fetched.status, 200);
    const insights = BrandInsightsSchema.parse(await fetched.json());
    assert.equal(insights.product_catalog.length, 2);
    assert.equal(insights.brand_text, "Great products");

    const page = await fetch(`${server}/insights?website_url=shop.test&limit=1&offset=1`);
    assert.equal(page.status, 200);
    const paged = BrandInsightsSchema.parse(await page.json());
    assert.deepEqual(
      paged.product_catalog.map((product) => product.title),
      ["Cap"]
    );
    assert.deepEqual(repository.queries, [{ limit: 1, offset: 1, faq_limit: 20, faq_offset: 0 }]);

    const absent = await fetch(`${server}/insights?website_url=other.test`);
    assert.equal(absent.status, 404);
    assert.deepEqual(await absent.json(), { error: "No insights found for this website_url." });

    const invalid = await fetch(`${server}/insights?website_url=shop.test&limit=0`);
    assert.equal(invalid.status, 400);
  });
});
