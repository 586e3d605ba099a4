import assert from "node:assert/strict";
import test from "node:test";
import { FakeFetcher, silentLogger } from "../testing/fakes";
import { ExtractionContext } from "./context";

const BASE = "https://shop.test";

test("ExtractionContext fetches the homepage once per run", async () => {
  const fetcher = new FakeFetcher({ [BASE]: "<html><body>home</body></html>" });
  const ctx = new ExtractionContext(BASE, fetcher, silentLogger());

  const [first, second] = await Promise.all([ctx.homepage(), ctx.homepage()]);
  const third = await ctx.homepage();

  assert.equal(first, "<html><body>home</body></html>");
  assert.equal(second, first);
  assert.equal(third, first);
  assert.deepEqual(fetcher.requested, [BASE]);
});

test("ExtractionContext remembers an unavailable homepage as null", async () => {
  const fetcher = new FakeFetcher({});
  const ctx = new ExtractionContext(BASE, fetcher, silentLogger());

  assert.equal(await ctx.homepage(), null);
  assert.equal(await ctx.homepage(), null);
  assert.deepEqual(fetcher.requested, [BASE]);
});

test("fetchText resolves paths against the base URL", async () => {
  const fetcher = new FakeFetcher({ [`${BASE}/pages/faq`]: "faq body" });
  const ctx = new ExtractionContext(`${BASE}/`, fetcher, silentLogger());

  assert.equal(ctx.url("/pages/faq"), "https://shop.test/pages/faq");
  assert.equal(await ctx.fetchText("/pages/faq"), "faq body");
  assert.equal(await ctx.fetchText("pages/missing"), null);
  assert.deepEqual(fetcher.requested, ["https://shop.test/pages/faq", "https://shop.test/pages/missing"]);
});
