import assert from "node:assert/strict";
import test from "node:test";
import { captureLogger, FakeFetcher, silentLogger } from "../testing/fakes";
import { fetchProductCatalog } from "./catalog";
import { ExtractionContext } from "./context";

const BASE = "https://shop.test";
const ENDPOINT = `${BASE}/products.json`;

test("fetchProductCatalog returns the products array verbatim", async () => {
  const products = [{ id: 1, title: "Tee", handle: "tee" }, { id: 2 }];
  const ctx = new ExtractionContext(BASE, new FakeFetcher({ [ENDPOINT]: JSON.stringify({ products }) }), silentLogger());

  assert.deepEqual(await fetchProductCatalog(ctx), products);
});

test("fetchProductCatalog is empty when the endpoint is unavailable", async () => {
  const fetcher = new FakeFetcher({});
  const ctx = new ExtractionContext(BASE, fetcher, silentLogger());

  assert.deepEqual(await fetchProductCatalog(ctx), []);
  assert.deepEqual(fetcher.requested, [ENDPOINT]);
});

test("fetchProductCatalog logs and returns nothing for a non-JSON payload", async () => {
  const { logger, lines } = captureLogger();
  const ctx = new ExtractionContext(BASE, new FakeFetcher({ [ENDPOINT]: "<html>store closed</html>" }), logger);

  assert.deepEqual(await fetchProductCatalog(ctx), []);
  const failure = lines.find((line) => line.message === "catalog_payload_invalid");
  assert.equal(failure?.level, "error");
  assert.equal(failure?.metadata?.endpoint, ENDPOINT);
});

test("fetchProductCatalog ignores payloads without a products array", async () => {
  const pages = { [ENDPOINT]: JSON.stringify({ products: "none" }) };
  const ctx = new ExtractionContext(BASE, new FakeFetcher(pages), silentLogger());

  assert.deepEqual(await fetchProductCatalog(ctx), []);
});
