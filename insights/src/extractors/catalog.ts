import { ExtractionContext } from "./context";

function productsOf(payload: unknown): unknown {
  if (typeof payload === "object" && payload !== null && "products" in payload) {
    return payload.products;
  }
  return undefined;
}

/** The storefront's `/products.json` `products` array, verbatim. */
export async function fetchProductCatalog(ctx: ExtractionContext): Promise<unknown[]> {
  const endpoint = ctx.url("/products.json");
  const body = await ctx.fetchText("/products.json");
  if (body === null) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    ctx.logger.error("catalog_payload_invalid", {
      endpoint,
      error: error instanceof Error ? error.message : String(error)
    });
    return [];
  }

  const products = productsOf(parsed);
  if (!Array.isArray(products)) {
    ctx.logger.debug("catalog_products_missing", { endpoint });
    return [];
  }

  ctx.logger.debug("catalog_fetched", { endpoint, product_count: products.length });
  return products;
}
