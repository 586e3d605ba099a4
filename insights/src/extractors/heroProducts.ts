import { CheerioAPI, load } from "cheerio";
import type { Element } from "domhandler";
import { textOf } from "../lib/html";
import { dedupeBy, firstMatch, Strategy } from "../lib/strategy";
import { resolveHref } from "../lib/url";
import { RawHeroProduct } from "../types";
import { ExtractionContext } from "./context";

interface AnchorScope {
  $: CheerioAPI;
  anchor: Element;
}

function srcOf(value: string | undefined): string | null {
  return value && value.trim().length > 0 ? value : null;
}

// Image lookup around a product anchor, closest first.
const imageStrategies: ReadonlyArray<Strategy<AnchorScope, string>> = [
  ({ $, anchor }) => srcOf($(anchor).find("img").first().attr("src")),
  ({ $, anchor }) => srcOf($(anchor).parent().find("img").first().attr("src")),
  ({ $, anchor }) => srcOf($(anchor).next("img").attr("src"))
];

export function parseHeroProducts(html: string, baseUrl: string): RawHeroProduct[] {
  const $ = load(html);
  const products: RawHeroProduct[] = [];

  $("a[href]").each((_, anchor) => {
    const href = $(anchor).attr("href");
    if (!href || !href.includes("/products/")) {
      return;
    }
    products.push({
      title: textOf($(anchor)),
      url: resolveHref(baseUrl, href),
      image: firstMatch(imageStrategies, { $, anchor })
    });
  });

  return dedupeBy(products, (product) => product.url);
}

export async function fetchHeroProducts(ctx: ExtractionContext): Promise<RawHeroProduct[]> {
  const html = await ctx.homepage();
  if (html === null) {
    return [];
  }
  const products = parseHeroProducts(html, ctx.baseUrl);
  ctx.logger.debug("hero_products_parsed", { count: products.length });
  return products;
}
