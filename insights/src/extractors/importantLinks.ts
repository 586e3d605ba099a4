import { load } from "cheerio";
import { textOf } from "../lib/html";
import { dedupeBy } from "../lib/strategy";
import { resolveHref } from "../lib/url";
import { RawImportantLink } from "../types";
import { ExtractionContext } from "./context";

export const IMPORTANT_LINK_KEYWORDS = ["order", "track", "contact", "blog", "faq", "help", "support"] as const;

export function parseImportantLinks(html: string, baseUrl: string): RawImportantLink[] {
  const $ = load(html);
  const links: RawImportantLink[] = [];

  $("a[href]").each((_, anchor) => {
    const href = $(anchor).attr("href");
    const name = textOf($(anchor));
    if (!href || !IMPORTANT_LINK_KEYWORDS.some((keyword) => name.toLowerCase().includes(keyword))) {
      return;
    }
    links.push({ name, url: resolveHref(baseUrl, href) });
  });

  return dedupeBy(links, (link) => link.url);
}

export async function fetchImportantLinks(ctx: ExtractionContext): Promise<RawImportantLink[]> {
  const html = await ctx.homepage();
  return html === null ? [] : parseImportantLinks(html, ctx.baseUrl);
}
