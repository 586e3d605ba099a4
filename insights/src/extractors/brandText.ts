import { CheerioAPI, load } from "cheerio";
import { textOf } from "../lib/html";
import { firstMatch, Strategy } from "../lib/strategy";
import { ExtractionContext } from "./context";

// An element that exists is a match, even when it has no visible text.
function sectionText(selector: string): Strategy<CheerioAPI, string> {
  return ($) => {
    const section = $(selector).first();
    return section.length > 0 ? textOf(section) : null;
  };
}

const metaDescription: Strategy<CheerioAPI, string> = ($) => $("meta[name='description']").first().attr("content");

export const BRAND_TEXT_STRATEGIES: ReadonlyArray<Strategy<CheerioAPI, string>> = [
  sectionText("#about"),
  sectionText(".about"),
  sectionText("#about-us"),
  sectionText(".about-us"),
  metaDescription
];

export function parseBrandText(html: string): string | null {
  return firstMatch(BRAND_TEXT_STRATEGIES, load(html));
}

export async function fetchBrandText(ctx: ExtractionContext): Promise<string | null> {
  const html = await ctx.homepage();
  return html === null ? null : parseBrandText(html);
}
