import { load } from "cheerio";
import { visibleStrings } from "../lib/html";
import { dedupeBy } from "../lib/strategy";
import { RawContactDetail } from "../types";
import { ExtractionContext } from "./context";

export const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g;
// At least nine characters, starting and ending on a digit.
export const PHONE_PATTERN = /\+?\d[\d\s\-()]{7,}\d/g;

function matchesIn(strings: readonly string[], pattern: RegExp): string[] {
  return strings.flatMap((text) => Array.from(text.matchAll(pattern), (match) => match[0]));
}

export function parseContactDetails(html: string): RawContactDetail[] {
  const $ = load(html);
  const strings = visibleStrings($.root().toArray());

  const candidates: RawContactDetail[] = [
    ...matchesIn(strings, EMAIL_PATTERN).map((value): RawContactDetail => ({ type: "email", value })),
    ...matchesIn(strings, PHONE_PATTERN).map((value): RawContactDetail => ({ type: "phone", value }))
  ];

  return dedupeBy(candidates, (contact) => `${contact.type}|${contact.value}`);
}

export async function fetchContactDetails(ctx: ExtractionContext): Promise<RawContactDetail[]> {
  const html = await ctx.homepage();
  return html === null ? [] : parseContactDetails(html);
}
