import { load } from "cheerio";
import { dedupeBy } from "../lib/strategy";
import { RawSocialHandle, SocialPlatform } from "../types";
import { ExtractionContext } from "./context";

export const SOCIAL_DOMAINS: ReadonlyArray<{ platform: SocialPlatform; domain: string }> = [
  { platform: "instagram", domain: "instagram.com" },
  { platform: "facebook", domain: "facebook.com" },
  { platform: "twitter", domain: "twitter.com" },
  { platform: "tiktok", domain: "tiktok.com" },
  { platform: "youtube", domain: "youtube.com" },
  { platform: "pinterest", domain: "pinterest.com" },
  { platform: "linkedin", domain: "linkedin.com" }
];

/**
 * Plain substring match of every href against the platform domains, in list
 * order. A share URL that mentions a platform in its query string is
 * attributed to that platform.
 */
export function parseSocialHandles(html: string): RawSocialHandle[] {
  const $ = load(html);
  const handles: RawSocialHandle[] = [];

  $("a[href]").each((_, anchor) => {
    const href = $(anchor).attr("href");
    if (!href) {
      return;
    }
    const match = SOCIAL_DOMAINS.find(({ domain }) => href.includes(domain));
    if (match) {
      handles.push({ platform: match.platform, url: href });
    }
  });

  return dedupeBy(handles, (handle) => handle.url);
}

export async function fetchSocialHandles(ctx: ExtractionContext): Promise<RawSocialHandle[]> {
  const html = await ctx.homepage();
  return html === null ? [] : parseSocialHandles(html);
}
