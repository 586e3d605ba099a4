import { load } from "cheerio";
import { visibleStrings } from "../lib/html";
import { PolicyType, RawPolicy } from "../types";
import { ExtractionContext } from "./context";

export const POLICY_PATHS: ReadonlyArray<{ type: PolicyType; path: string }> = [
  { type: "privacy", path: "/policies/privacy-policy" },
  { type: "refund", path: "/policies/refund-policy" },
  { type: "shipping", path: "/policies/shipping-policy" },
  { type: "terms", path: "/policies/terms-of-service" }
];

export function policyContent(html: string): string {
  const $ = load(html);
  return visibleStrings($.root().toArray()).join("\n");
}

/**
 * Every policy page is requested, one after another; a page that cannot be
 * fetched or parsed simply has no entry.
 */
export async function fetchPolicies(ctx: ExtractionContext): Promise<RawPolicy[]> {
  const policies: RawPolicy[] = [];

  for (const { type, path } of POLICY_PATHS) {
    const url = ctx.url(path);
    const html = await ctx.fetchText(path);
    if (html === null) {
      continue;
    }

    try {
      policies.push({ type, url, content: policyContent(html) });
    } catch (error) {
      ctx.logger.error("policy_parse_failed", { url, error });
    }
  }

  ctx.logger.debug("policies_collected", { types: policies.map((policy) => policy.type) });
  return policies;
}
