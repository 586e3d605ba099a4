import { RawInsights } from "../types";
import { fetchBrandText } from "./brandText";
import { fetchProductCatalog } from "./catalog";
import { fetchContactDetails } from "./contacts";
import { ExtractionContext } from "./context";
import { fetchFaqs } from "./faqs";
import { fetchHeroProducts } from "./heroProducts";
import { fetchImportantLinks } from "./importantLinks";
import { fetchPolicies } from "./policies";
import { fetchSocialHandles } from "./socials";

export type CategoryExtractor<T> = (ctx: ExtractionContext) => Promise<T>;

export type ExtractorSet = { [K in keyof RawInsights]: CategoryExtractor<RawInsights[K]> };

export const defaultExtractors: ExtractorSet = {
  product_catalog: fetchProductCatalog,
  hero_products: fetchHeroProducts,
  policies: fetchPolicies,
  faqs: fetchFaqs,
  social_handles: fetchSocialHandles,
  contact_details: fetchContactDetails,
  brand_text: fetchBrandText,
  important_links: fetchImportantLinks
};

/**
 * Wraps one category so that whatever it throws becomes its empty value. This
 * is the only place extractor failures are absorbed.
 */
async function isolated<T>(
  category: keyof RawInsights,
  extractor: CategoryExtractor<T>,
  ctx: ExtractionContext,
  empty: T
): Promise<T> {
  const started = Date.now();
  try {
    return await extractor(ctx);
  } catch (error) {
    ctx.logger.error("extractor_failed", {
      category,
      base_url: ctx.baseUrl,
      duration_ms: Date.now() - started,
      error
    });
    return empty;
  }
}

/** Runs all eight categories concurrently and waits for every one of them. */
export async function extractAll(ctx: ExtractionContext, extractors: ExtractorSet = defaultExtractors): Promise<RawInsights> {
  const [
    productCatalog,
    heroProducts,
    policies,
    faqs,
    socialHandles,
    contactDetails,
    brandText,
    importantLinks
  ] = await Promise.all([
    isolated("product_catalog", extractors.product_catalog, ctx, []),
    isolated("hero_products", extractors.hero_products, ctx, []),
    isolated("policies", extractors.policies, ctx, []),
    isolated("faqs", extractors.faqs, ctx, []),
    isolated("social_handles", extractors.social_handles, ctx, []),
    isolated("contact_details", extractors.contact_details, ctx, []),
    isolated("brand_text", extractors.brand_text, ctx, null),
    isolated("important_links", extractors.important_links, ctx, [])
  ]);

  return {
    product_catalog: productCatalog,
    hero_products: heroProducts,
    policies,
    faqs,
    social_handles: socialHandles,
    contact_details: contactDetails,
    brand_text: brandText,
    important_links: importantLinks
  };
}
