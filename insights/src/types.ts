import { z } from "zod";

export const POLICY_TYPES = ["privacy", "refund", "shipping", "terms"] as const;
export const SOCIAL_PLATFORMS = ["instagram", "facebook", "twitter", "tiktok", "youtube", "pinterest", "linkedin"] as const;

export type PolicyType = (typeof POLICY_TYPES)[number];
export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];
export type ContactType = "email" | "phone";

// Raw extractor output. The catalog stays `unknown[]`: it is the storefront's
// products.json array verbatim and is only interpreted during normalization.

export interface RawHeroProduct {
  title: string;
  url: string;
  image: string | null;
}

export interface RawPolicy {
  type: PolicyType;
  url: string;
  content: string;
}

export interface RawFaq {
  question: string;
  answer: string;
}

export interface RawSocialHandle {
  platform: SocialPlatform;
  url: string;
}

export interface RawContactDetail {
  type: ContactType;
  value: string;
}

export interface RawImportantLink {
  name: string;
  url: string;
}

export interface RawInsights {
  product_catalog: unknown[];
  hero_products: RawHeroProduct[];
  policies: RawPolicy[];
  faqs: RawFaq[];
  social_handles: Array<RawSocialHandle | string>;
  contact_details: Array<RawContactDetail | string>;
  brand_text: string | string[] | null;
  important_links: Array<RawImportantLink | string>;
}

// Canonical entities.

export const ProductSchema = z.object({
  id: z.string().nullable(),
  title: z.string(),
  url: z.string().nullable(),
  image: z.string().nullable(),
  price: z.string().nullable(),
  description: z.string().nullable()
});

export const PolicySchema = z.object({
  type: z.union([z.enum(POLICY_TYPES), z.literal("")]),
  url: z.string().nullable(),
  content: z.string().nullable()
});

export const FaqSchema = z.object({
  question: z.string(),
  answer: z.string()
});

export const SocialHandleSchema = z.object({
  platform: z.string(),
  url: z.string()
});

export const ContactDetailSchema = z.object({
  type: z.enum(["email", "phone", ""]),
  value: z.string()
});

export const ImportantLinkSchema = z.object({
  name: z.string(),
  url: z.string()
});

export const BrandInsightsSchema = z.object({
  product_catalog: z.array(ProductSchema),
  hero_products: z.array(ProductSchema),
  policies: z.array(PolicySchema),
  faqs: z.array(FaqSchema),
  social_handles: z.array(SocialHandleSchema),
  contact_details: z.array(ContactDetailSchema),
  brand_text: z.string().nullable(),
  important_links: z.array(ImportantLinkSchema)
});

export type Product = z.infer<typeof ProductSchema>;
export type Policy = z.infer<typeof PolicySchema>;
export type Faq = z.infer<typeof FaqSchema>;
export type SocialHandle = z.infer<typeof SocialHandleSchema>;
export type ContactDetail = z.infer<typeof ContactDetailSchema>;
export type ImportantLink = z.infer<typeof ImportantLinkSchema>;
export type BrandInsights = z.infer<typeof BrandInsightsSchema>;

export interface InsightsQuery {
  limit: number;
  offset: number;
  product_title?: string;
  faq_limit: number;
  faq_offset: number;
  faq_query?: string;
}
