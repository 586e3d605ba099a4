import {
  BrandInsights,
  ContactDetail,
  Faq,
  ImportantLink,
  Policy,
  POLICY_TYPES,
  PolicyType,
  Product,
  RawInsights,
  SocialHandle
} from "../types";
import { dedupeBy, firstMatch, Strategy } from "./strategy";

type Fields = Record<string, unknown>;

/**
 * Raw entries come from extractors (records) or from fallbacks that only know
 * a URL or a piece of text (bare strings). Everything else is unusable.
 */
type RawEntry = { kind: "record"; fields: Fields } | { kind: "bare"; value: string } | { kind: "invalid" };

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function classify(value: unknown): RawEntry {
  if (typeof value === "string") {
    return { kind: "bare", value };
  }
  if (isRecord(value)) {
    return { kind: "record", fields: value };
  }
  return { kind: "invalid" };
}

function mapEntries<T>(
  raw: readonly unknown[],
  mapRecord: (fields: Fields) => T,
  mapBare?: (value: string) => T
): T[] {
  const output: T[] = [];
  for (const value of raw) {
    const entry = classify(value);
    if (entry.kind === "record") {
      output.push(mapRecord(entry.fields));
    } else if (entry.kind === "bare" && mapBare) {
      output.push(mapBare(entry.value));
    }
  }
  return output;
}

function asText(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function textField(fields: Fields, key: string): string {
  return asText(fields[key]) ?? "";
}

function optionalTextField(fields: Fields, key: string): string | null {
  return asText(fields[key]);
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function imageSrc(image: unknown): string | null {
  if (!isRecord(image)) {
    return null;
  }
  const src = asText(image.src);
  return src ? src : null;
}

// Main image, then the first gallery image, then an image a variant points at.
const catalogImageStrategies: ReadonlyArray<Strategy<Fields, string>> = [
  (product) => imageSrc(product.image),
  (product) => asList(product.images).map(imageSrc).find((src) => src !== null),
  (product) => {
    const images = asList(product.images);
    for (const variant of asList(product.variants)) {
      if (!isRecord(variant) || !variant.image_id) {
        continue;
      }
      for (const image of images) {
        const src = isRecord(image) && image.id === variant.image_id ? imageSrc(image) : null;
        if (src) {
          return src;
        }
      }
    }
    return null;
  }
];

// null without variants; "" when the first variant carries no price.
function firstVariantPrice(product: Fields): string | null {
  const variants = asList(product.variants);
  if (variants.length === 0) {
    return null;
  }
  const [first] = variants;
  return (isRecord(first) ? asText(first.price) : null) ?? "";
}

function catalogDescription(product: Fields): string | null {
  const body = product.body_html;
  if (body === undefined) {
    return "";
  }
  return typeof body === "string" ? body : null;
}

function catalogProduct(fields: Fields, baseUrl: string): Product {
  const handle = asText(fields.handle);
  return {
    id: textField(fields, "id"),
    title: textField(fields, "title"),
    url: handle ? `${baseUrl}/products/${handle}` : null,
    image: firstMatch(catalogImageStrategies, fields),
    price: firstVariantPrice(fields),
    description: catalogDescription(fields)
  };
}

function nonEmptyKey(value: string | null): string | null {
  return value ? value : null;
}

/** products.json entries → catalog products, unique by URL. */
export function mapProducts(raw: readonly unknown[], baseUrl: string): Product[] {
  const products = mapEntries(raw, (fields) => catalogProduct(fields, baseUrl));
  return dedupeBy(products, (product) => nonEmptyKey(product.url));
}

export function mapHeroProducts(raw: readonly unknown[]): Product[] {
  const products = mapEntries(
    raw,
    (fields): Product => ({
      id: null,
      title: textField(fields, "title"),
      url: optionalTextField(fields, "url"),
      image: optionalTextField(fields, "image"),
      price: null,
      description: null
    })
  );
  return dedupeBy(products, (product) => nonEmptyKey(product.url));
}

function isPolicyType(value: unknown): value is PolicyType {
  return POLICY_TYPES.some((type) => type === value);
}

export function mapPolicies(raw: readonly unknown[]): Policy[] {
  const policies = mapEntries(
    raw,
    (fields): Policy => {
      const type = fields.type;
      return {
        type: isPolicyType(type) ? type : "",
        url: optionalTextField(fields, "url"),
        content: optionalTextField(fields, "content")
      };
    }
  );
  return dedupeBy(policies, (policy) => nonEmptyKey(policy.type));
}

// No dedup: only one page's FAQs ever reach this point.
export function mapFaqs(raw: readonly unknown[]): Faq[] {
  return mapEntries(raw, (fields) => ({
    question: textField(fields, "question"),
    answer: textField(fields, "answer")
  }));
}

export function mapSocialHandles(raw: readonly unknown[]): SocialHandle[] {
  const handles = mapEntries(
    raw,
    (fields) => ({ platform: textField(fields, "platform"), url: textField(fields, "url") }),
    (url) => ({ platform: "", url })
  );
  return dedupeBy(handles, (handle) => nonEmptyKey(handle.url));
}

function contactType(value: unknown): ContactDetail["type"] {
  return value === "email" || value === "phone" ? value : "";
}

export function mapContactDetails(raw: readonly unknown[]): ContactDetail[] {
  const contacts = mapEntries(
    raw,
    (fields): ContactDetail => ({ type: contactType(fields.type), value: textField(fields, "value") }),
    (value): ContactDetail => ({ type: "", value })
  );
  return dedupeBy(contacts, (contact) => `${contact.type}|${contact.value}`);
}

export function mapImportantLinks(raw: readonly unknown[]): ImportantLink[] {
  const links = mapEntries(
    raw,
    (fields) => ({ name: textField(fields, "name"), url: textField(fields, "url") }),
    (url) => ({ name: "", url })
  );
  return dedupeBy(links, (link) => nonEmptyKey(link.url));
}

/** A plain string, or the first entry of a list of strings (multi-valued meta content). */
export function mapBrandText(raw: unknown): string | null {
  if (typeof raw === "string") {
    return raw;
  }
  if (Array.isArray(raw)) {
    const [first] = raw;
    return typeof first === "string" ? first : null;
  }
  return null;
}

export function buildBrandInsights(raw: RawInsights, baseUrl: string): BrandInsights {
  return {
    product_catalog: mapProducts(raw.product_catalog, baseUrl),
    hero_products: mapHeroProducts(raw.hero_products),
    policies: mapPolicies(raw.policies),
    faqs: mapFaqs(raw.faqs),
    social_handles: mapSocialHandles(raw.social_handles),
    contact_details: mapContactDetails(raw.contact_details),
    brand_text: mapBrandText(raw.brand_text),
    important_links: mapImportantLinks(raw.important_links)
  };
}
