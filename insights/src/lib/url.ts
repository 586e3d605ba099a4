const ABSOLUTE_HTTP_PATTERN = /^https?:\/\//i;

export function isAbsoluteHttpUrl(value: string): boolean {
  return ABSOLUTE_HTTP_PATTERN.test(value);
}

/**
 * Reduces user input to a storefront base URL: `scheme://host[:port]`, no path,
 * no trailing slash. A missing scheme defaults to https. Returns null for
 * anything that is not an http(s) URL with a dotted hostname.
 */
export function normalizeStoreUrl(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed || /\s/.test(trimmed)) {
    return null;
  }

  const prefixed = isAbsoluteHttpUrl(trimmed) ? trimmed : `https://${trimmed.replace(/^\/+/, "")}`;
  let parsed: URL;
  try {
    parsed = new URL(prefixed);
  } catch {
    return null;
  }

  if (!(parsed.protocol === "http:" || parsed.protocol === "https:")) {
    return null;
  }

  const hostname = parsed.hostname.toLowerCase();
  const labels = hostname.split(".");
  if (labels.length < 2 || labels.some((label) => label.length === 0)) {
    return null;
  }

  return `${parsed.protocol}//${parsed.host.toLowerCase()}`;
}

/** Base URL + path, without doubling the slash between them. */
export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  if (path.length === 0) {
    return base;
  }
  return path.startsWith("/") ? `${base}${path}` : `${base}/${path}`;
}

// Absolute hrefs pass through untouched; anything else is appended to the base
// as written, the way storefront-relative links ("/products/x") are resolved.
export function resolveHref(baseUrl: string, href: string): string {
  return isAbsoluteHttpUrl(href) ? href : `${baseUrl}${href}`;
}
