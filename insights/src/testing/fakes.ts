import { InsightsRepository } from "../lib/db";
import { FetchedDocument, PageFetcher } from "../lib/http";
import { LogLevel, Logger } from "../lib/logger";
import { BrandInsights, InsightsQuery } from "../types";

export interface CapturedLine {
  level: LogLevel;
  scope: string;
  message: string;
  metadata?: Record<string, unknown>;
}

/** A debug-level logger whose lines are parsed back into `lines` instead of printed. */
export function captureLogger(scope = "test"): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger(scope, "debug", (level, line) => {
    const parsed: { scope: string; message: string; metadata?: Record<string, unknown> } = JSON.parse(line);
    lines.push({ level, scope: parsed.scope, message: parsed.message, metadata: parsed.metadata });
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return new Logger("test", "error", () => undefined);
}

/**
 * Serves canned bodies by absolute URL; any other URL is unavailable. Every
 * request is recorded in order.
 */
export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async get(url: string): Promise<FetchedDocument | null> {
    this.requested.push(url);
    const body = this.pages[url];
    return body === undefined ? null : { url, status: 200, body };
  }
}

export class MemoryRepository implements InsightsRepository {
  readonly stored = new Map<string, BrandInsights>();
  readonly queries: InsightsQuery[] = [];

  isEnabled(): boolean {
    return true;
  }

  async healthcheck(): Promise<boolean> {
    return true;
  }

  async replaceBrandInsights(baseUrl: string, insights: BrandInsights): Promise<void> {
    this.stored.set(baseUrl, insights);
  }

  async getBrandInsights(baseUrl: string, query: InsightsQuery): Promise<BrandInsights | null> {
    this.queries.push(query);
    const insights = this.stored.get(baseUrl);
    if (!insights) {
      return null;
    }
    return {
      ...insights,
      product_catalog: insights.product_catalog.slice(query.offset, query.offset + query.limit),
      faqs: insights.faqs.slice(query.faq_offset, query.faq_offset + query.faq_limit)
    };
  }

  async close(): Promise<void> {}
}
