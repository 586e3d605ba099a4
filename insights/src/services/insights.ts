import { AppConfig } from "../config";
import { ExtractionContext } from "../extractors/context";
import { defaultExtractors, extractAll, ExtractorSet } from "../extractors";
import { InsightsRepository } from "../lib/db";
import { HttpClient, PageFetcher } from "../lib/http";
import { Logger } from "../lib/logger";
import { buildBrandInsights } from "../lib/normalize";
import { normalizeStoreUrl } from "../lib/url";
import { BrandInsights, InsightsQuery, RawInsights } from "../types";

export class InvalidStoreUrlError extends Error {
  constructor(readonly input: string) {
    super("Invalid website_url format.");
    this.name = "InvalidStoreUrlError";
  }
}

export class StorefrontUnavailableError extends Error {
  constructor(readonly baseUrl: string) {
    super("Website not found or no products available.");
    this.name = "StorefrontUnavailableError";
  }
}

export interface InsightsServiceOptions {
  fetcher?: PageFetcher;
  extractors?: ExtractorSet;
  logger?: Logger;
}

function categoryCounts(insights: BrandInsights): Record<string, number | boolean> {
  return {
    product_catalog: insights.product_catalog.length,
    hero_products: insights.hero_products.length,
    policies: insights.policies.length,
    faqs: insights.faqs.length,
    social_handles: insights.social_handles.length,
    contact_details: insights.contact_details.length,
    important_links: insights.important_links.length,
    brand_text: insights.brand_text !== null
  };
}

export class InsightsService {
  private readonly activeRuns = new Map<string, Promise<BrandInsights>>();
  private readonly fetcher: PageFetcher;
  private readonly extractors: ExtractorSet;
  private readonly logger: Logger;
  private readonly extractorLogger: Logger;

  constructor(
    config: AppConfig,
    private readonly repository: InsightsRepository,
    options: InsightsServiceOptions = {}
  ) {
    this.logger = options.logger ?? new Logger("insights.service", config.LOG_LEVEL);
    this.extractorLogger = this.logger.child("extractors");
    this.fetcher =
      options.fetcher ??
      new HttpClient(
        {
          timeoutMs: config.REQUEST_TIMEOUT_MS,
          userAgent: config.USER_AGENT,
          maxRetries: config.FETCH_MAX_RETRIES,
          backoffMs: config.FETCH_BACKOFF_MS
        },
        { logger: this.logger.child("http") }
      );
    this.extractors = options.extractors ?? defaultExtractors;
  }

  async health(): Promise<{ ok: boolean; db: boolean; persistence: "enabled" | "disabled" }> {
    const dbHealthy = await this.repository.healthcheck();
    return { ok: dbHealthy, db: dbHealthy, persistence: this.repository.isEnabled() ? "enabled" : "disabled" };
  }

  resolveBaseUrl(websiteUrl: string): string {
    const baseUrl = normalizeStoreUrl(websiteUrl);
    if (!baseUrl) {
      throw new InvalidStoreUrlError(websiteUrl);
    }
    return baseUrl;
  }

  /** Raw per-category records for one storefront, before normalization. */
  async extractRaw(baseUrl: string): Promise<RawInsights> {
    const context = new ExtractionContext(baseUrl, this.fetcher, this.extractorLogger);
    return extractAll(context, this.extractors);
  }

  /**
   * Extracts, validates and stores a fresh snapshot. Concurrent calls for the
   * same storefront share one run.
   */
  async fetchInsights(websiteUrl: string): Promise<BrandInsights> {
    const baseUrl = this.resolveBaseUrl(websiteUrl);
    const active = this.activeRuns.get(baseUrl);
    if (active) {
      this.logger.info("run_joined", { base_url: baseUrl });
      return active;
    }

    const run = this.runExtraction(baseUrl).finally(() => {
      this.activeRuns.delete(baseUrl);
    });
    this.activeRuns.set(baseUrl, run);
    return run;
  }

  private async runExtraction(baseUrl: string): Promise<BrandInsights> {
    const started = Date.now();
    this.logger.info("run_started", { base_url: baseUrl });

    try {
      const raw = await this.extractRaw(baseUrl);
      if (raw.product_catalog.length === 0) {
        throw new StorefrontUnavailableError(baseUrl);
      }

      const insights = buildBrandInsights(raw, baseUrl);
      await this.repository.replaceBrandInsights(baseUrl, insights);
      this.logger.info("run_completed", {
        base_url: baseUrl,
        duration_ms: Date.now() - started,
        persisted: this.repository.isEnabled(),
        ...categoryCounts(insights)
      });
      return insights;
    } catch (error) {
      this.logger.error("run_failed", {
        base_url: baseUrl,
        duration_ms: Date.now() - started,
        error
      });
      throw error;
    }
  }

  async getStoredInsights(websiteUrl: string, query: InsightsQuery): Promise<BrandInsights | null> {
    const baseUrl = this.resolveBaseUrl(websiteUrl);
    return this.repository.getBrandInsights(baseUrl, query);
  }
}
