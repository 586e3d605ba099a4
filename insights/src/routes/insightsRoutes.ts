import { Router } from "express";
import { z } from "zod";
import { Logger } from "../lib/logger";
import { InsightsService, InvalidStoreUrlError, StorefrontUnavailableError } from "../services/insights";

const fetchInsightsBodySchema = z.object({
  website_url: z.string().trim().min(1)
});

const optionalQueryText = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

const insightsQuerySchema = z.object({
  website_url: z.string().trim().min(1),
  limit: z.coerce.number().int().positive().max(1000).default(20),
  offset: z.coerce.number().int().nonnegative().default(0),
  product_title: optionalQueryText,
  faq_limit: z.coerce.number().int().positive().max(1000).default(20),
  faq_offset: z.coerce.number().int().nonnegative().default(0),
  faq_query: optionalQueryText
});

export function createInsightsRouter(service: InsightsService, logger: Logger): Router {
  const router = Router();

  router.get("/", (_request, response) => {
    response.json({ message: "Storefront insights service is running." });
  });

  router.get("/health", async (_request, response) => {
    const health = await service.health();
    logger.debug("health_requested", health);
    response.status(health.ok ? 200 : 503).json({ ...health, timestamp: new Date().toISOString() });
  });

  router.post("/fetch-insights", async (request, response) => {
    const parsed = fetchInsightsBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      logger.warn("fetch_insights_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      logger.info("fetch_insights_requested", { website_url: parsed.data.website_url });
      const insights = await service.fetchInsights(parsed.data.website_url);
      response.json(insights);
    } catch (error) {
      if (error instanceof InvalidStoreUrlError) {
        logger.warn("fetch_insights_url_invalid", { website_url: error.input });
        response.status(400).json({ error: error.message });
        return;
      }
      if (error instanceof StorefrontUnavailableError) {
        logger.warn("fetch_insights_storefront_unavailable", { base_url: error.baseUrl });
        response.status(401).json({ error: error.message });
        return;
      }
      logger.error("fetch_insights_failed", { website_url: parsed.data.website_url, error });
      response.status(500).json({ error: "Internal server error. Please try again later." });
    }
  });

  router.get("/insights", async (request, response) => {
    const parsed = insightsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("insights_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { website_url: websiteUrl, ...query } = parsed.data;
    try {
      const insights = await service.getStoredInsights(websiteUrl, query);
      if (!insights) {
        logger.warn("insights_not_found", { website_url: websiteUrl });
        response.status(404).json({ error: "No insights found for this website_url." });
        return;
      }
      logger.info("insights_listed", {
        website_url: websiteUrl,
        returned_products: insights.product_catalog.length,
        returned_faqs: insights.faqs.length,
        limit: query.limit,
        offset: query.offset
      });
      response.json(insights);
    } catch (error) {
      if (error instanceof InvalidStoreUrlError) {
        response.status(400).json({ error: error.message });
        return;
      }
      logger.error("insights_request_failed", { website_url: websiteUrl, error });
      response.status(500).json({ error: "Internal server error. Please try again later." });
    }
  });

  return router;
}
