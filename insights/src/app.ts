import express, { Express, NextFunction, Request, Response } from "express";
import { Logger } from "./lib/logger";
import { createInsightsRouter } from "./routes/insightsRoutes";
import { InsightsService } from "./services/insights";

export function createApp(service: InsightsService, logger: Logger): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.use((request: Request, response: Response, next: NextFunction) => {
    const started = Date.now();
    response.on("finish", () => {
      logger.info("http_request", {
        method: request.method,
        path: request.path,
        status_code: response.statusCode,
        duration_ms: Date.now() - started
      });
    });
    next();
  });

  app.use("/", createInsightsRouter(service, logger.child("routes")));

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    logger.error("unhandled_error", { error });
    response.status(500).json({ error: "Internal server error. Please try again later." });
  });

  return app;
}
