import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: optionalNonEmptyString,
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  FETCH_MAX_RETRIES: z.coerce.number().int().nonnegative().max(10).default(2),
  FETCH_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
  USER_AGENT: z.string().min(1).default("StorefrontInsights/0.1"),
  LOG_LEVEL: z.string().min(1).default("info")
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  return EnvSchema.parse(env);
}

export const config: AppConfig = parseConfig(process.env);
