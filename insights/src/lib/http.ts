import { Logger } from "./logger";

export interface FetchRuntimeConfig {
  timeoutMs: number;
  userAgent: string;
  maxRetries: number;
  backoffMs: number;
}

export interface FetchedDocument {
  url: string;
  status: number;
  contentType?: string;
  body: string;
}

/**
 * Anything that can GET a page and report it as either a successful document
 * or `null` ("unavailable"). Extractors only ever see this interface.
 */
export interface PageFetcher {
  get(url: string): Promise<FetchedDocument | null>;
}

export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export interface HttpClientOptions {
  fetchImpl?: FetchImpl;
  sleep?: Sleep;
  logger?: Logger;
}

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const DEFAULT_ACCEPT = "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8";

// The timeout covers reading the body too; a stalled body counts as a failed attempt.
export async function fetchWithTimeout(
  url: string,
  runtime: Pick<FetchRuntimeConfig, "timeoutMs" | "userAgent">,
  fetchImpl: FetchImpl = fetch
): Promise<FetchedDocument> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), runtime.timeoutMs);
  const headers = new Headers({
    "user-agent": runtime.userAgent,
    accept: DEFAULT_ACCEPT,
    "accept-language": "en-US,en;q=0.9"
  });

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      redirect: "follow",
      headers,
      signal: controller.signal
    });
    const body = await response.text();
    const contentType = response.headers.get("content-type") ?? undefined;
    return {
      url,
      status: response.status,
      ...(contentType ? { contentType } : {}),
      body
    };
  } finally {
    clearTimeout(timeout);
  }
}

export class HttpClient implements PageFetcher {
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(private readonly runtime: FetchRuntimeConfig, options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? new Logger("insights.http", process.env.LOG_LEVEL);
  }

  async get(url: string): Promise<FetchedDocument | null> {
    const attempts = Math.max(0, this.runtime.maxRetries) + 1;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const document = await fetchWithTimeout(url, this.runtime, this.fetchImpl);
        if (document.status === 200) {
          return document;
        }
        this.logger.warn("fetch_attempt_failed", { url, attempt, status: document.status });
      } catch (error) {
        this.logger.warn("fetch_attempt_failed", {
          url,
          attempt,
          error: error instanceof Error ? error.message : String(error)
        });
      }

      if (attempt < attempts) {
        await this.sleep(this.runtime.backoffMs * attempt);
      }
    }

    this.logger.error("fetch_exhausted", { url, attempts });
    return null;
  }
}
