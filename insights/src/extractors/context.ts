import { PageFetcher } from "../lib/http";
import { Logger } from "../lib/logger";
import { joinUrl } from "../lib/url";

/**
 * State owned by a single extraction run: the storefront base URL, the fetcher
 * every extractor goes through and the memoized homepage document. A new
 * context is created per run and dropped afterwards.
 */
export class ExtractionContext {
  private homepagePromise: Promise<string | null> | null = null;

  constructor(
    readonly baseUrl: string,
    readonly fetcher: PageFetcher,
    readonly logger: Logger
  ) {}

  url(path: string): string {
    return joinUrl(this.baseUrl, path);
  }

  async fetchText(path: string): Promise<string | null> {
    const document = await this.fetcher.get(this.url(path));
    return document ? document.body : null;
  }

  // The promise is stored before the first await, so concurrent callers share one request.
  homepage(): Promise<string | null> {
    if (!this.homepagePromise) {
      this.homepagePromise = this.fetcher.get(this.baseUrl).then((document) => (document ? document.body : null));
    }
    return this.homepagePromise;
  }
}
