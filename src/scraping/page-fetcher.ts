/**
 * Page Fetcher
 *
 * Downloads the event listing and flattens it to plain text, one visual
 * line per text line, with HTML entities decoded. Everything downstream
 * (segmenter, extractor) works on that text only.
 *
 * Network failures and 5xx answers are retried with backoff; 4xx answers
 * fail immediately. Either way the caller receives FetchFailedError.
 */
import axios, { type AxiosInstance } from "axios";
import { load } from "cheerio";
import config from "../config";
import { RETRY_CONFIG } from "../config/constants";
import { CheckError, FetchFailedError } from "../shared/errors/check.errors";
import { retryWithBackoff } from "../shared/utils/retry";
import { logger } from "../monitoring/logger";

export interface FetchedPage {
  url: string;
  text: string;
  fetchedAt: Date;
}

export interface PageFetcherOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
}

/** Elements whose end starts a new visual line */
const BLOCK_ELEMENTS =
  "p, div, li, tr, td, th, h1, h2, h3, h4, h5, h6, section, article, header, footer, ul, ol, table, dt, dd, blockquote";

/**
 * Convert HTML to entity-decoded text with line breaks at <br> and
 * block boundaries. Scripts and styles are dropped.
 */
export function htmlToText(html: string): string {
  const $ = load(html);
  $("script, style, noscript, template").remove();
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).each((_, element) => {
    $(element).append("\n");
  });
  return $.root().text();
}

export class PageFetcher {
  private client: AxiosInstance;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(
    client: AxiosInstance = axios.create({
      timeout: config.fetchTimeoutMs,
      headers: { "User-Agent": config.userAgent },
    }),
    options: PageFetcherOptions = {}
  ) {
    this.client = client;
    this.maxAttempts = options.maxAttempts ?? config.fetchMaxAttempts;
    this.retryDelayMs = options.retryDelayMs ?? config.fetchRetryDelayMs;
  }

  /**
   * Fetch a page and return its text.
   *
   * @throws FetchFailedError when the page is unreachable or not 2xx
   */
  async fetch(url: string = config.sourceUrl): Promise<FetchedPage> {
    const html = await retryWithBackoff(() => this.fetchOnce(url), {
      maxAttempts: this.maxAttempts,
      initialDelayMs: this.retryDelayMs,
      backoffFactor: RETRY_CONFIG.BACKOFF_FACTOR,
      label: "listing fetch",
      shouldRetry: (error) => !(error instanceof CheckError) || error.retryable,
    });

    const text = htmlToText(html);
    logger.info({ url, bytes: html.length }, "Listing page fetched");

    return { url, text, fetchedAt: new Date() };
  }

  private async fetchOnce(url: string): Promise<string> {
    let status: number;
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(url, {
        responseType: "text",
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new FetchFailedError(`Fetching ${url}: ${(error as Error).message}`);
    }

    if (status < 200 || status >= 300) {
      throw new FetchFailedError(`Fetching ${url}: unexpected status ${status}`, status);
    }
    if (typeof data !== "string") {
      throw new FetchFailedError(`Fetching ${url}: response body is not text`, status);
    }
    return data;
  }
}
