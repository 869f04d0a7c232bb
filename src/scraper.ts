import axios, { type AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { FetchError, ParseError } from "./errors.js";
import type { PageContent } from "./types.js";
import { normalizeWhitespace } from "./utils.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";

const STRIPPED_ELEMENTS = "script, style, noscript, template, nav, footer, header, aside";

// Tried in order; the first match is treated as the page's main content.
const CONTENT_SELECTORS = [
  "article",
  "main",
  '[role="main"]',
  ".content",
  ".post",
  ".entry",
  ".article",
  ".main-content",
  ".page-content",
  ".post-content",
];

export interface ContentFetcherOptions {
  timeoutMs: number;
  userAgent?: string;
  http?: AxiosInstance;
}

export function extractPageText(html: string): PageContent {
  const $ = cheerio.load(html);

  const title = normalizeWhitespace($("title").first().text()) || "No title";

  $(STRIPPED_ELEMENTS).remove();

  // The parser always synthesizes a <body>, so it is the final fallback.
  const main =
    CONTENT_SELECTORS.map((selector) => $(selector).first()).find((match) => match.length > 0) ??
    $("body").first();

  // Pad every element so adjacent text nodes don't run together.
  main.find("*").each((_, el) => {
    $(el).before(" ").after(" ");
  });

  return { text: normalizeWhitespace(main.text()), title };
}

function isHtmlContentType(contentType: string): boolean {
  return /text\/html|application\/xhtml\+xml/i.test(contentType);
}

export class ContentFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: ContentFetcherOptions) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async fetch(url: string): Promise<PageContent> {
    console.log(`[FETCH] ${url}`);

    let html: unknown;
    let contentType: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: this.timeoutMs,
        responseType: "text",
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.5",
        },
        validateStatus: () => true,
      });
      if (response.status < 200 || response.status >= 300) {
        throw new FetchError(`HTTP ${response.status}`, url);
      }
      html = response.data;
      contentType = response.headers["content-type"];
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (axios.isAxiosError(err) && (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")) {
        throw new FetchError(`Timed out after ${this.timeoutMs}ms`, url, { cause: err });
      }
      throw new FetchError(err instanceof Error ? err.message : String(err), url, { cause: err });
    }

    if (typeof contentType === "string" && !isHtmlContentType(contentType)) {
      throw new ParseError(`Unsupported content type: ${contentType}`, url);
    }
    if (typeof html !== "string") {
      throw new ParseError("Response body is not text", url);
    }

    const page = extractPageText(html);
    if (!page.text) {
      throw new ParseError("No visible text found", url);
    }

    console.log(`[FETCH] Extracted ${page.text.length} characters from ${url}`);
    return page;
  }
}
