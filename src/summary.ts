/**
 * Change summarization through an OpenAI-compatible chat completions API
 * (Groq by default).
 */

import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { SummaryError, errorMessage } from "./errors.js";
import type { SiteContext } from "./types.js";
import { truncateText } from "./utils.js";

export const DEFAULT_SUMMARY_BASE_URL = "https://api.groq.com/openai/v1";

const SYSTEM_PROMPT =
  "You are a helpful assistant that compares two versions of a web page and lists the concrete differences. " +
  "Always answer with bullet points, one change per line, each starting with '- '.";

/** The slice of `client.chat.completions` used here, so tests can stand in for the SDK. */
export interface CompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export interface SummaryClientOptions {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  maxInputChars?: number;
  maxTokens?: number;
  completions?: CompletionsApi;
}

export function buildPrompt(site: SiteContext, oldText: string, newText: string): string {
  return `You are analyzing changes between two versions of a website.
Website: ${site.title} (${site.url})

List the concrete differences between the old and new content as bullet points.

Focus on:
1. New articles, posts, or content sections
2. Updated information or announcements
3. New features or functionality
4. Removed content (if significant)

Ignore minor formatting changes, timestamps, or navigation updates.
If there are no meaningful changes, answer with a single bullet: - No significant updates detected.

OLD CONTENT:
${oldText}

NEW CONTENT:
${newText}`;
}

// A single leading "*" is a bullet; "**" opens bold text.
const BULLET_MARKER = /^(?:[-•]|\*(?!\*))\s*/;

/**
 * Turns a model response into "- " bullets. When the response contains any
 * bullets, surrounding preamble and headings are dropped.
 */
export function toBulletList(response: string): string[] {
  const lines = response
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const bullets = lines.filter((line) => BULLET_MARKER.test(line));
  return (bullets.length > 0 ? bullets : lines).map((line) => `- ${line.replace(BULLET_MARKER, "")}`);
}

export class SummaryClient {
  private completions: CompletionsApi | null;
  private readonly apiKey?: string;
  private readonly baseURL: string;
  private readonly timeoutMs: number;
  private readonly maxInputChars: number;
  private readonly maxTokens: number;

  constructor(options: SummaryClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseURL = options.baseURL ?? DEFAULT_SUMMARY_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxInputChars = options.maxInputChars ?? 8000;
    this.maxTokens = options.maxTokens ?? 300;
    this.completions = options.completions ?? null;
  }

  // Built on first use so a missing key only fails the sites that changed.
  private getCompletions(): CompletionsApi {
    if (!this.completions) {
      if (!this.apiKey) {
        throw new SummaryError("GROQ_API_KEY is not set");
      }
      const client = new OpenAI({
        apiKey: this.apiKey,
        baseURL: this.baseURL,
        timeout: this.timeoutMs,
        maxRetries: 0,
      });
      this.completions = client.chat.completions;
    }
    return this.completions;
  }

  async summarize(oldText: string, newText: string, model: string, site: SiteContext): Promise<string[]> {
    const completions = this.getCompletions();
    const prompt = buildPrompt(
      site,
      truncateText(oldText, this.maxInputChars),
      truncateText(newText, this.maxInputChars)
    );

    console.log(`[SUMMARY] Asking ${model} to summarize changes for ${site.url}`);
    let content: string | null | undefined;
    try {
      const completion = await completions.create({
        model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature: 0.1,
        max_tokens: this.maxTokens,
      });
      content = completion.choices[0]?.message.content;
    } catch (err) {
      throw new SummaryError(`Summary request failed: ${errorMessage(err)}`, site.url, { cause: err });
    }

    const bullets = toBulletList(content ?? "");
    if (bullets.length === 0) {
      throw new SummaryError("Summary response was empty", site.url);
    }
    return bullets;
  }
}
