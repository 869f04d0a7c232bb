import crypto from "node:crypto";

export function md5(input: string): string {
  return crypto.createHash("md5").update(input, "utf8").digest("hex");
}

export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function truncateText(input: string, maxChars: number): string {
  return input.length > maxChars ? `${input.slice(0, maxChars)}...` : input;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function siteLabel(url: string, title?: string): string {
  return title && title !== "No title" ? title : url;
}
