import { md5 } from "./utils.js";

export function contentHash(text: string): string {
  return md5(text);
}

/**
 * Exact comparison against the stored digest. Text reaching this point has
 * already had its whitespace collapsed by extraction, but any other difference
 * (rotating banners, rendered timestamps) still counts as a change.
 */
export function hasChanged(previousHash: string, currentText: string): boolean {
  return contentHash(currentText) !== previousHash;
}
