import pLimit from "p-limit";
import { contentHash, hasChanged } from "./diff.js";
import { errorMessage } from "./errors.js";
import type { SnapshotStore } from "./store.js";
import type { MonitoringResult, PageContent, SiteContext, SiteRecord } from "./types.js";
import { siteLabel, sleep } from "./utils.js";

export interface PageFetcher {
  fetch(url: string): Promise<PageContent>;
}

export interface ChangeSummarizer {
  summarize(oldText: string, newText: string, model: string, site: SiteContext): Promise<string[]>;
}

export interface MonitorRunConfig {
  urls: string[];
  model: string;
  concurrency: number;
  requestDelayMs: number;
}

export interface MonitorDeps {
  fetcher: PageFetcher;
  store: SnapshotStore;
  summarizer: ChangeSummarizer;
  now?: () => Date;
}

async function checkSite(url: string, config: MonitorRunConfig, deps: MonitorDeps): Promise<MonitoringResult> {
  const { store } = deps;
  const checkedAt = (deps.now ?? (() => new Date()))().toISOString();
  const previous = store.get(url);

  let page: PageContent;
  try {
    page = await deps.fetcher.fetch(url);
  } catch (err) {
    const error = errorMessage(err);
    console.error(`[MONITOR] Failed to fetch ${url}: ${error}`);
    if (previous) store.put(url, { ...previous, lastChecked: checkedAt });
    return { url, label: siteLabel(url, previous?.title), status: "failed", error };
  }

  const label = siteLabel(url, page.title);
  const hash = contentHash(page.text);

  if (!previous) {
    store.put(url, {
      url,
      contentText: page.text,
      contentHash: hash,
      title: page.title,
      firstSeen: checkedAt,
      lastChecked: checkedAt,
      lastChanged: null,
    });
    console.log(`[MONITOR] Baseline established for ${url}`);
    return { url, label, status: "baseline-established" };
  }

  if (!hasChanged(previous.contentHash, page.text)) {
    store.put(url, { ...previous, title: page.title, lastChecked: checkedAt });
    console.log(`[MONITOR] No changes detected for ${url}`);
    return { url, label, status: "no-change" };
  }

  console.log(`[MONITOR] Changes detected for ${url}, summarizing...`);
  const updated: SiteRecord = {
    ...previous,
    contentText: page.text,
    contentHash: hash,
    title: page.title,
    lastChecked: checkedAt,
    lastChanged: checkedAt,
  };

  try {
    const summary = await deps.summarizer.summarize(previous.contentText, page.text, config.model, {
      url,
      title: page.title,
    });
    return { url, label, status: "changed", summary };
  } catch (err) {
    const error = errorMessage(err);
    console.error(`[MONITOR] Summary failed for ${url}: ${error}`);
    return { url, label, status: "changed", error };
  } finally {
    store.put(url, updated);
  }
}

export async function runMonitorOnce(config: MonitorRunConfig, deps: MonitorDeps): Promise<MonitoringResult[]> {
  await deps.store.load();

  const limiter = pLimit(Math.max(1, config.concurrency));
  const results = await Promise.all(
    config.urls.map((url) =>
      limiter(async () => {
        console.log(`[MONITOR] Processing: ${url}`);
        const result = await checkSite(url, config, deps);
        if (config.requestDelayMs > 0) await sleep(config.requestDelayMs);
        return result;
      })
    )
  );

  await deps.store.save();
  return results;
}
