import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchError, SummaryError } from '../errors.js';
import { type ChangeSummarizer, type MonitorRunConfig, type PageFetcher, runMonitorOnce } from '../monitor.js';
import { JsonFileSnapshotStore, STORE_FILE_NAME } from '../store.js';
import type { PageContent, SiteContext } from '../types.js';
import { md5 } from '../utils.js';

const A = 'https://a.example/';
const B = 'https://b.example/news';

class FakeFetcher implements PageFetcher {
  readonly pages = new Map<string, PageContent | Error>();

  set(url: string, text: string, title = 'Example'): void {
    this.pages.set(url, { text, title });
  }

  async fetch(url: string): Promise<PageContent> {
    const page = this.pages.get(url);
    if (!page) throw new FetchError('HTTP 404', url);
    if (page instanceof Error) throw page;
    return page;
  }
}

function fakeSummarizer(summary: string[] = ['- something changed']) {
  return {
    summarize: vi.fn(async (_old: string, _new: string, _model: string, _site: SiteContext) => summary),
  } satisfies ChangeSummarizer;
}

function clock(start = Date.parse('2026-03-01T00:00:00.000Z')): () => Date {
  let t = start;
  return () => {
    t += 60_000;
    return new Date(t);
  };
}

function runConfig(urls: string[]): MonitorRunConfig {
  return { urls, model: 'test-model', concurrency: 1, requestDelayMs: 0 };
}

describe('runMonitorOnce', () => {
  let dataDir: string;
  let fetcher: FakeFetcher;
  let now: () => Date;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'monitor-run-'));
    fetcher = new FakeFetcher();
    now = clock();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  const reload = () => new JsonFileSnapshotStore(dataDir).load();

  it('establishes a baseline on the first run and reports no change on the second', async () => {
    fetcher.set(A, 'Hello World', 'Site A');
    const summarizer = fakeSummarizer();
    const deps = { fetcher, store: new JsonFileSnapshotStore(dataDir), summarizer, now };

    const first = await runMonitorOnce(runConfig([A]), deps);
    expect(first).toEqual([{ url: A, label: 'Site A', status: 'baseline-established' }]);

    const afterFirst = await reload();
    expect(Object.keys(afterFirst)).toEqual([A]);
    expect(afterFirst[A]).toEqual({
      url: A,
      contentText: 'Hello World',
      contentHash: md5('Hello World'),
      title: 'Site A',
      firstSeen: '2026-03-01T00:01:00.000Z',
      lastChecked: '2026-03-01T00:01:00.000Z',
      lastChanged: null,
    });

    const second = await runMonitorOnce(runConfig([A]), { ...deps, store: new JsonFileSnapshotStore(dataDir) });
    expect(second).toEqual([{ url: A, label: 'Site A', status: 'no-change' }]);

    const afterSecond = await reload();
    expect(afterSecond[A]?.contentHash).toBe(md5('Hello World'));
    expect(afterSecond[A]?.lastChanged).toBeNull();
    expect(afterSecond[A]?.lastChecked).toBe('2026-03-01T00:02:00.000Z');
    expect(summarizer.summarize).not.toHaveBeenCalled();
  });

  it('summarizes a changed page and stores the new content', async () => {
    const seed = new JsonFileSnapshotStore(dataDir);
    await seed.save({
      [A]: {
        url: A,
        contentText: 'v1',
        contentHash: md5('v1'),
        title: 'Site A',
        firstSeen: '2026-02-01T00:00:00.000Z',
        lastChecked: '2026-02-01T00:00:00.000Z',
        lastChanged: null,
      },
    });
    fetcher.set(A, 'v2', 'Site A');
    const summarizer = fakeSummarizer(['- changed from v1 to v2']);

    const results = await runMonitorOnce(runConfig([A]), {
      fetcher,
      store: new JsonFileSnapshotStore(dataDir),
      summarizer,
      now,
    });

    expect(results).toEqual([{ url: A, label: 'Site A', status: 'changed', summary: ['- changed from v1 to v2'] }]);
    expect(summarizer.summarize).toHaveBeenCalledWith('v1', 'v2', 'test-model', { url: A, title: 'Site A' });

    const stored = (await reload())[A];
    expect(stored?.contentText).toBe('v2');
    expect(stored?.contentHash).toBe(md5('v2'));
    expect(stored?.firstSeen).toBe('2026-02-01T00:00:00.000Z');
    expect(stored?.lastChanged).toBe('2026-03-01T00:01:00.000Z');
  });

  it('isolates a summary failure to its own site', async () => {
    const seed = new JsonFileSnapshotStore(dataDir);
    await seed.load();
    for (const url of [A, B]) {
      seed.put(url, {
        url,
        contentText: 'old',
        contentHash: md5('old'),
        title: 'Example',
        firstSeen: '2026-02-01T00:00:00.000Z',
        lastChecked: '2026-02-01T00:00:00.000Z',
        lastChanged: null,
      });
    }
    await seed.save();
    fetcher.set(A, 'new A', 'Site A');
    fetcher.set(B, 'new B', 'Site B');
    const summarizer = {
      summarize: vi.fn(async (_old: string, _new: string, _model: string, site: SiteContext) => {
        if (site.url === B) throw new SummaryError('quota exceeded', B);
        return ['- A changed'];
      }),
    };

    const results = await runMonitorOnce(runConfig([A, B]), {
      fetcher,
      store: new JsonFileSnapshotStore(dataDir),
      summarizer,
      now,
    });

    expect(results).toEqual([
      { url: A, label: 'Site A', status: 'changed', summary: ['- A changed'] },
      { url: B, label: 'Site B', status: 'changed', error: 'quota exceeded' },
    ]);
    const stored = await reload();
    expect(stored[B]?.contentText).toBe('new B');
  });

  it('reports fetch failures and keeps processing the remaining sites', async () => {
    fetcher.pages.set(A, new FetchError('Timed out after 30000ms', A));
    fetcher.set(B, 'news', 'Site B');

    const results = await runMonitorOnce(runConfig([A, B]), {
      fetcher,
      store: new JsonFileSnapshotStore(dataDir),
      summarizer: fakeSummarizer(),
      now,
    });

    expect(results).toEqual([
      { url: A, label: A, status: 'failed', error: 'Timed out after 30000ms' },
      { url: B, label: 'Site B', status: 'baseline-established' },
    ]);
    expect(Object.keys(await reload())).toEqual([B]);
  });

  it('updates only the check time of a known site whose fetch fails', async () => {
    fetcher.set(A, 'stable', 'Site A');
    const deps = { fetcher, store: new JsonFileSnapshotStore(dataDir), summarizer: fakeSummarizer(), now };
    await runMonitorOnce(runConfig([A]), deps);

    fetcher.pages.set(A, new FetchError('HTTP 503', A));
    const results = await runMonitorOnce(runConfig([A]), deps);

    expect(results).toEqual([{ url: A, label: 'Site A', status: 'failed', error: 'HTTP 503' }]);
    const stored = (await reload())[A];
    expect(stored?.contentText).toBe('stable');
    expect(stored?.lastChecked).toBe('2026-03-01T00:02:00.000Z');
  });

  it('treats every site as unseen when the store file is corrupt', async () => {
    await fs.writeFile(path.join(dataDir, STORE_FILE_NAME), 'not json at all', 'utf8');
    fetcher.set(A, 'alpha', 'Site A');
    fetcher.set(B, 'beta', 'Site B');

    const results = await runMonitorOnce(runConfig([A, B]), {
      fetcher,
      store: new JsonFileSnapshotStore(dataDir),
      summarizer: fakeSummarizer(),
      now,
    });

    expect(results.map((r) => r.status)).toEqual(['baseline-established', 'baseline-established']);
    expect(console.warn).toHaveBeenCalled();
    expect(Object.keys(await reload()).sort()).toEqual([A, B]);
  });

  it('keeps the input order when fetching concurrently', async () => {
    fetcher.set(A, 'alpha', 'Site A');
    fetcher.set(B, 'beta', 'Site B');

    const results = await runMonitorOnce(
      { ...runConfig([B, A]), concurrency: 2 },
      { fetcher, store: new JsonFileSnapshotStore(dataDir), summarizer: fakeSummarizer(), now }
    );

    expect(results.map((r) => r.url)).toEqual([B, A]);
  });
});
