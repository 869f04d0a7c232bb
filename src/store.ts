import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StoreError, errorMessage } from "./errors.js";
import type { SiteRecord, SnapshotMap } from "./types.js";
import { md5 } from "./utils.js";

export const STORE_FILE_NAME = "website_storage.json";

const persistedRecordSchema = z.object({
  content_text: z.string(),
  content_hash: z.string(),
  title: z.string().default("No title"),
  first_seen: z.string().optional(),
  last_checked: z.string(),
  last_changed: z.string().nullable().default(null),
});

// Shape written by earlier releases of the monitor.
const legacyRecordSchema = z.object({
  content: z.string(),
  hash: z.string(),
  title: z.string().default("No title"),
  last_updated: z.string(),
  first_seen: z.string().optional(),
});

export type PersistedRecord = {
  content_text: string;
  content_hash: string;
  title: string;
  first_seen: string;
  last_checked: string;
  last_changed: string | null;
};

export function toPersisted(record: SiteRecord): PersistedRecord {
  return {
    content_text: record.contentText,
    content_hash: record.contentHash,
    title: record.title,
    first_seen: record.firstSeen,
    last_checked: record.lastChecked,
    last_changed: record.lastChanged,
  };
}

export function fromPersisted(url: string, raw: unknown): SiteRecord | null {
  const current = persistedRecordSchema.safeParse(raw);
  if (current.success) {
    const r = current.data;
    return {
      url,
      contentText: r.content_text,
      contentHash: r.content_hash,
      title: r.title,
      firstSeen: r.first_seen ?? r.last_checked,
      lastChecked: r.last_checked,
      lastChanged: r.last_changed,
    };
  }

  const legacy = legacyRecordSchema.safeParse(raw);
  if (legacy.success) {
    const r = legacy.data;
    return {
      url,
      contentText: r.content,
      contentHash: r.hash,
      title: r.title,
      firstSeen: r.first_seen ?? r.last_updated,
      lastChecked: r.last_updated,
      lastChanged: null,
    };
  }

  return null;
}

/**
 * Holds the URL -> snapshot mapping between `load` and `save`. Backends only
 * decide how the whole mapping is read and written.
 */
export abstract class SnapshotStore {
  private records: SnapshotMap = {};

  protected abstract readAll(): Promise<SnapshotMap>;
  protected abstract writeAll(records: SnapshotMap): Promise<void>;

  async load(): Promise<SnapshotMap> {
    this.records = await this.readAll();
    return { ...this.records };
  }

  get(url: string): SiteRecord | undefined {
    return Object.hasOwn(this.records, url) ? this.records[url] : undefined;
  }

  put(url: string, record: SiteRecord): void {
    this.records[url] = record;
  }

  async save(records: SnapshotMap = this.records): Promise<void> {
    await this.writeAll(records);
    this.records = { ...records };
  }
}

export class JsonFileSnapshotStore extends SnapshotStore {
  readonly filePath: string;

  constructor(dataDir: string) {
    super();
    this.filePath = path.join(dataDir, STORE_FILE_NAME);
  }

  protected async readAll(): Promise<SnapshotMap> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return {};
      console.warn(`[STORE] Could not read ${this.filePath}: ${errorMessage(err)}. Starting fresh.`);
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.warn(`[STORE] ${this.filePath} is not valid JSON (${errorMessage(err)}). Starting fresh.`);
      return {};
    }
    if (!isPlainObject(parsed)) {
      console.warn(`[STORE] ${this.filePath} does not hold a JSON object. Starting fresh.`);
      return {};
    }

    const records: SnapshotMap = {};
    for (const [url, value] of Object.entries(parsed)) {
      const record = fromPersisted(url, value);
      if (!record) {
        console.warn(`[STORE] Dropping unreadable record for ${url}`);
        continue;
      }
      records[url] = record;
    }
    console.log(`[STORE] Loaded ${Object.keys(records).length} snapshot(s)`);
    return records;
  }

  protected async writeAll(records: SnapshotMap): Promise<void> {
    const data: Record<string, PersistedRecord> = {};
    for (const [url, record] of Object.entries(records)) {
      data[url] = toPersisted(record);
    }

    const dir = path.dirname(this.filePath);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StoreError(`Cannot create ${dir}: ${errorMessage(err)}`, undefined, { cause: err });
    }

    // Rename within one directory is atomic, so readers see the old or the new file.
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw new StoreError(`Failed to save snapshots to ${this.filePath}: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }
    console.log(`[STORE] Saved data for ${Object.keys(data).length} website(s)`);
  }
}

export interface SnapshotDocument extends PersistedRecord {
  url: string;
}

/** The subset of a Firestore CollectionReference the store relies on. */
export interface SnapshotCollection {
  get(): Promise<{ docs: Array<{ id: string; data(): unknown }> }>;
  doc(id: string): { set(data: SnapshotDocument): Promise<unknown> };
}

export class FirestoreSnapshotStore extends SnapshotStore {
  constructor(private readonly collection: SnapshotCollection) {
    super();
  }

  protected async readAll(): Promise<SnapshotMap> {
    let snapshot: Awaited<ReturnType<SnapshotCollection["get"]>>;
    try {
      snapshot = await this.collection.get();
    } catch (err) {
      console.warn(`[STORE] Could not read Firestore snapshots: ${errorMessage(err)}. Starting fresh.`);
      return {};
    }

    const records: SnapshotMap = {};
    for (const doc of snapshot.docs) {
      const data = doc.data();
      const url = isPlainObject(data) && typeof data.url === "string" ? data.url : null;
      const record = url ? fromPersisted(url, data) : null;
      if (!url || !record) {
        console.warn(`[STORE] Dropping unreadable Firestore document ${doc.id}`);
        continue;
      }
      records[url] = record;
    }
    console.log(`[STORE] Loaded ${Object.keys(records).length} snapshot(s) from Firestore`);
    return records;
  }

  protected async writeAll(records: SnapshotMap): Promise<void> {
    for (const [url, record] of Object.entries(records)) {
      try {
        await this.collection.doc(md5(url)).set({ url, ...toPersisted(record) });
      } catch (err) {
        throw new StoreError(`Failed to save snapshot to Firestore: ${errorMessage(err)}`, url, { cause: err });
      }
    }
    console.log(`[STORE] Saved data for ${Object.keys(records).length} website(s) to Firestore`);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
