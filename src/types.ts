export interface SiteRecord {
  url: string;
  contentText: string;
  contentHash: string; // md5 of contentText
  title: string;
  firstSeen: string; // ISO
  lastChecked: string; // ISO
  lastChanged: string | null; // ISO, null until the first detected change
}

export type SnapshotMap = Record<string, SiteRecord>;

export interface PageContent {
  text: string;
  title: string;
}

export type MonitoringStatus = "baseline-established" | "no-change" | "changed" | "failed";

export interface MonitoringResult {
  url: string;
  label: string;
  status: MonitoringStatus;
  summary?: string[];
  error?: string;
}

export interface SiteContext {
  url: string;
  title: string;
}
