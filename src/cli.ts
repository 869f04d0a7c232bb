import cron from "node-cron";
import fs from "node:fs";
import { type AppConfig, USAGE, loadConfig, parseCliArgs } from "./config.js";
import { LockError, MonitorError, errorMessage } from "./errors.js";
import { initializeFirestore } from "./firebase.js";
import { acquireRunLock } from "./lock.js";
import { type MonitorDeps, runMonitorOnce } from "./monitor.js";
import { formatReport } from "./report.js";
import { ContentFetcher } from "./scraper.js";
import { FirestoreSnapshotStore, JsonFileSnapshotStore, type SnapshotStore } from "./store.js";
import { SummaryClient } from "./summary.js";

function createStore(config: AppConfig): SnapshotStore {
  const firestore = initializeFirestore(config.firestore);
  if (firestore) {
    console.log(`[STORE] Using Firestore collection ${config.firestore.collection}`);
    return new FirestoreSnapshotStore(firestore.collection(config.firestore.collection));
  }
  return new JsonFileSnapshotStore(config.dataDir);
}

async function runLocked(config: AppConfig, deps: MonitorDeps): Promise<string> {
  const release = await acquireRunLock(config.dataDir);
  try {
    const results = await runMonitorOnce(
      {
        urls: config.urls,
        model: config.model,
        concurrency: config.fetch.concurrency,
        requestDelayMs: config.fetch.requestDelayMs,
      },
      deps
    );
    return formatReport(results);
  } finally {
    await release();
  }
}

/**
 * Runs the monitor for the given arguments and environment and resolves with
 * the process exit code. `overrides` replaces the network and storage
 * collaborators built from the config.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<MonitorDeps> = {}
): Promise<number> {
  try {
    return await runConfigured(argv, env, overrides);
  } catch (err) {
    if (err instanceof MonitorError) {
      console.error(`[MONITOR] ${err.message}`);
      return 1;
    }
    throw err;
  }
}

async function runConfigured(argv: string[], env: NodeJS.ProcessEnv, overrides: Partial<MonitorDeps>): Promise<number> {
  const cli = parseCliArgs(argv);
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }
  const config = loadConfig(cli, env);

  try {
    fs.mkdirSync(config.dataDir, { recursive: true });
  } catch (err) {
    console.error(`[MONITOR] Cannot create data directory ${config.dataDir}: ${errorMessage(err)}`);
    return 1;
  }

  if (!config.summary.apiKey) {
    console.warn("[MONITOR] GROQ_API_KEY is not set; changed sites will be reported without a summary.");
  }

  const deps: MonitorDeps = {
    fetcher:
      overrides.fetcher ??
      new ContentFetcher({ timeoutMs: config.fetch.timeoutMs, userAgent: config.fetch.userAgent }),
    store: overrides.store ?? createStore(config),
    summarizer:
      overrides.summarizer ??
      new SummaryClient({
        apiKey: config.summary.apiKey,
        baseURL: config.summary.baseURL,
        timeoutMs: config.summary.timeoutMs,
        maxInputChars: config.summary.maxInputChars,
      }),
    now: overrides.now,
  };

  console.log("Website Update Monitor");
  console.log(`Monitoring ${config.urls.length} website(s)...`);
  console.log(`Using model: ${config.model}`);
  console.log(`Data directory: ${config.dataDir}`);
  console.log("-".repeat(50));

  if (!config.schedule) {
    const report = await runLocked(config, deps);
    console.log("\nMonitoring Results:");
    console.log(report);
    return 0;
  }

  const { schedule } = config;
  const tick = async (): Promise<void> => {
    console.log(`[CRON] Run started at ${new Date().toISOString()}`);
    try {
      const report = await runLocked(config, deps);
      console.log(report);
      console.log("[CRON] Run completed.");
    } catch (err) {
      if (err instanceof LockError) {
        console.warn(`[CRON] Skipping run: ${err.message}`);
        return;
      }
      console.error(`[CRON] Run error: ${errorMessage(err)}`);
    }
  };

  console.log(`[CRON] Scheduled with "${schedule}"`);
  await tick();
  cron.schedule(schedule, tick);
  return new Promise<number>((resolve) => {
    process.once("SIGINT", () => resolve(130));
    process.once("SIGTERM", () => resolve(143));
  });
}
