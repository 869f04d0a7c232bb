import cron from "node-cron";
import { z } from "zod";
import fs from "node:fs";
import { parseArgs } from "node:util";
import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_USER_AGENT } from "./scraper.js";
import { DEFAULT_SUMMARY_BASE_URL } from "./summary.js";

export const DEFAULT_MODEL = "llama-3.1-8b-instant";
export const DEFAULT_DATA_DIR = "./website_data";

export const USAGE = `Usage: site-change-monitor [options] [url...]

Options:
  -u, --url <url>         URL to monitor (repeatable)
      --urls-file <path>  JSON array or newline-separated list of URLs
  -m, --model <id>        Summarization model (default: ${DEFAULT_MODEL})
  -d, --data-dir <path>   Directory for the snapshot store (default: ${DEFAULT_DATA_DIR})
      --schedule <cron>   Keep running and check on this cron schedule
  -h, --help              Show this help

Environment:
  GROQ_API_KEY            API key for the summarization service
  MONITOR_URLS            Comma-separated URLs, merged with the ones above`;

export interface CliArgs {
  help: boolean;
  urls: string[];
  urlsFile?: string;
  model?: string;
  dataDir?: string;
  schedule?: string;
}

export interface AppConfig {
  urls: string[];
  model: string;
  dataDir: string;
  schedule?: string;
  summary: {
    apiKey?: string;
    baseURL: string;
    timeoutMs: number;
    maxInputChars: number;
  };
  fetch: {
    timeoutMs: number;
    userAgent: string;
    concurrency: number;
    requestDelayMs: number;
  };
  firestore: {
    collection: string;
    credentialsPath?: string;
    serviceAccountJson?: string;
  };
}

function intSetting(fallback: number, min: number) {
  return z
    .string()
    .default(String(fallback))
    .transform((v) => {
      const n = parseInt(v, 10);
      return Number.isNaN(n) ? fallback : Math.max(min, n);
    });
}

const schema = z.object({
  urls: z.array(z.string().url()).min(1, "no websites configured"),
  GROQ_API_KEY: z.string().optional(),
  SUMMARY_API_BASE_URL: z.string().url().default(DEFAULT_SUMMARY_BASE_URL),
  MONITOR_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  MONITOR_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
  CRON_SCHEDULE: z
    .string()
    .optional()
    .refine((v) => v === undefined || cron.validate(v), "invalid cron expression"),
  FETCH_TIMEOUT_MS: intSetting(30_000, 1),
  SUMMARY_TIMEOUT_MS: intSetting(60_000, 1),
  MAX_SUMMARY_INPUT_CHARS: intSetting(8000, 1),
  REQUEST_DELAY_MS: intSetting(1000, 0),
  FETCH_CONCURRENCY: intSetting(1, 1),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  FIRESTORE_COLLECTION: z.string().min(1).default("website_snapshots"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
});

export function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        url: { type: "string", short: "u", multiple: true },
        "urls-file": { type: "string" },
        model: { type: "string", short: "m" },
        "data-dir": { type: "string", short: "d" },
        schedule: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
    return {
      help: values.help ?? false,
      urls: [...positionals, ...(values.url ?? [])],
      urlsFile: values["urls-file"],
      model: values.model,
      dataDir: values["data-dir"],
      schedule: values.schedule,
    };
  } catch (err) {
    throw new ConfigError(errorMessage(err), undefined, { cause: err });
  }
}

export function parseUrlList(raw: string): string[] {
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    const parsed = z.array(z.string()).safeParse(JSON.parse(trimmed));
    if (!parsed.success) {
      throw new ConfigError("URL list file must be a JSON array of strings");
    }
    return parsed.data.map((u) => u.trim()).filter(Boolean);
  }
  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

function readUrlsFile(filePath: string): string[] {
  try {
    return parseUrlList(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Cannot read URL list ${filePath}: ${errorMessage(err)}`, undefined, { cause: err });
  }
}

export function loadConfig(cli: CliArgs, env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat `KEY=` lines in .env the same as unset keys.
  const settings: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") settings[key] = value.trim();
  }

  const urlsFile = cli.urlsFile ?? settings.MONITOR_URLS_FILE;
  const urls = [
    ...cli.urls,
    ...(urlsFile ? readUrlsFile(urlsFile) : []),
    ...(settings.MONITOR_URLS ?? "").split(",").map((u) => u.trim()).filter(Boolean),
  ];

  const parsed = schema.safeParse({
    ...settings,
    urls: [...new Set(urls)],
    ...(cli.model ? { MONITOR_MODEL: cli.model } : {}),
    ...(cli.dataDir ? { MONITOR_DATA_DIR: cli.dataDir } : {}),
    ...(cli.schedule ? { CRON_SCHEDULE: cli.schedule } : {}),
  });
  if (!parsed.success) {
    // Show concise errors without secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigError(`Invalid configuration: ${errs}`);
  }

  const c = parsed.data;
  return {
    urls: c.urls,
    model: c.MONITOR_MODEL,
    dataDir: c.MONITOR_DATA_DIR,
    schedule: c.CRON_SCHEDULE,
    summary: {
      apiKey: c.GROQ_API_KEY,
      baseURL: c.SUMMARY_API_BASE_URL,
      timeoutMs: c.SUMMARY_TIMEOUT_MS,
      maxInputChars: c.MAX_SUMMARY_INPUT_CHARS,
    },
    fetch: {
      timeoutMs: c.FETCH_TIMEOUT_MS,
      userAgent: c.USER_AGENT,
      concurrency: c.FETCH_CONCURRENCY,
      requestDelayMs: c.REQUEST_DELAY_MS,
    },
    firestore: {
      collection: c.FIRESTORE_COLLECTION,
      credentialsPath: c.GOOGLE_APPLICATION_CREDENTIALS,
      serviceAccountJson: c.FIREBASE_SERVICE_ACCOUNT_JSON,
    },
  };
}
