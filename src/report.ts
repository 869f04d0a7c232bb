import type { MonitoringResult } from "./types.js";

export function formatResult(result: MonitoringResult): string {
  const { label } = result;
  switch (result.status) {
    case "baseline-established":
      return `${label}: Added to monitoring (baseline established)`;
    case "no-change":
      return `${label}: No updates detected`;
    case "changed":
      if (result.error) {
        return `${label}: Changes detected, summary unavailable (${result.error})`;
      }
      return [`${label}: Changes detected`, ...(result.summary ?? []).map((line) => `  ${line}`)].join("\n");
    case "failed":
      return `${label}: Error - ${result.error ?? "unknown error"}`;
  }
}

export function formatReport(results: MonitoringResult[]): string {
  return results.map(formatResult).join("\n");
}
