/*
Profiler configuration: command line options override NBPERF_* environment
variables, which override the defaults.

  NBPERF_URL              JupyterLab server url
  NBPERF_TOKEN            JupyterLab token
  NBPERF_KERNEL_NAME      kernel restarted before each notebook, e.g. python3
  NBPERF_MAX_WAIT_TIME    seconds a cell may run before it times out (300)
  NBPERF_HEADLESS         run the browser headless (true)
  NBPERF_LOG_SCREENSHOTS  save the screenshots used for stability checks
  NBPERF_SAVE_METRICS     append metrics to the use case's CSV files
*/

export type Env = Record<string, string | undefined>;

export const DEFAULT_MAX_WAIT_TIME = 300;

export type ProfilerOptions = {
  url?: string;
  token?: string;
  kernelName?: string;
  headed?: boolean;
  maxWaitTime?: string | number;
  logScreenshots?: boolean;
  saveMetrics?: boolean;
};

export type ProfilerConfig = {
  url: string;
  token: string;
  kernel_name: string;
  headless: boolean;
  // seconds
  max_wait_time: number;
  log_screenshots: boolean;
  save_metrics: boolean;
};

export function envNumber(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (value == null || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

export function envEnabled(env: Env, name: string, fallback = false): boolean {
  const value = env[name];
  if (value == null) return fallback;
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return fallback;
}

export function normalizeUrl(url: string): string {
  const trimmed = `${url}`.trim();
  if (!trimmed) throw new Error("empty url");
  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return trimmed.replace(/\/+$/, "");
  }
  return `http://${trimmed.replace(/\/+$/, "")}`;
}

function parseMaxWaitTime(value: string | number): number {
  const n = typeof value === "number" ? value : Number(`${value}`.trim());
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`invalid max wait time '${value}' (expected a positive number of seconds)`);
  }
  return n;
}

function required(value: string | undefined, option: string, variable: string): string {
  const v = value?.trim();
  if (!v) {
    throw new Error(`missing ${option} (or set ${variable})`);
  }
  return v;
}

export function resolveProfilerConfig(
  options: ProfilerOptions,
  env: Env = process.env,
): ProfilerConfig {
  return {
    url: normalizeUrl(required(options.url ?? env.NBPERF_URL, "--url", "NBPERF_URL")),
    token: required(options.token ?? env.NBPERF_TOKEN, "--token", "NBPERF_TOKEN"),
    kernel_name: required(
      options.kernelName ?? env.NBPERF_KERNEL_NAME,
      "--kernel-name",
      "NBPERF_KERNEL_NAME",
    ),
    headless: options.headed ? false : envEnabled(env, "NBPERF_HEADLESS", true),
    max_wait_time:
      options.maxWaitTime != null
        ? parseMaxWaitTime(options.maxWaitTime)
        : envNumber(env, "NBPERF_MAX_WAIT_TIME", DEFAULT_MAX_WAIT_TIME),
    log_screenshots:
      options.logScreenshots || envEnabled(env, "NBPERF_LOG_SCREENSHOTS", false),
    save_metrics: options.saveMetrics || envEnabled(env, "NBPERF_SAVE_METRICS", false),
  };
}
