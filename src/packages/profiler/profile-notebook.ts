/*
Profile one generated notebook on a JupyterLab server:

  1. shut down every session and restart the configured kernel
  2. upload the notebook and open it in a browser
  3. run its cells one at a time, collecting metrics
  4. close the browser and delete the uploaded notebook, whatever happened
*/

import { basename, dirname, join } from "node:path";
import { delay } from "awaiting";

import getLogger from "@nbperf/backend/logger";
import { ClientUsageSampler } from "@nbperf/backend/client-usage";
import { inspectNotebook } from "@nbperf/jupyter/inspect";
import { JupyterLabClient } from "@nbperf/jupyter/jupyterlab-client";
import { CellExecutionStatus, type CellMetrics, type NotebookMetrics } from "@nbperf/util/metrics";
import { readNotebook } from "@nbperf/util/notebook-format";
import { numericValue, pyRepr, type PyValue } from "@nbperf/util/python-format";

import { BrowserNotebook, type OpenNotebookOptions } from "./browser";
import type { ProfilerConfig } from "./config";
import { METRICS_DIR, MetricsCsvWriter } from "./metrics-csv";
import { NetworkLog } from "./network-log";
import { NotebookProfiler, type NotebookPage } from "./notebook-profiler";
import { SCREENSHOTS_DIR, screenshotLogger } from "./screenshots";
import { ProfilingSession, type KernelTelemetry, type UsageSampler, type VizFinder } from "./session";

const logger = getLogger("profiler:profile-notebook");

// Time given to the freshly opened notebook to start its kernel.
export const KERNEL_STARTUP_MS = 5000;

export const THROTTLING_PARAMETER = "ui_network_throttling";

export interface JupyterLabApi extends KernelTelemetry {
  clearAllSessions(): Promise<void>;
  restartKernel(kernelName: string): Promise<void>;
  uploadNotebook(path: string): Promise<string>;
  deleteNotebook(filename: string): Promise<void>;
  notebookUrl(filename: string): string;
}

export interface OpenedNotebook extends NotebookPage, VizFinder {
  close(): Promise<void>;
}

export interface ProfileNotebookDeps {
  client?: JupyterLabApi;
  openNotebook?: (opts: OpenNotebookOptions) => Promise<OpenedNotebook>;
  sampler?: UsageSampler;
  // where metrics/ and screenshots/ go; defaults to the use case directory
  outputDir?: string;
  startupMs?: number;
  settleMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface NotebookProfile {
  notebook: string;
  // every cell ran and completed
  completed: boolean;
  cells: CellMetrics[];
  metrics: NotebookMetrics;
}

// Generated notebooks live in <usecase>/notebooks/.
export function usecaseDir(notebookPath: string): string {
  return dirname(dirname(notebookPath));
}

/**
 * Download throughput in bytes per second requested by the notebook's
 * parameters, if any.
 */
export function downloadThroughput(parameters: Record<string, PyValue>): number | undefined {
  const value = parameters[THROTTLING_PARAMETER];
  if (value == null) return;
  const throughput = numericValue(value);
  if (throughput == null || !Number.isFinite(throughput) || throughput <= 0) {
    logger.warn(
      `ignoring ${THROTTLING_PARAMETER}=${pyRepr(value)}, expected a positive number`,
    );
    return;
  }
  return throughput;
}

export async function profileNotebook(
  notebookPath: string,
  config: ProfilerConfig,
  deps: ProfileNotebookDeps = {},
): Promise<NotebookProfile> {
  const client = deps.client ?? new JupyterLabClient(config.url, config.token);
  const openNotebook = deps.openNotebook ?? ((opts) => BrowserNotebook.open(opts));
  const sleep = deps.sleep ?? delay;
  const outputDir = deps.outputDir ?? usecaseDir(notebookPath);

  const inspection = inspectNotebook(await readNotebook(notebookPath));
  logger.info(`profiling ${basename(notebookPath)}`, inspection.parameters);

  await client.clearAllSessions();
  await client.restartKernel(config.kernel_name);
  const filename = await client.uploadNotebook(notebookPath);
  try {
    const networkLog = new NetworkLog(deps.now);
    const page = await openNotebook({
      url: client.notebookUrl(filename),
      headless: config.headless,
      networkLog,
      downloadThroughput: downloadThroughput(inspection.parameters),
    });
    try {
      await sleep(deps.startupMs ?? KERNEL_STARTUP_MS);
      const session = new ProfilingSession({
        telemetry: client,
        notebookFilename: filename,
        page,
        networkLog,
        sampler: deps.sampler ?? new ClientUsageSampler(),
        logScreenshots: config.log_screenshots
          ? screenshotLogger(join(outputDir, SCREENSHOTS_DIR))
          : undefined,
        sleep,
      });
      const profiler = new NotebookProfiler({
        session,
        maxWaitTime: config.max_wait_time,
        reporter: config.save_metrics
          ? new MetricsCsvWriter(join(outputDir, METRICS_DIR), filename, inspection.parameters)
          : undefined,
        settleMs: deps.settleMs,
        now: deps.now,
        sleep,
      });
      const metrics = await profiler.run(page, inspection);
      const cells = profiler.cells;
      return {
        notebook: filename,
        completed:
          cells.length === inspection.total_cells &&
          cells.every((c) => c.execution_status === CellExecutionStatus.COMPLETED),
        cells,
        metrics,
      };
    } finally {
      await page.close();
    }
  } finally {
    await client.deleteNotebook(filename);
  }
}
