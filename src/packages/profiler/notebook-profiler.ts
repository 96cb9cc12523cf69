/*
Run every cell of an open notebook, one at a time, and aggregate the cell
metrics into notebook metrics.

Notebook statistics are computed over the union of all profiled cells' raw
samples, not averaged from the cells' own statistics. A cell that does not
complete stops the run: later cells depend on its state.
*/

import { delay } from "awaiting";

import getLogger from "@nbperf/backend/logger";
import type { NotebookInspection } from "@nbperf/jupyter/inspect";
import {
  CellExecutionStatus,
  computeMetrics,
  formatNotebookMetrics,
  newNotebookMetrics,
  sampleListKey,
  SOURCE_METRIC_COMBO,
  type CellMetrics,
  type NotebookMetrics,
} from "@nbperf/util/metrics";

import { CellExecutor, type CellHandle, type ExecutionSession } from "./cell-executor";
import { CellCountMismatchError } from "./errors";

const logger = getLogger("profiler:notebook-profiler");

// Pause between two cells so the page settles.
export const CELL_SETTLE_MS = 2000;

export interface NotebookPage {
  // The rendered code cells, in notebook order.
  codeCells(): Promise<CellHandle[]>;
}

export interface MetricsReporter {
  reportCell(metrics: CellMetrics): Promise<void>;
  reportNotebook(metrics: NotebookMetrics): Promise<void>;
}

export interface NotebookProfilerOptions {
  session: ExecutionSession;
  // seconds, per cell
  maxWaitTime: number;
  reporter?: MetricsReporter;
  settleMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

export function addCellMetrics(total: NotebookMetrics, cell: CellMetrics): void {
  total.profiled_cells += 1;
  total.total_execution_time += cell.total_execution_time;
  total.client_total_data_received += cell.client_total_data_received;
  for (const [s, m] of SOURCE_METRIC_COMBO) {
    const key = sampleListKey(s, m);
    total[key].push(...cell[key]);
  }
}

export class NotebookProfiler {
  // metrics of the cells executed by the last run
  cells: CellMetrics[] = [];
  private readonly opts: NotebookProfilerOptions;

  constructor(opts: NotebookProfilerOptions) {
    this.opts = opts;
  }

  async run(page: NotebookPage, inspection: NotebookInspection): Promise<NotebookMetrics> {
    const { session, maxWaitTime, reporter, now } = this.opts;
    const sleep = this.opts.sleep ?? delay;
    const settleMs = this.opts.settleMs ?? CELL_SETTLE_MS;
    const metrics = newNotebookMetrics(inspection.total_cells);
    this.cells = [];

    const cells = await page.codeCells();
    logger.info(`number of cells in the notebook: ${cells.length}`);
    if (cells.length !== inspection.total_cells) {
      throw new CellCountMismatchError(inspection.total_cells, cells.length);
    }

    logger.info("starting profiling...");
    for (let i = 0; i < cells.length; i += 1) {
      const spec = inspection.cell_specs[i];
      const executor = new CellExecutor({
        cell: cells[i],
        spec,
        maxWaitTime,
        session,
        now,
        sleep,
      });
      const cellMetrics = await executor.execute();
      this.cells.push(cellMetrics);
      await reporter?.reportCell(cellMetrics);

      metrics.executed_cells += 1;
      if (!spec.skip_profiling) {
        addCellMetrics(metrics, cellMetrics);
      }

      if (cellMetrics.execution_status !== CellExecutionStatus.COMPLETED) {
        logger.warn(
          `cell ${spec.index} ended as '${cellMetrics.execution_status}', not running the remaining ${cells.length - i - 1} cells`,
        );
        break;
      }
      if (settleMs > 0 && i < cells.length - 1) {
        await sleep(settleMs);
      }
    }

    computeMetrics(metrics);
    logger.info(formatNotebookMetrics(metrics));
    await reporter?.reportNotebook(metrics);
    logger.info("profiling completed");
    return metrics;
  }
}
