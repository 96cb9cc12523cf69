/*
Append profiling results to CSV files, one row per cell and one per notebook:

  <dir>/cell_metrics.csv
  <dir>/notebook_metrics.csv

Every row starts with the notebook file name and its parameters (as
<name>_param columns); metric columns carry a _metric suffix. The header is
written when a file is created.
*/

import { appendFile, mkdir, stat } from "node:fs/promises";
import { join } from "node:path";

import getLogger from "@nbperf/backend/logger";
import {
  metricsRecord,
  type CellMetrics,
  type MetricsValue,
  type NotebookMetrics,
} from "@nbperf/util/metrics";
import { hasErrorCode } from "@nbperf/util/misc";
import { pyStr, type PyValue } from "@nbperf/util/python-format";

import type { MetricsReporter } from "./notebook-profiler";

const logger = getLogger("profiler:metrics-csv");

export const METRICS_DIR = "metrics";
export const CELL_METRICS_FILENAME = "cell_metrics.csv";
export const NOTEBOOK_METRICS_FILENAME = "notebook_metrics.csv";

// Columns identifying a cell row; they are not metrics.
const CELL_KEYS = new Set(["cell_index", "execution_status"]);

export function csvField(value: MetricsValue): string {
  const text = `${value}`;
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvLine(values: MetricsValue[]): string {
  return `${values.map(csvField).join(",")}\n`;
}

async function isEmpty(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size === 0;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return true;
    }
    throw err;
  }
}

export class MetricsCsvWriter implements MetricsReporter {
  private readonly dir: string;
  private readonly head: Record<string, MetricsValue>;

  constructor(dir: string, notebookFilename: string, parameters: Record<string, PyValue>) {
    this.dir = dir;
    this.head = { notebook_filename: notebookFilename };
    for (const [key, value] of Object.entries(parameters)) {
      this.head[`${key}_param`] = typeof value === "number" ? value : pyStr(value);
    }
  }

  row(metrics: CellMetrics | NotebookMetrics): Record<string, MetricsValue> {
    const row: Record<string, MetricsValue> = { ...this.head };
    for (const [key, value] of Object.entries(metricsRecord(metrics))) {
      row[CELL_KEYS.has(key) ? key : `${key}_metric`] = value;
    }
    return row;
  }

  private async append(filename: string, row: Record<string, MetricsValue>): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, filename);
    let text = csvLine(Object.values(row));
    if (await isEmpty(path)) {
      text = csvLine(Object.keys(row)) + text;
    }
    await appendFile(path, text, "utf8");
    logger.debug(`metrics appended to ${path}`);
  }

  async reportCell(metrics: CellMetrics): Promise<void> {
    await this.append(CELL_METRICS_FILENAME, this.row(metrics));
  }

  async reportNotebook(metrics: NotebookMetrics): Promise<void> {
    await this.append(NOTEBOOK_METRICS_FILENAME, this.row(metrics));
    logger.info(`metrics saved to ${this.dir}`);
  }
}
