/*
Performance metrics collected while profiling notebooks.

Resource usage is sampled from two sources (the client machine running the
browser, and the remote kernel) for two metrics (cpu and memory, both in
percent). Raw samples are kept in *_list fields while a cell runs, and
computeMetrics() reduces each list to min/mean/max.
*/

import { max, mean, min } from "lodash";

export const SOURCES = ["client", "kernel"] as const;
export const METRICS = ["cpu", "memory"] as const;
export const STATS = ["min", "mean", "max"] as const;

export type Source = (typeof SOURCES)[number];
export type Metric = (typeof METRICS)[number];
export type Stat = (typeof STATS)[number];

export type SampleListKey = `${Source}_${Metric}_list`;
export type StatKey = `${Source}_${Stat}_${Metric}`;

export const SOURCE_METRIC_COMBO: ReadonlyArray<readonly [Source, Metric]> =
  SOURCES.flatMap((s) => METRICS.map((m) => [s, m] as const));

// Ordered the way columns appear in reports: per source, per metric, per stat.
export const SOURCE_STAT_METRIC_COMBO: ReadonlyArray<
  readonly [Source, Stat, Metric]
> = SOURCE_METRIC_COMBO.flatMap(([s, m]) => STATS.map((st) => [s, st, m] as const));

export function sampleListKey(source: Source, metric: Metric): SampleListKey {
  return `${source}_${metric}_list`;
}

export function statKey(source: Source, stat: Stat, metric: Metric): StatKey {
  return `${source}_${stat}_${metric}`;
}

export type SampleLists = Record<SampleListKey, number[]>;
export type StatValues = Record<StatKey, number>;

export type BaseMetrics = {
  // seconds
  total_execution_time: number;
  // MB
  client_total_data_received: number;
} & SampleLists &
  StatValues;

export enum CellExecutionStatus {
  PENDING = "Pending",
  IN_PROGRESS = "In Progress",
  COMPLETED = "Completed",
  FAILED = "Failed",
  TIMED_OUT = "Timed Out",
}

export function isFinalStatus(status: CellExecutionStatus): boolean {
  return (
    status !== CellExecutionStatus.PENDING &&
    status !== CellExecutionStatus.IN_PROGRESS
  );
}

export type CellMetrics = BaseMetrics & {
  // 1-based position of the cell in the notebook
  cell_index: number;
  execution_status: CellExecutionStatus;
};

export type NotebookMetrics = BaseMetrics & {
  total_cells: number;
  executed_cells: number;
  profiled_cells: number;
};

function emptyBaseMetrics(): BaseMetrics {
  return {
    total_execution_time: 0,
    client_total_data_received: 0,
    client_cpu_list: [],
    client_memory_list: [],
    kernel_cpu_list: [],
    kernel_memory_list: [],
    client_min_cpu: 0,
    client_mean_cpu: 0,
    client_max_cpu: 0,
    client_min_memory: 0,
    client_mean_memory: 0,
    client_max_memory: 0,
    kernel_min_cpu: 0,
    kernel_mean_cpu: 0,
    kernel_max_cpu: 0,
    kernel_min_memory: 0,
    kernel_mean_memory: 0,
    kernel_max_memory: 0,
  };
}

export function newCellMetrics(cell_index: number): CellMetrics {
  return {
    ...emptyBaseMetrics(),
    cell_index,
    execution_status: CellExecutionStatus.PENDING,
  };
}

export function newNotebookMetrics(total_cells = 0): NotebookMetrics {
  return {
    ...emptyBaseMetrics(),
    total_cells,
    executed_cells: 0,
    profiled_cells: 0,
  };
}

const STAT_FUNCTIONS: Record<Stat, (values: number[]) => number | undefined> = {
  min,
  mean,
  max,
};

/**
 * Reduce every non-empty raw sample list to its summary statistics.
 * Statistics of empty lists are left untouched.
 */
export function computeMetrics(metrics: BaseMetrics): void {
  for (const [s, st, m] of SOURCE_STAT_METRIC_COMBO) {
    const values = metrics[sampleListKey(s, m)];
    if (values.length === 0) continue;
    metrics[statKey(s, st, m)] = STAT_FUNCTIONS[st](values) ?? 0;
  }
}

export function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

export type MetricsValue = number | string;

/**
 * The reportable fields of a metrics object, in declaration order, without
 * the raw sample lists. Numbers are rounded to 2 decimal places.
 */
export function metricsRecord(
  metrics: CellMetrics | NotebookMetrics,
): Record<string, MetricsValue> {
  const head: Record<string, MetricsValue> =
    "cell_index" in metrics
      ? {
          cell_index: metrics.cell_index,
          execution_status: metrics.execution_status,
        }
      : {
          total_cells: metrics.total_cells,
          executed_cells: metrics.executed_cells,
          profiled_cells: metrics.profiled_cells,
        };
  const record: Record<string, MetricsValue> = {
    ...head,
    total_execution_time: round2(metrics.total_execution_time),
    client_total_data_received: round2(metrics.client_total_data_received),
  };
  for (const [s, st, m] of SOURCE_STAT_METRIC_COMBO) {
    const key = statKey(s, st, m);
    record[key] = round2(metrics[key]);
  }
  return record;
}

function formatBase(metrics: BaseMetrics): string {
  return [
    `total execution time: ${metrics.total_execution_time.toFixed(2)} seconds.`,
    `client total data received: ${metrics.client_total_data_received.toFixed(2)} MB.`,
    ...SOURCE_STAT_METRIC_COMBO.map(
      ([s, st, m]) =>
        `${s} ${st} ${m} usage: ${metrics[statKey(s, st, m)].toFixed(2)}%.`,
    ),
  ].join(" ");
}

export function formatCellMetrics(metrics: CellMetrics): string {
  return `Cell ${metrics.cell_index}: Execution: ${metrics.execution_status} ${formatBase(metrics)}`;
}

export function formatNotebookMetrics(metrics: NotebookMetrics): string {
  return (
    `Notebook with ${metrics.total_cells} cells, ` +
    `of which ${metrics.executed_cells} were executed and ` +
    `${metrics.profiled_cells} were profiled. ${formatBase(metrics)}`
  );
}
