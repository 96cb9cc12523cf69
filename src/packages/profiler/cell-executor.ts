/*
Drive one notebook cell through the browser and decide when it is done.

There is no direct completion signal from the page, so after issuing the run
command the executor polls every POLL_INTERVAL_MS and races three exits:

  - timeout:      more than maxWaitTime seconds have elapsed -> Timed Out
  - kernel death: the kernel process id changed               -> Failed
  - completion:   the completion marker shows up in the cell output, and for
                  wait_for_viz cells the visualization is also stable
                                                              -> Completed

Timeout and kernel death are checked on every poll, before the output, so a
cell that never prints its marker still terminates.

Statuses only move forward: Pending -> In Progress -> one final status.
*/

import { delay } from "awaiting";

import getLogger from "@nbperf/backend/logger";
import type { ClientUsage } from "@nbperf/backend/client-usage";
import type { CellSpec } from "@nbperf/jupyter/inspect";
import {
  CellExecutionStatus,
  computeMetrics,
  formatCellMetrics,
  isFinalStatus,
  newCellMetrics,
  type CellMetrics,
} from "@nbperf/util/metrics";

import { IllegalTransitionError, KernelUnavailableError } from "./errors";
import type { VizElement } from "./viz-element";

const logger = getLogger("profiler:cell-executor");

export const POLL_INTERVAL_MS = 500;

// A line of output containing the token printed by the completion marker.
export const COMPLETION_OUTPUT = /^.*DONE.*$/m;

const TRANSITIONS: Record<CellExecutionStatus, readonly CellExecutionStatus[]> = {
  [CellExecutionStatus.PENDING]: [CellExecutionStatus.IN_PROGRESS],
  [CellExecutionStatus.IN_PROGRESS]: [
    CellExecutionStatus.COMPLETED,
    CellExecutionStatus.FAILED,
    CellExecutionStatus.TIMED_OUT,
  ],
  [CellExecutionStatus.COMPLETED]: [],
  [CellExecutionStatus.FAILED]: [],
  [CellExecutionStatus.TIMED_OUT]: [],
};

// A rendered code cell.
export interface CellHandle {
  // Focus the cell and run it (shift+enter).
  run(): Promise<void>;
  // Text of the cell's rendered text outputs, one output per line.
  outputText(): Promise<string>;
}

export interface KernelSample {
  // percent
  cpu: number;
  // percent of the host's memory
  memory: number;
}

/**
 * What a cell needs from the notebook it runs in.
 */
export interface ExecutionSession {
  // The visualization element, once detected.
  getVizElement(): VizElement | undefined;
  // Look for the visualization element on the page and keep it if found.
  detectVizElement(): Promise<VizElement | undefined>;
  getKernelPid(): Promise<number | undefined>;
  // Undefined when the kernel reports no usage right now.
  getKernelUsage(): Promise<KernelSample | undefined>;
  sampleClientUsage(): ClientUsage;
  // MB received by the page strictly between two epoch times in ms.
  getDataReceived(start: number, end: number): number;
}

export interface CellExecutorOptions {
  cell: CellHandle;
  spec: CellSpec;
  // seconds
  maxWaitTime: number;
  session: ExecutionSession;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

export class CellExecutor {
  readonly metrics: CellMetrics;
  private readonly cell: CellHandle;
  private readonly spec: CellSpec;
  private readonly maxWaitMs: number;
  private readonly session: ExecutionSession;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private start = 0;
  private markerFound = false;

  constructor({ cell, spec, maxWaitTime, session, now, sleep }: CellExecutorOptions) {
    this.cell = cell;
    this.spec = spec;
    this.maxWaitMs = maxWaitTime * 1000;
    this.session = session;
    this.now = now ?? Date.now;
    this.sleep = sleep ?? delay;
    this.metrics = newCellMetrics(spec.index);
  }

  get status(): CellExecutionStatus {
    return this.metrics.execution_status;
  }

  get index(): number {
    return this.spec.index;
  }

  setStatus(status: CellExecutionStatus): void {
    if (!TRANSITIONS[this.status].includes(status)) {
      throw new IllegalTransitionError(this.index, this.status, status);
    }
    logger.debug(`cell ${this.index}: ${this.status} -> ${status}`);
    this.metrics.execution_status = status;
  }

  private elapsed(): number {
    return this.now() - this.start;
  }

  private async lookForMarker(): Promise<boolean> {
    if (this.markerFound) return true;
    const text = await this.cell.outputText();
    if (COMPLETION_OUTPUT.test(text)) {
      logger.info(`cell ${this.index}: completion marker found`);
      this.markerFound = true;
    }
    return this.markerFound;
  }

  // True once the visualization has been seen stable.
  private async vizIsStable(): Promise<boolean> {
    const viz = this.session.getVizElement();
    if (viz != null) {
      return await viz.isStable(this.index);
    }
    logger.debug("looking for the viz element in the page...");
    await this.session.detectVizElement();
    return false;
  }

  private async captureMetrics(): Promise<void> {
    if (this.spec.skip_profiling || this.status === CellExecutionStatus.FAILED) {
      return;
    }
    const t = this.now();
    const m = this.metrics;
    m.total_execution_time = (t - this.start) / 1000;

    const client = this.session.sampleClientUsage();
    m.client_cpu_list.push(client.cpu);
    m.client_memory_list.push(client.memory);

    const kernel = await this.session.getKernelUsage();
    if (kernel == null) {
      logger.warn(`cell ${this.index}: kernel usage unavailable, skipping sample`);
    } else {
      m.kernel_cpu_list.push(kernel.cpu);
      m.kernel_memory_list.push(kernel.memory);
    }

    if (isFinalStatus(this.status)) {
      m.client_total_data_received = this.session.getDataReceived(
        t - m.total_execution_time * 1000,
        t,
      );
    }
  }

  /**
   * Run the cell until it reaches a final status and return its metrics.
   * Only environment failures are thrown; timeouts and kernel restarts are
   * reported through the status.
   */
  async execute(): Promise<CellMetrics> {
    logger.info(`executing cell ${this.index}`);
    const baseline = await this.session.getKernelPid();
    if (baseline == null) {
      throw new KernelUnavailableError(this.index);
    }

    this.setStatus(CellExecutionStatus.IN_PROGRESS);
    this.start = this.now();
    await this.cell.run();

    let first = true;
    while (!isFinalStatus(this.status)) {
      if (!first) {
        await this.captureMetrics();
      }
      first = false;

      if (this.elapsed() > this.maxWaitMs) {
        logger.warn(`cell ${this.index}: timed out after ${this.maxWaitMs / 1000} seconds`);
        this.setStatus(CellExecutionStatus.TIMED_OUT);
        break;
      }

      const pid = await this.session.getKernelPid();
      if (pid != null && pid !== baseline) {
        logger.warn(`cell ${this.index}: kernel restarted (pid ${baseline} -> ${pid})`);
        this.setStatus(CellExecutionStatus.FAILED);
        break;
      }

      await this.sleep(POLL_INTERVAL_MS);

      if (!(await this.lookForMarker())) {
        continue;
      }
      if (!this.spec.wait_for_viz || (await this.vizIsStable())) {
        this.setStatus(CellExecutionStatus.COMPLETED);
      }
    }

    await this.captureMetrics();
    computeMetrics(this.metrics);
    logger.info(formatCellMetrics(this.metrics));
    return this.metrics;
  }
}
