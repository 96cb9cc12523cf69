/*
The notebook-wide state cells share while they run: the kernel being
watched, the visualization element once found, the network log and the
client usage sampler.
*/

import getLogger from "@nbperf/backend/logger";
import type { ClientUsage } from "@nbperf/backend/client-usage";
import type { KernelUsage } from "@nbperf/jupyter/jupyterlab-client";

import type { ExecutionSession, KernelSample } from "./cell-executor";
import type { NetworkLog } from "./network-log";
import { VizElement, type ScreenshotLogger, type Screenshottable } from "./viz-element";

const logger = getLogger("profiler:session");

export interface KernelTelemetry {
  getKernelIdForNotebook(filename: string): Promise<string | undefined>;
  getKernelUsage(kernelId: string): Promise<KernelUsage>;
}

export interface VizFinder {
  findVizElement(): Promise<Screenshottable | undefined>;
}

export interface UsageSampler {
  sample(): ClientUsage;
}

export interface ProfilingSessionOptions {
  telemetry: KernelTelemetry;
  notebookFilename: string;
  page: VizFinder;
  networkLog: NetworkLog;
  sampler: UsageSampler;
  logScreenshots?: ScreenshotLogger;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Kernel cpu and memory as percentages, or undefined when the telemetry
 * lacks any of the numbers needed.
 */
export function kernelSample(usage: KernelUsage): KernelSample | undefined {
  const { kernel_cpu, kernel_memory, host_memory_total } = usage;
  if (kernel_cpu == null || kernel_memory == null || !host_memory_total) {
    return;
  }
  return { cpu: kernel_cpu, memory: (100 * kernel_memory) / host_memory_total };
}

export class ProfilingSession implements ExecutionSession {
  private readonly opts: ProfilingSessionOptions;
  private kernelId?: string;
  private viz?: VizElement;

  constructor(opts: ProfilingSessionOptions) {
    this.opts = opts;
  }

  private async getKernelId(): Promise<string | undefined> {
    if (this.kernelId == null) {
      this.kernelId = await this.opts.telemetry.getKernelIdForNotebook(
        this.opts.notebookFilename,
      );
      if (this.kernelId == null) {
        logger.warn(`no kernel found for ${this.opts.notebookFilename}`);
      }
    }
    return this.kernelId;
  }

  private async usage(): Promise<KernelUsage | undefined> {
    const id = await this.getKernelId();
    return id == null ? undefined : await this.opts.telemetry.getKernelUsage(id);
  }

  getVizElement(): VizElement | undefined {
    return this.viz;
  }

  async detectVizElement(): Promise<VizElement | undefined> {
    if (this.viz != null) return this.viz;
    const handle = await this.opts.page.findVizElement();
    if (handle != null) {
      this.viz = new VizElement(handle, {
        logScreenshots: this.opts.logScreenshots,
        sleep: this.opts.sleep,
      });
      logger.debug("viz element detected");
    }
    return this.viz;
  }

  async getKernelPid(): Promise<number | undefined> {
    return (await this.usage())?.pid;
  }

  async getKernelUsage(): Promise<KernelSample | undefined> {
    const usage = await this.usage();
    return usage == null ? undefined : kernelSample(usage);
  }

  sampleClientUsage(): ClientUsage {
    return this.opts.sampler.sample();
  }

  getDataReceived(start: number, end: number): number {
    return this.opts.networkLog.dataReceivedMB(start, end);
  }
}
