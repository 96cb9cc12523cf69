import os from "node:os";

export type ClientUsage = {
  cpu: number;
  memory: number;
};

type CpuTimes = {
  idle: number;
  total: number;
};

export type UsageSource = {
  cpus: () => os.CpuInfo[];
  totalmem: () => number;
  freemem: () => number;
};

function readCpuTimes(cpus: os.CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const { times } of cpus) {
    idle += times.idle;
    total += times.user + times.nice + times.sys + times.idle + times.irq;
  }
  return { idle, total };
}

function round1(x: number): number {
  return Math.round(x * 10) / 10;
}

/**
 * System-wide CPU and memory usage of the machine driving the browser.
 *
 * CPU usage is measured between two consecutive calls to sample(), the
 * first call measuring from construction time.
 */
export class ClientUsageSampler {
  private last: CpuTimes;

  constructor(private readonly source: UsageSource = os) {
    this.last = readCpuTimes(source.cpus());
  }

  sample(): ClientUsage {
    const now = readCpuTimes(this.source.cpus());
    const total = now.total - this.last.total;
    const idle = now.idle - this.last.idle;
    this.last = now;
    const cpu = total > 0 ? (100 * (total - idle)) / total : 0;
    const totalmem = this.source.totalmem();
    const memory =
      totalmem > 0 ? (100 * (totalmem - this.source.freemem())) / totalmem : 0;
    return { cpu: round1(cpu), memory: round1(memory) };
  }
}
