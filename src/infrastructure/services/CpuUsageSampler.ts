import * as os from "os";
import { ResourceSampler } from "../../domain/services/ResourceSampler";

export type CpuInfoSource = () => os.CpuInfo[];

interface CpuTicks {
  idle: number;
  total: number;
}

/**
 * Aggregate CPU utilisation across all cores, measured between two
 * consecutive calls rather than since boot.
 */
export class CpuUsageSampler implements ResourceSampler {
  private previous: CpuTicks;

  constructor(private readonly cpus: CpuInfoSource = os.cpus) {
    this.previous = this.snapshot();
  }

  public async sample(): Promise<number> {
    const current = this.snapshot();
    const idle = current.idle - this.previous.idle;
    const total = current.total - this.previous.total;
    this.previous = current;

    if (total <= 0) {
      return 0;
    }

    const usage = (1 - idle / total) * 100;
    return Math.min(100, Math.max(0, Math.round(usage * 10) / 10));
  }

  private snapshot(): CpuTicks {
    let idle = 0;
    let total = 0;

    this.cpus().forEach((cpu) => {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      total += user + nice + sys + cpuIdle + irq;
      idle += cpuIdle;
    });

    return { idle, total };
  }
}
