import { ResourceSampler } from "../../domain/services/ResourceSampler";
import { SessionStatus } from "../../domain/value-objects/SessionStatus";
import { describeError } from "../../domain/errors/BroadcastErrors";
import { Logger } from "../interfaces/Logger";
import { QualityStep, SessionSupervisor } from "./SessionSupervisor";

export interface AdaptationThresholds {
  intervalMs: number;
  /** CPU percent above which sessions step down one tier. */
  highWater: number;
  /** CPU percent below which sessions climb back towards their requested tier. */
  lowWater: number;
}

export type AdaptableSupervisor = Pick<
  SessionSupervisor,
  "listAll" | "stepQuality"
>;

export interface AdaptationResult {
  cpu: number;
  step?: QualityStep;
  changed: string[];
}

/**
 * Periodic load check that trades stream quality for headroom. One timer
 * serves every session; a tick that would overlap a running one is skipped.
 */
export class QualityAdapter {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    private readonly supervisor: AdaptableSupervisor,
    private readonly sampler: ResourceSampler,
    private readonly thresholds: AdaptationThresholds,
    private readonly logger: Logger
  ) {
    if (thresholds.lowWater >= thresholds.highWater) {
      throw new Error(
        `Adaptation lowWater (${thresholds.lowWater}) must be below highWater (${thresholds.highWater})`
      );
    }
  }

  public start(): void {
    if (this.timer) {
      this.logger.warn("Quality adaptation is already running");
      return;
    }

    this.logger.info("Starting quality adaptation", {
      intervalMs: this.thresholds.intervalMs,
      highWater: this.thresholds.highWater,
      lowWater: this.thresholds.lowWater,
    });

    this.timer = setInterval(() => {
      void this.tick();
    }, this.thresholds.intervalMs);
  }

  public stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("Stopped quality adaptation");
  }

  public isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One sampling round. Never rejects; returns `undefined` when skipped
   * because the previous round is still switching profiles or sampling failed.
   */
  public async tick(): Promise<AdaptationResult | undefined> {
    if (this.ticking) {
      this.logger.debug("Skipping adaptation tick, previous one still running");
      return undefined;
    }

    this.ticking = true;
    try {
      return await this.adapt();
    } catch (error) {
      this.logger.error("Quality adaptation tick failed", {
        error: describeError(error),
      });
      return undefined;
    } finally {
      this.ticking = false;
    }
  }

  private async adapt(): Promise<AdaptationResult> {
    const cpu = await this.sampler.sample();
    const step = this.decide(cpu);

    if (!step) {
      return { cpu, changed: [] };
    }

    const candidates = this.supervisor
      .listAll()
      .filter((view) => view.status === SessionStatus.RUNNING);

    const changed: string[] = [];
    for (const view of candidates) {
      try {
        if (await this.supervisor.stepQuality(view.id, step)) {
          changed.push(view.id);
        }
      } catch (error) {
        this.logger.error("Failed to adapt session quality", {
          sessionId: view.id,
          step,
          error: describeError(error),
        });
      }
    }

    if (changed.length > 0) {
      this.logger.info("Adapted session quality", {
        cpu: Math.round(cpu),
        step,
        sessions: changed.length,
      });
    }

    return { cpu, step, changed };
  }

  private decide(cpu: number): QualityStep | undefined {
    if (cpu > this.thresholds.highWater) {
      return "down";
    }
    if (cpu < this.thresholds.lowWater) {
      return "up";
    }
    return undefined;
  }
}
