import { AppConfig, Config } from "./infrastructure/config/Config";
import { WinstonLogger } from "./infrastructure/logging/WinstonLogger";
import { FFmpegCommandBuilder } from "./infrastructure/services/FFmpegCommandBuilder";
import { NodeProcessLauncher } from "./infrastructure/services/NodeProcessLauncher";
import { CpuUsageSampler } from "./infrastructure/services/CpuUsageSampler";
import { LoggerNotifier } from "./infrastructure/notifiers/LoggerNotifier";
import { ProfileRegistry } from "./application/services/ProfileRegistry";
import { SessionSupervisor } from "./application/services/SessionSupervisor";
import { QualityAdapter } from "./application/services/QualityAdapter";
import { StartBroadcastUseCase } from "./application/use-cases/StartBroadcastUseCase";
import { SourceDescriptors } from "./domain/value-objects/SourceDescriptor";
import { describeError } from "./domain/errors/BroadcastErrors";

class Application {
  private readonly config: AppConfig = Config.getInstance().get();
  private readonly logger = WinstonLogger.fromConfig(this.config.logging);
  private supervisor?: SessionSupervisor;
  private adapter?: QualityAdapter;
  private shuttingDown = false;

  public async start(): Promise<void> {
    try {
      this.logger.info("Starting broadcast supervisor", {
        environment: this.config.environment,
      });

      const profiles = new ProfileRegistry(this.config.profiles.defaultTier, {
        videoBitrate: this.config.profiles.videoBitrate,
        audioBitrate: this.config.profiles.audioBitrate,
        frameRate: this.config.profiles.frameRate,
      });

      this.supervisor = new SessionSupervisor(
        new FFmpegCommandBuilder(
          this.config.ffmpeg.binaryPath,
          this.config.ffmpeg.manifestDir
        ),
        new NodeProcessLauncher(this.logger),
        profiles,
        new LoggerNotifier(this.logger),
        this.logger,
        this.config.supervisor
      );

      if (this.config.adaptation.enabled) {
        this.adapter = new QualityAdapter(
          this.supervisor,
          new CpuUsageSampler(),
          this.config.adaptation,
          this.logger
        );
        this.adapter.start();
      }

      this.setupGracefulShutdown();
      await this.autostart(
        new StartBroadcastUseCase(
          this.supervisor,
          profiles,
          this.config.destination,
          this.logger
        )
      );

      this.logger.info("Broadcast supervisor started", {
        sessions: this.supervisor.listAll().length,
        adaptation: this.config.adaptation.enabled,
      });
    } catch (error) {
      this.logger.error("Failed to start application", {
        error: describeError(error),
      });
      process.exit(1);
    }
  }

  private async autostart(startBroadcast: StartBroadcastUseCase): Promise<void> {
    const { ownerId, sources, tier, loop } = this.config.autostart;
    if (sources.length === 0) {
      return;
    }

    const source =
      sources.length === 1
        ? SourceDescriptors.singleFile(sources[0])
        : SourceDescriptors.playlist(sources);

    try {
      const started = await startBroadcast.execute({
        ownerId,
        source,
        tier,
        loop,
        internal: true,
      });
      this.logger.info("Autostarted broadcast", {
        sessionId: started.sessionId,
        destination: started.destination,
      });
    } catch (error) {
      // A failed autostart leaves the supervisor up for operator commands.
      this.logger.error("Autostart failed", {
        ownerId,
        error: describeError(error),
      });
    }
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string): Promise<void> => {
      if (this.shuttingDown) {
        return;
      }
      this.shuttingDown = true;
      this.logger.info(`Received ${signal}, shutting down gracefully`);

      try {
        this.adapter?.stop();
        if (this.supervisor) {
          await this.supervisor.shutdown();
        }
        this.logger.info("Application shutdown completed");
        process.exit(0);
      } catch (error) {
        this.logger.error("Error during shutdown", {
          error: describeError(error),
        });
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));

    process.on("uncaughtException", (error) => {
      this.logger.error("Uncaught exception", { error: error.message });
      void shutdown("uncaughtException");
    });

    process.on("unhandledRejection", (reason) => {
      this.logger.error("Unhandled rejection", {
        reason: describeError(reason),
      });
    });
  }
}

const app = new Application();
app.start().catch((error: unknown) => {
  console.error("Failed to start application:", error);
  process.exit(1);
});
