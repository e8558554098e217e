import * as dotenv from "dotenv";
import * as os from "os";
import * as path from "path";

// Load environment variables
dotenv.config();

export interface AppConfig {
  ffmpeg: {
    binaryPath: string;
    manifestDir: string;
  };
  destination: {
    endpoint: string;
    streamKey: string;
  };
  supervisor: {
    maxRestarts: number;
    restartBackoffMs: number;
    terminateTimeoutMs: number;
    singleSessionPerOwner: boolean;
  };
  profiles: {
    defaultTier: number;
    frameRate: number;
    videoBitrate?: string;
    audioBitrate?: string;
  };
  adaptation: {
    enabled: boolean;
    intervalMs: number;
    highWater: number;
    lowWater: number;
  };
  autostart: {
    ownerId: string;
    sources: string[];
    tier?: number;
    loop: boolean;
  };
  logging: {
    level: string;
    file?: string;
    datePattern: string;
    maxSize: string;
    maxFiles: string;
  };
  environment: string;
}

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export class Config {
  private static instance: Config;
  private config: AppConfig;

  private constructor(private readonly env: NodeJS.ProcessEnv) {
    this.config = this.loadConfig();
    this.validate();
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config(process.env);
    }
    return Config.instance;
  }

  /** Builds a standalone configuration from an explicit environment. */
  public static fromEnvironment(env: NodeJS.ProcessEnv): Config {
    return new Config(env);
  }

  public get(): AppConfig {
    return this.config;
  }

  private loadConfig(): AppConfig {
    return {
      ffmpeg: {
        binaryPath: this.getEnvVar("FFMPEG_PATH", "ffmpeg"),
        manifestDir: this.getEnvVar(
          "MANIFEST_DIR",
          path.join(os.tmpdir(), "livecast-manifests")
        ),
      },
      destination: {
        endpoint: this.getEnvVar(
          "DEFAULT_RTMP_URL",
          "rtmp://a.rtmp.youtube.com/live2"
        ),
        streamKey: this.getEnvVar("DEFAULT_STREAM_KEY", ""),
      },
      supervisor: {
        maxRestarts: parseInt(this.getEnvVar("MAX_AUTO_RESTARTS", "5")),
        restartBackoffMs: parseInt(
          this.getEnvVar("RESTART_BACKOFF_MS", "5000")
        ),
        terminateTimeoutMs: parseInt(
          this.getEnvVar("TERMINATE_TIMEOUT_MS", "5000")
        ),
        singleSessionPerOwner:
          this.getEnvVar("SINGLE_SESSION_PER_OWNER", "false") === "true",
      },
      profiles: {
        defaultTier: parseInt(this.getEnvVar("DEFAULT_QUALITY", "720")),
        frameRate: parseInt(this.getEnvVar("DEFAULT_FPS", "30")),
        videoBitrate: this.optionalEnvVar("VIDEO_BITRATE_OVERRIDE"),
        audioBitrate: this.optionalEnvVar("AUDIO_BITRATE_OVERRIDE"),
      },
      adaptation: {
        enabled: this.getEnvVar("ADAPTIVE_QUALITY", "false") === "true",
        intervalMs: parseInt(
          this.getEnvVar("ADAPTATION_INTERVAL_MS", "30000")
        ),
        highWater: parseFloat(this.getEnvVar("CPU_HIGH_WATER", "85")),
        lowWater: parseFloat(this.getEnvVar("CPU_LOW_WATER", "50")),
      },
      autostart: {
        ownerId: this.getEnvVar("AUTOSTART_OWNER_ID", ""),
        sources: this.getEnvVar("AUTOSTART_SOURCES", "")
          .split(",")
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0),
        tier: this.optionalInt("AUTOSTART_QUALITY"),
        loop: this.getEnvVar("AUTOSTART_LOOP", "true") === "true",
      },
      logging: {
        level: this.getEnvVar("LOG_LEVEL", "info").toLowerCase(),
        file: this.optionalEnvVar("LOG_FILE"),
        datePattern: this.getEnvVar("LOG_DATE_PATTERN", "YYYY-MM-DD"),
        maxSize: this.getEnvVar("LOG_MAX_SIZE", "20m"),
        maxFiles: this.getEnvVar("LOG_MAX_FILES", "7d"),
      },
      environment: this.getEnvVar("NODE_ENV", "development"),
    };
  }

  private getEnvVar(key: string, defaultValue: string): string {
    const value = this.env[key];
    if (value === undefined) {
      return defaultValue;
    }
    return value;
  }

  private optionalEnvVar(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }

  private optionalInt(key: string): number | undefined {
    const value = this.optionalEnvVar(key);
    return value === undefined ? undefined : parseInt(value);
  }

  public validate(): void {
    const errors: string[] = [];
    const { supervisor, profiles, adaptation, autostart, logging } =
      this.config;

    if (!this.config.ffmpeg.binaryPath) {
      errors.push("FFMPEG_PATH cannot be empty");
    }

    if (!Number.isInteger(supervisor.maxRestarts) || supervisor.maxRestarts < 0) {
      errors.push("MAX_AUTO_RESTARTS must be a non-negative integer");
    }

    if (!Number.isFinite(supervisor.restartBackoffMs) || supervisor.restartBackoffMs < 0) {
      errors.push("RESTART_BACKOFF_MS must be a non-negative number");
    }

    if (!Number.isFinite(supervisor.terminateTimeoutMs) || supervisor.terminateTimeoutMs <= 0) {
      errors.push("TERMINATE_TIMEOUT_MS must be a positive number");
    }

    if (!Number.isInteger(profiles.defaultTier)) {
      errors.push("DEFAULT_QUALITY must be an integer tier such as 720");
    }

    if (!Number.isInteger(profiles.frameRate) || profiles.frameRate <= 0) {
      errors.push("DEFAULT_FPS must be a positive integer");
    }

    if (adaptation.enabled) {
      if (!Number.isFinite(adaptation.intervalMs) || adaptation.intervalMs <= 0) {
        errors.push("ADAPTATION_INTERVAL_MS must be a positive number");
      }
      if (!(adaptation.lowWater < adaptation.highWater)) {
        errors.push("CPU_LOW_WATER must be below CPU_HIGH_WATER");
      }
    }

    if (autostart.sources.length > 0 && !autostart.ownerId) {
      errors.push("AUTOSTART_OWNER_ID is required when AUTOSTART_SOURCES is set");
    }

    if (autostart.tier !== undefined && !Number.isInteger(autostart.tier)) {
      errors.push("AUTOSTART_QUALITY must be an integer tier");
    }

    if (!LOG_LEVELS.includes(logging.level)) {
      errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}
