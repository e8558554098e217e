import { ChildProcess, spawn } from "child_process";
import { EncoderCommand } from "../../domain/services/EncoderCommandBuilder";
import {
  ExitStatus,
  ProcessHandle,
  ProcessLauncher,
} from "../../domain/services/ProcessLauncher";
import {
  describeError,
  SpawnError,
  UnsupportedOperationError,
} from "../../domain/errors/BroadcastErrors";
import { Logger } from "../../application/interfaces/Logger";

const STDERR_TAIL_LIMIT = 2000;

const isMissingProcess = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ESRCH";

/**
 * A spawned encoder. On POSIX the child leads its own process group, so
 * signals go to `-pid` and reach anything the encoder started.
 */
export class NodeProcessHandle implements ProcessHandle {
  public readonly startedAt = new Date();
  private exitStatus?: ExitStatus;
  private stderrTail = "";
  private suspended = false;
  private readonly exited: Promise<ExitStatus>;

  constructor(
    private readonly child: ChildProcess,
    public readonly pid: number,
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {
    child.stderr?.on("data", (chunk: Buffer | string) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(
        -STDERR_TAIL_LIMIT
      );
    });

    child.on("error", (error) => {
      this.logger.error("Encoder process error", {
        pid: this.pid,
        error: error.message,
      });
    });

    this.exited = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        const tail = this.stderrTail.trim();
        this.exitStatus = {
          code,
          signal,
          stderrTail: tail.length > 0 ? tail : undefined,
        };
        resolve(this.exitStatus);
      });
    });
  }

  public isAlive(): boolean {
    return this.exitStatus === undefined;
  }

  public async wait(signal?: AbortSignal): Promise<ExitStatus | undefined> {
    if (this.exitStatus) {
      return this.exitStatus;
    }
    if (!signal) {
      return this.exited;
    }
    if (signal.aborted) {
      return undefined;
    }

    const aborted = new Promise<undefined>((resolve) => {
      signal.addEventListener("abort", () => resolve(undefined), {
        once: true,
      });
    });
    return Promise.race([this.exited, aborted]);
  }

  public async terminate(timeoutMs: number): Promise<void> {
    if (!this.isAlive()) {
      return;
    }

    this.signalGroup("SIGTERM");
    // A stopped group keeps SIGTERM pending until it is continued.
    if (this.suspended) {
      this.signalGroup("SIGCONT");
      this.suspended = false;
    }
    if (await this.exitsWithin(timeoutMs)) {
      return;
    }

    this.logger.warn("Encoder ignored SIGTERM, killing process group", {
      pid: this.pid,
      timeoutMs,
    });
    this.signalGroup("SIGKILL");
    await this.exitsWithin(timeoutMs);
  }

  public suspend(): void {
    this.requireJobControl("pause");
    this.signalGroup("SIGSTOP");
    this.suspended = true;
  }

  public resume(): void {
    this.requireJobControl("resume");
    this.signalGroup("SIGCONT");
    this.suspended = false;
  }

  private requireJobControl(operation: string): void {
    if (this.platform === "win32") {
      throw new UnsupportedOperationError(operation, this.platform);
    }
  }

  private signalGroup(signal: NodeJS.Signals): void {
    if (!this.isAlive()) {
      return;
    }
    if (this.platform === "win32") {
      this.child.kill(signal);
      return;
    }

    try {
      process.kill(-this.pid, signal);
    } catch (error) {
      if (isMissingProcess(error)) {
        return;
      }
      this.logger.error("Failed to signal encoder", {
        pid: this.pid,
        signal,
        error: describeError(error),
      });
      throw error;
    }
  }

  private async exitsWithin(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([this.exited.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export class NodeProcessLauncher implements ProcessLauncher {
  constructor(
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  public spawn(command: EncoderCommand): Promise<ProcessHandle> {
    return new Promise((resolve, reject) => {
      const child = spawn(command.command, command.args, {
        stdio: ["ignore", "ignore", "pipe"],
        detached: this.platform !== "win32",
      });

      child.once("error", (error) => {
        this.logger.error("Failed to launch encoder", {
          command: command.fullCommand,
          error: error.message,
        });
        reject(new SpawnError(command.command, error.message));
      });

      child.once("spawn", () => {
        const pid = child.pid;
        if (pid === undefined) {
          reject(new SpawnError(command.command, "no pid assigned"));
          return;
        }

        this.logger.debug("Encoder process spawned", {
          pid,
          command: command.fullCommand,
        });
        resolve(new NodeProcessHandle(child, pid, this.logger, this.platform));
      });
    });
  }
}
