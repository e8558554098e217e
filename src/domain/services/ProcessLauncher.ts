import { EncoderCommand } from "./EncoderCommandBuilder";

export interface ExitStatus {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Last lines the encoder wrote to stderr, for diagnostics. */
  readonly stderrTail?: string;
  /** Set when the exit is synthetic: the replacement never launched. */
  readonly spawnError?: Error;
}

export interface ProcessHandle {
  readonly pid: number;
  readonly startedAt: Date;

  isAlive(): boolean;

  /**
   * Resolves with the exit status once the process ends, or with `undefined`
   * as soon as `signal` aborts. Aborting leaves the process running.
   */
  wait(signal?: AbortSignal): Promise<ExitStatus | undefined>;

  /**
   * Ends the process and everything it spawned. Escalates to a forced kill
   * after `timeoutMs`. No-op once the process has exited.
   */
  terminate(timeoutMs: number): Promise<void>;

  /** @throws UnsupportedOperationError where the platform cannot stop a process group */
  suspend(): void;

  /** @throws UnsupportedOperationError where the platform cannot continue a process group */
  resume(): void;
}

export interface ProcessLauncher {
  /** @throws SpawnError when the binary cannot be located or started */
  spawn(command: EncoderCommand): Promise<ProcessHandle>;
}
