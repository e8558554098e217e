import { Logger } from '../../src/application/interfaces/Logger';
import { EncoderCommand } from '../../src/domain/services/EncoderCommandBuilder';
import {
  ExitStatus,
  ProcessHandle,
  ProcessLauncher,
} from '../../src/domain/services/ProcessLauncher';
import {
  SpawnError,
  UnsupportedOperationError,
} from '../../src/domain/errors/BroadcastErrors';

export class FakeProcessHandle implements ProcessHandle {
  public readonly startedAt = new Date();
  public suspended = false;
  public terminated = false;
  /** When set, terminate() is ignored and the process keeps running. */
  public ignoresTerminate = false;
  private exitStatus?: ExitStatus;
  private settle: (status: ExitStatus) => void = () => undefined;
  private readonly exited: Promise<ExitStatus>;

  constructor(
    public readonly pid: number,
    public readonly command: EncoderCommand,
    private readonly jobControl: boolean
  ) {
    this.exited = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  public isAlive(): boolean {
    return this.exitStatus === undefined;
  }

  public async wait(signal?: AbortSignal): Promise<ExitStatus | undefined> {
    if (this.exitStatus) return this.exitStatus;
    if (!signal) return this.exited;
    if (signal.aborted) return undefined;

    const aborted = new Promise<undefined>((resolve) => {
      signal.addEventListener('abort', () => resolve(undefined), { once: true });
    });
    return Promise.race([this.exited, aborted]);
  }

  /** The process dies on its own, e.g. killed from outside. */
  public exit(
    code: number | null = 1,
    signal: NodeJS.Signals | null = null,
    stderrTail?: string
  ): void {
    if (this.exitStatus) return;
    this.exitStatus = stderrTail === undefined ? { code, signal } : { code, signal, stderrTail };
    this.settle(this.exitStatus);
  }

  public async terminate(): Promise<void> {
    this.terminated = true;
    if (!this.ignoresTerminate) this.exit(null, 'SIGTERM');
  }

  public suspend(): void {
    if (!this.jobControl) throw new UnsupportedOperationError('pause', 'win32');
    this.suspended = true;
  }

  public resume(): void {
    if (!this.jobControl) throw new UnsupportedOperationError('resume', 'win32');
    this.suspended = false;
  }
}

export class FakeProcessLauncher implements ProcessLauncher {
  public readonly handles: FakeProcessHandle[] = [];
  public jobControl = true;
  private readonly failures: Error[] = [];
  private nextPid = 1000;
  private gate?: Promise<void>;
  public pendingSpawns = 0;

  /** Holds every spawn until the returned release function is called. */
  public holdSpawns(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = undefined;
      release();
    };
  }

  public failNext(error: Error = new SpawnError('ffmpeg', 'spawn ffmpeg ENOENT')): void {
    this.failures.push(error);
  }

  public async spawn(command: EncoderCommand): Promise<ProcessHandle> {
    if (this.gate) {
      this.pendingSpawns++;
      await this.gate;
      this.pendingSpawns--;
    }

    const failure = this.failures.shift();
    if (failure) throw failure;

    const handle = new FakeProcessHandle(this.nextPid++, command, this.jobControl);
    this.handles.push(handle);
    return handle;
  }

  public live(): FakeProcessHandle[] {
    return this.handles.filter((handle) => handle.isAlive());
  }

  public get latest(): FakeProcessHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) throw new Error('No process has been spawned');
    return handle;
  }
}

export const createMockLogger = (): jest.Mocked<Logger> => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

export const flushPromises = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));

export const waitFor = async (
  predicate: () => boolean,
  timeoutMs = 1000
): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
};
