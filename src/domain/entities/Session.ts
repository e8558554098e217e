import { SessionId } from "../value-objects/SessionId";
import {
  SessionStatus,
  SessionStatusValidator,
} from "../value-objects/SessionStatus";
import { Destination } from "../value-objects/Destination";
import { Profile, Tier } from "../value-objects/Profile";
import {
  SourceDescriptor,
  SourceDescriptors,
  SourceKind,
} from "../value-objects/SourceDescriptor";
import { ProcessHandle } from "../services/ProcessLauncher";
import { PlaylistQueue } from "./PlaylistQueue";
import { InvalidTransitionError } from "../errors/BroadcastErrors";

export type StartTrigger = "operator" | "internal";

export interface SessionView {
  readonly id: string;
  readonly ownerId: string;
  readonly status: SessionStatus;
  readonly tier: Tier;
  readonly loop: boolean;
  readonly restartCount: number;
  readonly sourceKind: SourceKind;
  readonly startedAt: string;
}

export interface SessionProps {
  id: SessionId;
  ownerId: string;
  source: SourceDescriptor;
  destination: Destination;
  profile: Profile;
  requestedTier: Tier;
  loop: boolean;
  trigger: StartTrigger;
  process: ProcessHandle;
  playlist?: PlaylistQueue;
  status: SessionStatus;
  restartCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export class Session {
  private monitor?: AbortController;

  private constructor(private props: SessionProps) {}

  public static create(params: {
    id?: SessionId;
    ownerId: string;
    source: SourceDescriptor;
    destination: Destination;
    profile: Profile;
    loop: boolean;
    trigger: StartTrigger;
    process: ProcessHandle;
    playlist?: PlaylistQueue;
  }): Session {
    const now = new Date();
    const playlist =
      params.playlist ??
      (params.source.kind === "playlist"
        ? PlaylistQueue.fromPaths(params.source.paths)
        : undefined);

    return new Session({
      id: params.id ?? SessionId.create(),
      ownerId: params.ownerId,
      source: params.source,
      destination: params.destination,
      profile: params.profile,
      requestedTier: params.profile.tier,
      loop: params.loop,
      trigger: params.trigger,
      process: params.process,
      playlist,
      status: SessionStatus.RUNNING,
      restartCount: 0,
      createdAt: now,
      updatedAt: now,
    });
  }

  // Getters
  public get id(): SessionId {
    return this.props.id;
  }

  public get ownerId(): string {
    return this.props.ownerId;
  }

  public get source(): SourceDescriptor {
    return this.props.source;
  }

  public get destination(): Destination {
    return this.props.destination;
  }

  public get profile(): Profile {
    return this.props.profile;
  }

  public get requestedTier(): Tier {
    return this.props.requestedTier;
  }

  public get loop(): boolean {
    return this.props.loop;
  }

  public get trigger(): StartTrigger {
    return this.props.trigger;
  }

  public get process(): ProcessHandle {
    return this.props.process;
  }

  public get playlist(): PlaylistQueue | undefined {
    return this.props.playlist;
  }

  public get status(): SessionStatus {
    return this.props.status;
  }

  public get restartCount(): number {
    return this.props.restartCount;
  }

  public get createdAt(): Date {
    return this.props.createdAt;
  }

  public get updatedAt(): Date {
    return this.props.updatedAt;
  }

  /**
   * The descriptor a (re)launch should encode. For playlists this is built
   * from the items not yet delivered, never from the original list.
   */
  public launchSource(): SourceDescriptor {
    if (this.props.source.kind === "playlist" && this.props.playlist) {
      return SourceDescriptors.playlist(this.props.playlist.unplayedPaths());
    }
    return this.props.source;
  }

  // Business methods
  public pause(): void {
    this.assertStatus(SessionStatus.RUNNING, SessionStatus.PAUSED);
    this.props.process.suspend();
    this.transitionTo(SessionStatus.PAUSED);
  }

  public resume(): void {
    this.assertStatus(SessionStatus.PAUSED, SessionStatus.RUNNING);
    this.props.process.resume();
    this.transitionTo(SessionStatus.RUNNING);
  }

  public beginStopping(): void {
    this.transitionTo(SessionStatus.STOPPING);
  }

  public markStopped(): void {
    this.transitionTo(SessionStatus.STOPPED);
  }

  public markCrashed(): void {
    this.transitionTo(SessionStatus.CRASHED);
  }

  public recordUnexpectedExit(): number {
    this.props.restartCount += 1;
    this.touch();
    return this.props.restartCount;
  }

  /**
   * Swap in a new encoder process. The previous one must already be gone.
   */
  public replaceProcess(process: ProcessHandle): void {
    if (this.props.process.isAlive()) {
      throw new Error(
        `Session ${this.props.id.value} still owns live process ${this.props.process.pid}`
      );
    }
    this.props.process = process;
    if (this.props.status === SessionStatus.PAUSED) {
      this.props.status = SessionStatus.RUNNING;
    }
    this.touch();
  }

  /**
   * `asRequested` marks an operator choice: it also becomes the ceiling
   * that load adaptation may climb back to.
   */
  public changeProfile(profile: Profile, asRequested = false): void {
    this.props.profile = profile;
    if (asRequested) {
      this.props.requestedTier = profile.tier;
    }
    this.touch();
  }

  /** Installs a fresh monitor token and cancels the previous one. */
  public attachMonitor(): AbortSignal {
    this.monitor?.abort();
    this.monitor = new AbortController();
    return this.monitor.signal;
  }

  public cancelMonitor(): void {
    this.monitor?.abort();
    this.monitor = undefined;
  }

  public isRunning(): boolean {
    return this.props.status === SessionStatus.RUNNING;
  }

  public isPaused(): boolean {
    return this.props.status === SessionStatus.PAUSED;
  }

  public isLive(): boolean {
    return SessionStatusValidator.isLive(this.props.status);
  }

  public toView(): SessionView {
    return {
      id: this.props.id.value,
      ownerId: this.props.ownerId,
      status: this.props.status,
      tier: this.props.profile.tier,
      loop: this.props.loop,
      restartCount: this.props.restartCount,
      sourceKind: this.props.source.kind,
      startedAt: this.props.createdAt.toISOString(),
    };
  }

  public toJSON(): Record<string, unknown> {
    return {
      ...this.toView(),
      destination: this.props.destination.masked,
      pid: this.props.process.pid,
      updatedAt: this.props.updatedAt.toISOString(),
    };
  }

  private transitionTo(next: SessionStatus): void {
    if (!SessionStatusValidator.isValidTransition(this.props.status, next)) {
      throw new InvalidTransitionError(this.props.status, next);
    }
    this.props.status = next;
    this.touch();
  }

  private assertStatus(expected: SessionStatus, next: SessionStatus): void {
    if (this.props.status !== expected) {
      throw new InvalidTransitionError(this.props.status, next);
    }
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
