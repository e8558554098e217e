import { Session, SessionView, StartTrigger } from "../../domain/entities/Session";
import { PlaylistItem, PlaylistQueue } from "../../domain/entities/PlaylistQueue";
import { SessionId } from "../../domain/value-objects/SessionId";
import { Destination } from "../../domain/value-objects/Destination";
import { Profile, Tier } from "../../domain/value-objects/Profile";
import {
  describeSource,
  SourceDescriptor,
} from "../../domain/value-objects/SourceDescriptor";
import { EncoderCommandBuilder } from "../../domain/services/EncoderCommandBuilder";
import {
  ExitStatus,
  ProcessHandle,
  ProcessLauncher,
} from "../../domain/services/ProcessLauncher";
import { Notifier } from "../../domain/services/Notifier";
import {
  AlreadyRunningError,
  describeError,
  PlaylistItemError,
  RestartCeilingExceededError,
} from "../../domain/errors/BroadcastErrors";
import { Logger } from "../interfaces/Logger";
import { KeyedLock } from "./KeyedLock";
import { ProfileRegistry } from "./ProfileRegistry";

export interface SupervisorOptions {
  maxRestarts: number;
  restartBackoffMs: number;
  terminateTimeoutMs: number;
  singleSessionPerOwner: boolean;
}

export interface StartSessionRequest {
  ownerId: string;
  source: SourceDescriptor;
  destination: Destination;
  profile: Profile;
  loop: boolean;
}

export type QualityStep = "down" | "up";

/** Resolves `true` after `ms`, or `false` as soon as `signal` aborts. */
export type Delay = (ms: number, signal: AbortSignal) => Promise<boolean>;

export const abortableDelay: Delay = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

type ExitVerdict = "retry" | "done";

/**
 * Owns every live broadcast session. All mutation of one session happens
 * under that session's lock, either from an operator call or from the
 * session's current monitor; a monitor whose token was cancelled never
 * touches the session again.
 */
export class SessionSupervisor {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new KeyedLock();

  constructor(
    private readonly commandBuilder: EncoderCommandBuilder,
    private readonly launcher: ProcessLauncher,
    private readonly profiles: ProfileRegistry,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
    private readonly options: SupervisorOptions,
    private readonly delay: Delay = abortableDelay
  ) {}

  public get maxRestarts(): number {
    return this.options.maxRestarts;
  }

  /** Operator-initiated start. The owner is notified once it is running. */
  public async start(request: StartSessionRequest): Promise<string> {
    return this.launch(request, "operator");
  }

  /**
   * Start issued by the service itself (boot-time autostart). Same request
   * as `start`; the session records the trigger and no start notice is sent.
   */
  public async startInternal(request: StartSessionRequest): Promise<string> {
    return this.launch(request, "internal");
  }

  public async stop(sessionId: string): Promise<boolean> {
    if (!this.sessions.has(sessionId)) {
      return false;
    }

    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !session.isLive()) {
        return false;
      }

      this.logger.info("Stopping session", {
        sessionId,
        pid: session.process.pid,
      });

      session.beginStopping();
      // The monitor must be retired before the process dies, otherwise the
      // exit would be read as a crash.
      session.cancelMonitor();
      await this.terminate(session);
      session.markStopped();
      this.sessions.delete(sessionId);
      await this.releaseManifest(session);

      this.logger.info("Session stopped", {
        sessionId,
        restartCount: session.restartCount,
      });
      this.notify(session.ownerId, `Stream ${session.id.short} stopped.`);
      return true;
    });
  }

  public async pause(sessionId: string): Promise<boolean> {
    if (!this.sessions.has(sessionId)) {
      return false;
    }

    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !session.isRunning() || !session.process.isAlive()) {
        return false;
      }

      session.pause();
      this.logger.info("Session paused", {
        sessionId,
        pid: session.process.pid,
      });
      return true;
    });
  }

  public async resume(sessionId: string): Promise<boolean> {
    if (!this.sessions.has(sessionId)) {
      return false;
    }

    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !session.isPaused()) {
        return false;
      }

      session.resume();
      this.logger.info("Session resumed", {
        sessionId,
        pid: session.process.pid,
      });
      return true;
    });
  }

  /**
   * Explicit quality change. Rebuilds the encoder with the resolved profile
   * and makes it the session's new ceiling for adaptation.
   */
  public async changeProfile(sessionId: string, tier: Tier): Promise<boolean> {
    if (!this.sessions.has(sessionId)) {
      return false;
    }

    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !session.isRunning()) {
        return false;
      }

      const profile = this.profiles.resolve(tier);
      if (profile.tier === session.profile.tier) {
        session.changeProfile(profile, true);
        return false;
      }

      return this.swapProfile(session, profile, true);
    });
  }

  /**
   * One adaptation step for a running session: down one tier, or up one
   * tier without passing the tier the session was started (or set) with.
   */
  public async stepQuality(
    sessionId: string,
    step: QualityStep
  ): Promise<boolean> {
    if (!this.sessions.has(sessionId)) {
      return false;
    }

    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !session.isRunning() || !session.process.isAlive()) {
        return false;
      }

      const current = session.profile.tier;
      const target =
        step === "down"
          ? this.profiles.lower(current)
          : this.profiles.higher(current);

      if (target === undefined) {
        return false;
      }
      if (step === "up" && target > session.requestedTier) {
        return false;
      }

      const swapped = await this.swapProfile(
        session,
        this.profiles.resolve(target),
        false
      );
      if (!swapped) {
        return false;
      }
      this.notify(
        session.ownerId,
        `Quality ${step === "down" ? "lowered" : "raised"} to ${target}p for stream ${session.id.short} (server load).`
      );
      return true;
    });
  }

  public get(sessionId: string): SessionView | undefined {
    return this.sessions.get(sessionId)?.toView();
  }

  public listForOwner(ownerId: string): SessionView[] {
    return this.liveSessionsFor(ownerId).map((session) => session.toView());
  }

  public listAll(): SessionView[] {
    return [...this.sessions.values()].map((session) => session.toView());
  }

  /** Resolves the short ids operators type, scoped to their own sessions. */
  public findByIdPrefix(
    ownerId: string,
    prefix: string
  ): SessionView | undefined {
    const needle = prefix.trim();
    if (!needle) {
      return undefined;
    }
    return this.liveSessionsFor(ownerId)
      .find((session) => session.id.value.startsWith(needle))
      ?.toView();
  }

  public playlist(sessionId: string): PlaylistItem[] | undefined {
    return this.sessions.get(sessionId)?.playlist?.list();
  }

  /** Next unplayed item. Throws EmptyQueueError once every item is played. */
  public advancePlaylist(sessionId: string): PlaylistItem | undefined {
    const session = this.sessions.get(sessionId);
    return session ? this.playlistOf(session).advance() : undefined;
  }

  public markPlayed(
    sessionId: string,
    itemId: number
  ): PlaylistItem | undefined {
    const session = this.sessions.get(sessionId);
    return session ? this.playlistOf(session).markPlayed(itemId) : undefined;
  }

  /** Queued items reach the encoder at its next relaunch. */
  public addToPlaylist(
    sessionId: string,
    filePath: string,
    title?: string
  ): PlaylistItem | undefined {
    const session = this.sessions.get(sessionId);
    return session
      ? this.playlistOf(session).add(filePath, title)
      : undefined;
  }

  public removeFromPlaylist(sessionId: string, itemId: number): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    this.playlistOf(session).remove(itemId);
    return true;
  }

  public async shutdown(): Promise<void> {
    const ids = [...this.sessions.keys()];
    this.logger.info("Stopping all sessions", { count: ids.length });

    const results = await Promise.allSettled(ids.map((id) => this.stop(id)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error("Failed to stop session during shutdown", {
          sessionId: ids[index],
          error: describeError(result.reason),
        });
      }
    });
  }

  private async launch(
    request: StartSessionRequest,
    trigger: StartTrigger
  ): Promise<string> {
    return this.locks.runExclusive(`owner:${request.ownerId}`, async () => {
      if (this.options.singleSessionPerOwner) {
        const existing = this.liveSessionsFor(request.ownerId)[0];
        if (existing) {
          throw new AlreadyRunningError(request.ownerId, existing.id.value);
        }
      }

      const id = SessionId.create();
      const playlist =
        request.source.kind === "playlist"
          ? PlaylistQueue.fromPaths(request.source.paths)
          : undefined;

      this.logger.info("Starting session", {
        sessionId: id.value,
        ownerId: request.ownerId,
        source: describeSource(request.source),
        destination: request.destination.masked,
        tier: request.profile.tier,
        loop: request.loop,
        trigger,
      });

      let process: ProcessHandle;
      try {
        const command = this.commandBuilder.build(
          request.source,
          request.destination,
          request.profile,
          request.loop,
          { manifestName: id.value }
        );
        this.logger.debug("Encoder command", {
          sessionId: id.value,
          command: command.fullCommand,
        });
        process = await this.launcher.spawn(command);
      } catch (error) {
        this.logger.error("Failed to start session", {
          sessionId: id.value,
          error: describeError(error),
        });
        await this.commandBuilder
          .releaseManifest(id.value)
          .catch((releaseError: unknown) =>
            this.logger.warn("Failed to remove manifest", {
              sessionId: id.value,
              error: describeError(releaseError),
            })
          );
        throw error;
      }

      const session = Session.create({
        id,
        ownerId: request.ownerId,
        source: request.source,
        destination: request.destination,
        profile: request.profile,
        loop: request.loop,
        trigger,
        process,
        playlist,
      });
      this.sessions.set(id.value, session);
      this.watch(session, process);

      this.logger.info("Session started", {
        sessionId: id.value,
        pid: process.pid,
      });

      if (trigger === "operator") {
        this.notify(
          request.ownerId,
          `Stream ${id.short} started (${request.profile.tier}p, loop ${request.loop ? "on" : "off"}).`
        );
      }

      return id.value;
    });
  }

  private watch(session: Session, process: ProcessHandle): void {
    const signal = session.attachMonitor();
    this.supervise(session, process.wait(signal), signal);
  }

  private supervise(
    session: Session,
    firstExit: Promise<ExitStatus | undefined>,
    signal: AbortSignal
  ): void {
    this.monitor(session, firstExit, signal).catch((error: unknown) => {
      this.logger.error("Session monitor failed", {
        sessionId: session.id.value,
        error: describeError(error),
      });
    });
  }

  private async monitor(
    session: Session,
    firstExit: Promise<ExitStatus | undefined>,
    signal: AbortSignal
  ): Promise<void> {
    const sessionId = session.id.value;
    let exit = await firstExit;

    while (exit && !signal.aborted) {
      const current: ExitStatus = exit;
      const verdict = await this.locks.runExclusive(sessionId, async () =>
        this.handleExit(session, current, signal)
      );
      if (verdict === "done") {
        return;
      }

      const waited = await this.delay(this.options.restartBackoffMs, signal);
      if (!waited) {
        return;
      }

      exit = await this.locks.runExclusive(sessionId, async () =>
        this.relaunch(session, signal)
      );
    }
  }

  private async handleExit(
    session: Session,
    exit: ExitStatus,
    signal: AbortSignal
  ): Promise<ExitVerdict> {
    const sessionId = session.id.value;
    if (signal.aborted || this.sessions.get(sessionId) !== session || !session.isLive()) {
      return "done";
    }

    const playlistExhausted =
      session.playlist !== undefined && session.playlist.unplayed().length === 0;
    const finishedCleanly =
      exit.code === 0 && !exit.spawnError && !session.loop;

    if (finishedCleanly || (playlistExhausted && !session.loop)) {
      await this.complete(session);
      return "done";
    }

    const restartCount = session.recordUnexpectedExit();
    this.logger.warn("Encoder exited unexpectedly", {
      sessionId,
      pid: session.process.pid,
      code: exit.code,
      signal: exit.signal,
      spawnError: exit.spawnError ? describeError(exit.spawnError) : undefined,
      stderr:
        exit.stderrTail === undefined
          ? undefined
          : session.destination.redact(exit.stderrTail),
      restartCount,
      maxRestarts: this.options.maxRestarts,
    });

    if (restartCount > this.options.maxRestarts) {
      const failure = new RestartCeilingExceededError(
        sessionId,
        this.options.maxRestarts
      );
      session.markCrashed();
      session.cancelMonitor();
      this.sessions.delete(sessionId);
      await this.releaseManifest(session);
      this.logger.error("Session crashed", {
        sessionId,
        error: failure.message,
      });
      this.notify(session.ownerId, failure.userMessage);
      return "done";
    }

    this.notify(
      session.ownerId,
      `Stream ${session.id.short} crashed. Auto-restarting (${restartCount}/${this.options.maxRestarts})…`
    );
    return "retry";
  }

  /**
   * Spawns the replacement process. Returns a synthetic exit when the spawn
   * itself fails, so the failure goes through the restart policy.
   */
  private async relaunch(
    session: Session,
    signal: AbortSignal
  ): Promise<ExitStatus | undefined> {
    if (signal.aborted || !session.isLive()) {
      return undefined;
    }

    let process: ProcessHandle | undefined;
    try {
      await this.retireProcess(session);
      process = await this.spawnFor(session);
      session.replaceProcess(process);
      this.watch(session, process);
      this.logger.info("Session restarted", {
        sessionId: session.id.value,
        pid: process.pid,
        restartCount: session.restartCount,
      });
      return undefined;
    } catch (error) {
      this.logger.error("Failed to restart session", {
        sessionId: session.id.value,
        error: describeError(error),
      });
      if (process) {
        await this.terminate(session, process);
      }
      return {
        code: null,
        signal: null,
        spawnError: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  /**
   * Replaces the encoder with one built for `profile`. Resolves `false` when
   * the old encoder could not be ended or the new one failed to launch; in the
   * latter case the failure is already queued for the restart policy.
   */
  private async swapProfile(
    session: Session,
    profile: Profile,
    asRequested: boolean
  ): Promise<boolean> {
    const sessionId = session.id.value;
    const previousTier = session.profile.tier;

    this.logger.info("Switching session profile", {
      sessionId,
      from: previousTier,
      to: profile.tier,
    });

    // Same discipline as stop: retire the monitor, then end the process.
    session.cancelMonitor();
    await this.terminate(session);
    if (session.process.isAlive()) {
      this.logger.error("Encoder survived termination, keeping current profile", {
        sessionId,
        pid: session.process.pid,
        tier: previousTier,
      });
      this.watch(session, session.process);
      return false;
    }

    session.changeProfile(profile, asRequested);

    let process: ProcessHandle | undefined;
    try {
      process = await this.spawnFor(session);
      session.replaceProcess(process);
      this.watch(session, process);
      this.logger.info("Session profile switched", {
        sessionId,
        pid: process.pid,
        tier: profile.tier,
      });
      return true;
    } catch (error) {
      this.logger.error("Failed to relaunch after profile switch", {
        sessionId,
        error: describeError(error),
      });
      if (process) {
        await this.terminate(session, process);
      }
      const signal = session.attachMonitor();
      this.supervise(
        session,
        Promise.resolve({
          code: null,
          signal: null,
          spawnError:
            error instanceof Error ? error : new Error(String(error)),
        }),
        signal
      );
      return false;
    }
  }

  /**
   * Makes sure the previous encoder is gone before a replacement is spawned.
   * Throws when it outlives termination; nothing is launched in that case.
   */
  private async retireProcess(session: Session): Promise<void> {
    if (!session.process.isAlive()) {
      return;
    }
    await this.terminate(session);
    if (session.process.isAlive()) {
      throw new Error(
        `Encoder ${session.process.pid} of session ${session.id.value} did not exit`
      );
    }
  }

  private async spawnFor(session: Session): Promise<ProcessHandle> {
    const playlist = session.playlist;
    if (playlist && session.loop && playlist.unplayed().length === 0) {
      playlist.rewind();
    }

    const command = this.commandBuilder.build(
      session.launchSource(),
      session.destination,
      session.profile,
      session.loop,
      { manifestName: session.id.value }
    );
    this.logger.debug("Encoder command", {
      sessionId: session.id.value,
      command: command.fullCommand,
    });
    return this.launcher.spawn(command);
  }

  private async complete(session: Session): Promise<void> {
    const sessionId = session.id.value;
    session.beginStopping();
    session.cancelMonitor();
    await this.terminate(session);
    session.markStopped();
    this.sessions.delete(sessionId);
    await this.releaseManifest(session);

    this.logger.info("Session finished", { sessionId });
    this.notify(session.ownerId, `Stream ${session.id.short} finished.`);
  }

  private async terminate(
    session: Session,
    process: ProcessHandle = session.process
  ): Promise<void> {
    try {
      await process.terminate(this.options.terminateTimeoutMs);
    } catch (error) {
      this.logger.error("Failed to terminate encoder", {
        sessionId: session.id.value,
        pid: process.pid,
        error: describeError(error),
      });
    }
  }

  private async releaseManifest(session: Session): Promise<void> {
    if (session.source.kind !== "playlist") {
      return;
    }
    try {
      await this.commandBuilder.releaseManifest(session.id.value);
    } catch (error) {
      this.logger.warn("Failed to remove manifest", {
        sessionId: session.id.value,
        error: describeError(error),
      });
    }
  }

  private playlistOf(session: Session): PlaylistQueue {
    if (!session.playlist) {
      throw new PlaylistItemError(
        `Session ${session.id.value} is not a playlist broadcast`
      );
    }
    return session.playlist;
  }

  private liveSessionsFor(ownerId: string): Session[] {
    return [...this.sessions.values()].filter(
      (session) => session.ownerId === ownerId && session.isLive()
    );
  }

  private notify(ownerId: string, message: string): void {
    Promise.resolve()
      .then(() => this.notifier.notify(ownerId, message))
      .catch((error: unknown) => {
        this.logger.warn("Owner notification failed", {
          ownerId,
          error: describeError(error),
        });
      });
  }
}
