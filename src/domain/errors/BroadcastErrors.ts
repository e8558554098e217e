export type BroadcastErrorCode =
  | "CONFIGURATION_MISSING"
  | "SPAWN_FAILED"
  | "UNSUPPORTED_SOURCE_KIND"
  | "UNSUPPORTED_OPERATION"
  | "ALREADY_RUNNING"
  | "EMPTY_QUEUE"
  | "RESTART_CEILING_EXCEEDED"
  | "INVALID_TRANSITION"
  | "PLAYLIST_ITEM";

/**
 * Base class for every failure the broadcast subsystem reports. `userMessage`
 * is safe to show an operator; `message` may carry diagnostics for the log.
 */
export abstract class BroadcastError extends Error {
  public abstract readonly code: BroadcastErrorCode;

  constructor(message: string, public readonly userMessage: string = message) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationMissingError extends BroadcastError {
  public readonly code = "CONFIGURATION_MISSING";

  constructor(readonly setting: string) {
    super(
      `No ${setting} configured`,
      `No ${setting} configured. Set a streaming destination first.`
    );
  }
}

export class SpawnError extends BroadcastError {
  public readonly code = "SPAWN_FAILED";

  constructor(readonly binary: string, readonly reason: string) {
    super(
      `Failed to launch ${binary}: ${reason}`,
      `Could not start the encoder (${binary}).`
    );
  }
}

export class UnsupportedSourceKindError extends BroadcastError {
  public readonly code = "UNSUPPORTED_SOURCE_KIND";

  constructor(readonly kind: string) {
    super(`Unsupported source kind: ${kind}`);
  }
}

export class UnsupportedOperationError extends BroadcastError {
  public readonly code = "UNSUPPORTED_OPERATION";

  constructor(readonly operation: string, readonly platform: string) {
    super(
      `${operation} is not supported on ${platform}`,
      `${operation} is not available on this server.`
    );
  }
}

export class AlreadyRunningError extends BroadcastError {
  public readonly code = "ALREADY_RUNNING";

  constructor(readonly ownerId: string, readonly sessionId: string) {
    super(
      `Owner ${ownerId} already has live session ${sessionId}`,
      `A broadcast is already running (${sessionId.slice(0, 8)}). Stop it first.`
    );
  }
}

export class EmptyQueueError extends BroadcastError {
  public readonly code = "EMPTY_QUEUE";

  constructor() {
    super("Playlist has no unplayed items", "The playlist is empty.");
  }
}

export class RestartCeilingExceededError extends BroadcastError {
  public readonly code = "RESTART_CEILING_EXCEEDED";

  constructor(readonly sessionId: string, readonly maxRestarts: number) {
    super(
      `Session ${sessionId} exceeded ${maxRestarts} automatic restarts`,
      `Stream ${sessionId.slice(0, 8)} stopped after ${maxRestarts} crashes.`
    );
  }
}

export class InvalidTransitionError extends BroadcastError {
  public readonly code = "INVALID_TRANSITION";

  constructor(readonly from: string, readonly to: string) {
    super(`Cannot move session from ${from} to ${to}`);
  }
}

export class PlaylistItemError extends BroadcastError {
  public readonly code = "PLAYLIST_ITEM";
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
