export enum SessionStatus {
  RUNNING = "running",
  PAUSED = "paused",
  STOPPING = "stopping",
  STOPPED = "stopped",
  CRASHED = "crashed",
}

const validTransitions: Record<SessionStatus, SessionStatus[]> = {
  [SessionStatus.RUNNING]: [
    SessionStatus.PAUSED,
    SessionStatus.STOPPING,
    SessionStatus.CRASHED,
  ],
  [SessionStatus.PAUSED]: [
    SessionStatus.RUNNING,
    SessionStatus.STOPPING,
    SessionStatus.CRASHED,
  ],
  [SessionStatus.STOPPING]: [SessionStatus.STOPPED],
  [SessionStatus.STOPPED]: [],
  [SessionStatus.CRASHED]: [],
};

export class SessionStatusValidator {
  public static isValidTransition(
    from: SessionStatus,
    to: SessionStatus
  ): boolean {
    return validTransitions[from]?.includes(to) ?? false;
  }

  public static getAllowedTransitions(from: SessionStatus): SessionStatus[] {
    return validTransitions[from] ?? [];
  }

  public static isTerminal(status: SessionStatus): boolean {
    return (
      status === SessionStatus.STOPPED || status === SessionStatus.CRASHED
    );
  }

  /** Statuses in which the session still owns a process worth watching. */
  public static isLive(status: SessionStatus): boolean {
    return (
      status === SessionStatus.RUNNING || status === SessionStatus.PAUSED
    );
  }
}
