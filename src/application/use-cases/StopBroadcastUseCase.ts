import { Logger } from "../interfaces/Logger";
import { SessionSupervisor } from "../services/SessionSupervisor";

export interface StopBroadcastRequest {
  ownerId: string;
  /** Full session id or the short prefix shown to operators. */
  sessionRef?: string;
}

export interface StopBroadcastResponse {
  stopped: string[];
}

export class StopBroadcastUseCase {
  constructor(
    private readonly supervisor: SessionSupervisor,
    private readonly logger: Logger
  ) {}

  public async execute(
    request: StopBroadcastRequest
  ): Promise<StopBroadcastResponse> {
    const targets = this.resolveTargets(request);

    if (targets.length === 0) {
      this.logger.warn("No matching session to stop", {
        ownerId: request.ownerId,
        sessionRef: request.sessionRef,
      });
      return { stopped: [] };
    }

    const stopped: string[] = [];
    for (const sessionId of targets) {
      if (await this.supervisor.stop(sessionId)) {
        stopped.push(sessionId);
      }
    }

    return { stopped };
  }

  private resolveTargets(request: StopBroadcastRequest): string[] {
    if (!request.sessionRef) {
      return this.supervisor
        .listForOwner(request.ownerId)
        .map((view) => view.id);
    }

    const match = this.supervisor.findByIdPrefix(
      request.ownerId,
      request.sessionRef
    );
    return match ? [match.id] : [];
  }
}
