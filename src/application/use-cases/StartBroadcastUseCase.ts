import { Destination } from "../../domain/value-objects/Destination";
import { Tier } from "../../domain/value-objects/Profile";
import { SessionId } from "../../domain/value-objects/SessionId";
import { SourceDescriptor } from "../../domain/value-objects/SourceDescriptor";
import {
  ConfigurationMissingError,
  describeError,
} from "../../domain/errors/BroadcastErrors";
import { Logger } from "../interfaces/Logger";
import { ProfileRegistry } from "../services/ProfileRegistry";
import {
  SessionSupervisor,
  StartSessionRequest,
} from "../services/SessionSupervisor";

export interface BroadcastDefaults {
  endpoint: string;
  streamKey: string;
}

export interface StartBroadcastRequest {
  ownerId: string;
  source: SourceDescriptor;
  endpoint?: string;
  streamKey?: string;
  tier?: Tier;
  loop?: boolean;
  /** Set for starts the service issues itself, e.g. at boot. */
  internal?: boolean;
}

export interface StartBroadcastResponse {
  sessionId: string;
  shortId: string;
  tier: Tier;
  destination: string;
}

export class StartBroadcastUseCase {
  constructor(
    private readonly supervisor: SessionSupervisor,
    private readonly profiles: ProfileRegistry,
    private readonly defaults: BroadcastDefaults,
    private readonly logger: Logger
  ) {}

  public async execute(
    request: StartBroadcastRequest
  ): Promise<StartBroadcastResponse> {
    const endpoint = request.endpoint?.trim() || this.defaults.endpoint;
    const streamKey = request.streamKey?.trim() || this.defaults.streamKey;

    if (!streamKey) {
      this.logger.warn("Start rejected, no stream key", {
        ownerId: request.ownerId,
      });
      throw new ConfigurationMissingError("stream key");
    }
    if (!endpoint) {
      throw new ConfigurationMissingError("stream endpoint");
    }

    const destination = Destination.create(endpoint, streamKey);
    const profile = this.profiles.resolve(request.tier);
    const start: StartSessionRequest = {
      ownerId: request.ownerId,
      source: request.source,
      destination,
      profile,
      loop: request.loop ?? true,
    };

    try {
      const sessionId = request.internal
        ? await this.supervisor.startInternal(start)
        : await this.supervisor.start(start);

      return {
        sessionId,
        shortId: SessionId.fromString(sessionId).short,
        tier: profile.tier,
        destination: destination.masked,
      };
    } catch (error) {
      this.logger.error("Failed to start broadcast", {
        ownerId: request.ownerId,
        error: describeError(error),
      });
      throw error;
    }
  }
}
