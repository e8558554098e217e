import { Profile, Tier } from "../../domain/value-objects/Profile";

export const DEFAULT_PROFILES: readonly Profile[] = [
  {
    tier: 360,
    resolution: "640x360",
    frameRate: 30,
    videoBitrate: "800k",
    bufferSize: "1600k",
    audioBitrate: "96k",
  },
  {
    tier: 480,
    resolution: "854x480",
    frameRate: 30,
    videoBitrate: "1500k",
    bufferSize: "3000k",
    audioBitrate: "128k",
  },
  {
    tier: 720,
    resolution: "1280x720",
    frameRate: 30,
    videoBitrate: "2500k",
    bufferSize: "5000k",
    audioBitrate: "128k",
  },
  {
    tier: 1080,
    resolution: "1920x1080",
    frameRate: 30,
    videoBitrate: "4500k",
    bufferSize: "9000k",
    audioBitrate: "160k",
  },
];

export interface ProfileOverrides {
  videoBitrate?: string;
  audioBitrate?: string;
  frameRate?: number;
}

export class ProfileRegistry {
  private readonly profiles: Map<Tier, Profile>;
  private readonly ordered: Tier[];

  constructor(
    private readonly defaultTier: Tier = 720,
    overrides: ProfileOverrides = {},
    profiles: readonly Profile[] = DEFAULT_PROFILES
  ) {
    this.profiles = new Map(
      profiles.map((profile) => [
        profile.tier,
        Object.freeze({
          ...profile,
          videoBitrate: overrides.videoBitrate || profile.videoBitrate,
          audioBitrate: overrides.audioBitrate || profile.audioBitrate,
          frameRate: overrides.frameRate || profile.frameRate,
        }),
      ])
    );
    this.ordered = [...this.profiles.keys()].sort((a, b) => a - b);

    if (!this.profiles.has(defaultTier)) {
      throw new Error(
        `Default tier ${defaultTier} is not one of: ${this.ordered.join(", ")}`
      );
    }
  }

  /** Never fails: unknown tiers fall back to the default tier. */
  public resolve(tier?: Tier): Profile {
    const profile =
      tier === undefined ? undefined : this.profiles.get(tier);
    return profile ?? this.fallback();
  }

  public has(tier: Tier): boolean {
    return this.profiles.has(tier);
  }

  public tiers(): Tier[] {
    return [...this.ordered];
  }

  public lower(tier: Tier): Tier | undefined {
    const index = this.ordered.indexOf(tier);
    return index > 0 ? this.ordered[index - 1] : undefined;
  }

  public higher(tier: Tier): Tier | undefined {
    const index = this.ordered.indexOf(tier);
    return index >= 0 && index < this.ordered.length - 1
      ? this.ordered[index + 1]
      : undefined;
  }

  public lowest(): Tier {
    return this.ordered[0] ?? this.defaultTier;
  }

  private fallback(): Profile {
    const profile = this.profiles.get(this.defaultTier);
    if (!profile) {
      throw new Error(`Default tier ${this.defaultTier} missing`);
    }
    return profile;
  }
}
