export type Tier = number;

export interface Profile {
  readonly tier: Tier;
  /** WIDTHxHEIGHT, handed to the encoder's scale filter as-is. */
  readonly resolution: string;
  readonly frameRate: number;
  readonly videoBitrate: string;
  readonly bufferSize: string;
  readonly audioBitrate: string;
}
