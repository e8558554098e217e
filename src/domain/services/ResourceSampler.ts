export interface ResourceSampler {
  /** Aggregate utilisation in percent, 0-100. */
  sample(): Promise<number>;
}
