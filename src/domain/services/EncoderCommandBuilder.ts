import { Destination } from "../value-objects/Destination";
import { Profile } from "../value-objects/Profile";
import { SourceDescriptor } from "../value-objects/SourceDescriptor";

export interface EncoderCommand {
  readonly command: string;
  readonly args: string[];
  /** Printable form with the destination key masked. */
  readonly fullCommand: string;
}

export interface BuildOptions {
  /** Names the playlist manifest so concurrent sessions never share one. */
  manifestName?: string;
}

export interface EncoderCommandBuilder {
  /**
   * Translate a source/destination/profile triple into encoder arguments.
   * Playlist sources rewrite their manifest file as a side effect.
   */
  build(
    source: SourceDescriptor,
    destination: Destination,
    profile: Profile,
    loop: boolean,
    options?: BuildOptions
  ): EncoderCommand;

  /**
   * Remove a manifest written for `manifestName`, if any.
   */
  releaseManifest(manifestName: string): Promise<void>;
}
