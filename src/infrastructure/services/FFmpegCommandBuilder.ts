import * as fs from "fs";
import * as path from "path";
import { Destination } from "../../domain/value-objects/Destination";
import { Profile } from "../../domain/value-objects/Profile";
import { SourceDescriptor } from "../../domain/value-objects/SourceDescriptor";
import {
  BuildOptions,
  EncoderCommand,
  EncoderCommandBuilder,
} from "../../domain/services/EncoderCommandBuilder";
import {
  EmptyQueueError,
  UnsupportedSourceKindError,
} from "../../domain/errors/BroadcastErrors";

const DEFAULT_MANIFEST_NAME = "playlist";

export const videoArgs = (profile: Profile): string[] => [
  "-c:v", "libx264",
  "-preset", "veryfast",
  "-b:v", profile.videoBitrate,
  "-maxrate", profile.videoBitrate,
  "-bufsize", profile.bufferSize,
  "-pix_fmt", "yuv420p",
  "-g", String(profile.frameRate * 2),
  "-vf", `scale=${profile.resolution.replace("x", ":")},fps=${profile.frameRate}`,
];

export const audioArgs = (profile: Profile): string[] => [
  "-c:a", "aac",
  "-b:a", profile.audioBitrate,
  "-ar", "44100",
  "-ac", "2",
];

/** One concat-demuxer line per path, single quotes escaped the shell way. */
export const manifestContent = (paths: readonly string[]): string =>
  paths.map((item) => `file '${item.replace(/'/g, "'\\''")}'`).join("\n") + "\n";

export class FFmpegCommandBuilder implements EncoderCommandBuilder {
  constructor(
    private readonly binaryPath: string,
    private readonly manifestDir: string
  ) {}

  public build(
    source: SourceDescriptor,
    destination: Destination,
    profile: Profile,
    loop: boolean,
    options: BuildOptions = {}
  ): EncoderCommand {
    const loopArgs = loop ? ["-stream_loop", "-1"] : [];
    const output = ["-f", "flv", destination.url];
    const args = ["-hide_banner", "-loglevel", "warning"];

    switch (source.kind) {
      case "single-file":
        args.push(
          ...loopArgs,
          "-re", "-i", source.path,
          ...videoArgs(profile),
          ...audioArgs(profile),
          ...output
        );
        break;
      case "composite-audio":
        args.push(
          "-loop", "1",
          "-framerate", String(profile.frameRate),
          "-i", source.imagePath,
          ...loopArgs,
          "-re", "-i", source.audioPath,
          ...videoArgs(profile),
          "-tune", "stillimage",
          ...audioArgs(profile),
          "-shortest",
          ...output
        );
        break;
      case "playlist": {
        const manifest = this.writeManifest(
          source.paths,
          options.manifestName ?? DEFAULT_MANIFEST_NAME
        );
        args.push(
          ...loopArgs,
          "-re", "-f", "concat", "-safe", "0", "-i", manifest,
          ...videoArgs(profile),
          ...audioArgs(profile),
          ...output
        );
        break;
      }
      default:
        throw new UnsupportedSourceKindError(kindOf(source));
    }

    return {
      command: this.binaryPath,
      args,
      fullCommand: [this.binaryPath, ...args]
        .map((arg) => (arg === destination.url ? destination.masked : arg))
        .join(" "),
    };
  }

  public manifestPath(manifestName: string = DEFAULT_MANIFEST_NAME): string {
    return path.join(this.manifestDir, `${manifestName}.txt`);
  }

  public async releaseManifest(manifestName: string): Promise<void> {
    await fs.promises.rm(this.manifestPath(manifestName), { force: true });
  }

  private writeManifest(paths: readonly string[], manifestName: string): string {
    if (paths.length === 0) {
      throw new EmptyQueueError();
    }

    const file = this.manifestPath(manifestName);
    fs.mkdirSync(this.manifestDir, { recursive: true });
    fs.writeFileSync(file, manifestContent(paths), "utf8");
    return file;
  }
}

const kindOf = (source: never): string => {
  const candidate: unknown = source;
  if (typeof candidate === "object" && candidate !== null && "kind" in candidate) {
    return String(candidate.kind);
  }
  return String(candidate);
};
