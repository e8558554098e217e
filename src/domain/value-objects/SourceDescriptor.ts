export interface SingleFileSource {
  readonly kind: "single-file";
  readonly path: string;
}

export interface CompositeAudioSource {
  readonly kind: "composite-audio";
  readonly audioPath: string;
  readonly imagePath: string;
}

export interface PlaylistSource {
  readonly kind: "playlist";
  readonly paths: readonly string[];
}

export type SourceDescriptor =
  | SingleFileSource
  | CompositeAudioSource
  | PlaylistSource;

export type SourceKind = SourceDescriptor["kind"];

export const SourceDescriptors = {
  singleFile: (path: string): SingleFileSource => ({
    kind: "single-file",
    path,
  }),
  compositeAudio: (
    audioPath: string,
    imagePath: string
  ): CompositeAudioSource => ({
    kind: "composite-audio",
    audioPath,
    imagePath,
  }),
  playlist: (paths: readonly string[]): PlaylistSource => ({
    kind: "playlist",
    paths: [...paths],
  }),
};

export const describeSource = (source: SourceDescriptor): string => {
  switch (source.kind) {
    case "single-file":
      return source.path;
    case "composite-audio":
      return `${source.audioPath} + ${source.imagePath}`;
    case "playlist":
      return `${source.paths.length} item(s)`;
  }
};
