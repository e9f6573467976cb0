export interface MediaFormat {
  formatId: string;
  ext: string;
  vcodec?: string | undefined;
  acodec?: string | undefined;
  resolution?: string | undefined;
  formatNote?: string | undefined;
  language?: string | undefined;
  abr?: number | undefined;
  protocol?: string | undefined;
  height?: number | undefined;
}

export interface SubtitleDescriptor {
  ext: string;
  url?: string | undefined;
  name?: string | undefined;
}

export type SubtitleMap = Readonly<Record<string, readonly SubtitleDescriptor[]>>;

export interface VideoInfo {
  readonly id: string;
  readonly title: string;
  readonly formats: readonly MediaFormat[];
  /** Human-authored tracks keyed by language code. */
  readonly subtitles: SubtitleMap;
  /** Machine-generated tracks keyed by language code. */
  readonly automaticCaptions: SubtitleMap;
  readonly duration?: number | undefined;
  readonly thumbnailUrl?: string | undefined;
  readonly description?: string | undefined;
}

export interface AudioTrack {
  language: string;
  formatId: string;
  description: string;
  codec?: string | undefined;
  bitrate?: number | undefined;
}

export interface Subtitle {
  language: string;
  languageCode: string;
  formatId: string;
  isAutoGenerated: boolean;
}

export const VIDEO_QUALITIES = ['highest', '1080p', '720p', '480p', '360p', '240p'] as const;
export type VideoQuality = typeof VIDEO_QUALITIES[number];

export interface DownloadOptions {
  outputDirectory: string;
  includeMetadata: boolean;
  includeThumbnail: boolean;
  includeChapters: boolean;
  audioFormatId?: string | undefined;
  subtitleIds: string[];
  quality?: VideoQuality | undefined;
}

export interface ProcessOptions {
  keepOriginal: boolean;
  outputFormat: string;
  qualityLevel?: number | undefined;
}

export type MediaKind = 'audio' | 'video';
