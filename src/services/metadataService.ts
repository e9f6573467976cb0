import type { TtlCache } from '../core/cache';
import { logger } from '../core/logger';
import { resolveVideoRef } from '../youtube/detect';
import type { MediaExtractor } from '../youtube/ytdlp';
import type { AudioTrack, MediaFormat, Subtitle, SubtitleMap, VideoInfo } from '../types';

const PLAIN_PROTOCOLS = new Set(['http', 'https']);

export function isAudioOnly(format: MediaFormat): boolean {
  const hasAudio = format.acodec !== 'none';
  const noVideo = format.vcodec === 'none' || format.resolution === 'audio only';
  return hasAudio && noVideo;
}

export function toAudioTrack(format: MediaFormat): AudioTrack {
  const language = format.language || 'original';
  const bitrate = format.abr === undefined ? undefined : Math.round(format.abr);

  let description = `${language} (${format.ext}`;
  if (format.protocol && !PLAIN_PROTOCOLS.has(format.protocol)) {
    description += `, ${format.protocol}`;
  }
  if (bitrate) {
    description += `, ${bitrate}k`;
  }
  description += ')';
  if (format.formatNote?.toLowerCase().includes('dubbed')) {
    description += ' [dubbed]';
  }

  return {
    language,
    formatId: format.formatId,
    description,
    codec: format.acodec,
    bitrate,
  };
}

function toSubtitles(map: SubtitleMap, isAutoGenerated: boolean): Subtitle[] {
  return Object.entries(map).flatMap(([languageCode, descriptors]) =>
    descriptors.map((descriptor) => ({
      language: descriptor.name || languageCode,
      languageCode,
      formatId: descriptor.ext,
      isAutoGenerated,
    }))
  );
}

export class MetadataService {
  constructor(
    private readonly extractor: MediaExtractor,
    private readonly cache: TtlCache<VideoInfo>
  ) {}

  /**
   * Returns metadata for a video id or URL, served from the session cache while
   * fresh. A failed extraction propagates as `ExtractionError` and leaves the
   * cache untouched.
   */
  async getVideoInfo(videoIdOrUrl: string): Promise<VideoInfo> {
    const ref = resolveVideoRef(videoIdOrUrl);

    const cached = this.cache.get(ref.id);
    if (cached) {
      logger.debug({ videoId: ref.id }, 'Metadata cache hit');
      return cached;
    }

    const info = await this.extractor.extractInfo(ref.url);
    this.cache.put(ref.id, info);
    logger.info({ videoId: ref.id, title: info.title, formats: info.formats.length }, 'Metadata fetched');
    return info;
  }

  async getAudioTracks(videoIdOrUrl: string): Promise<AudioTrack[]> {
    const info = await this.getVideoInfo(videoIdOrUrl);
    return info.formats.filter(isAudioOnly).map(toAudioTrack);
  }

  /** Human-authored tracks first, then machine-generated ones; a language present in both appears twice. */
  async getAvailableSubtitles(videoIdOrUrl: string): Promise<Subtitle[]> {
    const info = await this.getVideoInfo(videoIdOrUrl);
    return [...toSubtitles(info.subtitles, false), ...toSubtitles(info.automaticCaptions, true)];
  }
}
