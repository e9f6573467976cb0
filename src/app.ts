import * as path from 'path';
import { TtlCache } from './core/cache';
import type { Config } from './core/config';
import { logger } from './core/logger';
import { RequestLifecycle, type RequestState, type StateChange, type TransitionListener } from './core/request';
import { YtDlpExtractor, type MediaExtractor } from './youtube/ytdlp';
import { MetadataService } from './services/metadataService';
import { DownloadService } from './services/downloadService';
import { FileService, type CleanupReport } from './services/fileService';
import type { AudioTrack, DownloadOptions, MediaKind, ProcessOptions, Subtitle, VideoInfo } from './types';

export interface MediaRequest {
  kind: MediaKind;
  /** Video id or URL. */
  input: string;
  options: DownloadOptions;
  /** Mux downloaded subtitles into the video container. Ignored for audio. */
  embedSubtitles?: boolean;
  keepOriginal?: boolean;
}

export interface RequestOutcome {
  state: RequestState;
  videoInfo: VideoInfo;
  /** Downloaded media on disk; the muxed file once the un-muxed originals are removed. */
  mediaPath: string;
  subtitlePaths: string[];
  outputPath: string;
  history: readonly StateChange[];
}

export interface AppServices {
  metadata: MetadataService;
  downloads: DownloadService;
  files: FileService;
}

/** Single entry point the CLI talks to. */
export class TubeFetch {
  constructor(private readonly services: AppServices) {}

  getVideoInfo(input: string): Promise<VideoInfo> {
    return this.services.metadata.getVideoInfo(input);
  }

  getAudioTracks(input: string): Promise<AudioTrack[]> {
    return this.services.metadata.getAudioTracks(input);
  }

  getAvailableSubtitles(input: string): Promise<Subtitle[]> {
    return this.services.metadata.getAvailableSubtitles(input);
  }

  downloadAudio(input: string, options: DownloadOptions): Promise<string> {
    return this.services.downloads.downloadAudio(input, options);
  }

  downloadVideo(input: string, options: DownloadOptions): Promise<string> {
    return this.services.downloads.downloadVideo(input, options);
  }

  downloadSubtitles(input: string, subtitleIds: string[], outputDirectory?: string): Promise<string[]> {
    return outputDirectory === undefined
      ? this.services.downloads.downloadSubtitles(input, subtitleIds)
      : this.services.downloads.downloadSubtitles(input, subtitleIds, outputDirectory);
  }

  mergeSubtitles(mediaPath: string, subtitlePaths: string[], options: ProcessOptions): Promise<string> {
    return this.services.files.mergeSubtitles(mediaPath, subtitlePaths, options);
  }

  cleanupTempFiles(paths: string[]): Promise<CleanupReport> {
    return this.services.files.cleanupTempFiles(paths);
  }

  /**
   * Runs one request end to end: metadata, media and subtitle download, then
   * optional subtitle muxing. Any failure marks the request failed and is
   * rethrown unchanged; nothing is retried.
   */
  async runRequest(request: MediaRequest, onTransition?: TransitionListener): Promise<RequestOutcome> {
    const lifecycle = new RequestLifecycle(onTransition);
    const { kind, input, options } = request;

    try {
      const videoInfo = await this.services.metadata.getVideoInfo(input);
      lifecycle.advance('metadataFetched');

      lifecycle.advance('downloading');
      let mediaPath =
        kind === 'audio'
          ? await this.services.downloads.downloadAudio(input, options)
          : await this.services.downloads.downloadVideo(input, options);
      let subtitlePaths = await this.services.downloads.downloadSubtitles(input, options.subtitleIds, options.outputDirectory);

      lifecycle.advance('processing');
      let outputPath = mediaPath;
      if (request.embedSubtitles && kind === 'video' && subtitlePaths.length > 0) {
        const processOptions: ProcessOptions = {
          keepOriginal: request.keepOriginal ?? false,
          outputFormat: path.extname(mediaPath).slice(1) || 'mp4',
        };
        outputPath = await this.services.files.mergeSubtitles(mediaPath, subtitlePaths, processOptions);
        if (!processOptions.keepOriginal) {
          mediaPath = outputPath;
          subtitlePaths = [];
        }
      }

      lifecycle.advance('complete');
      logger.info({ videoId: videoInfo.id, outputPath, subtitles: subtitlePaths.length }, 'Request complete');

      return {
        state: lifecycle.state,
        videoInfo,
        mediaPath,
        subtitlePaths,
        outputPath,
        history: lifecycle.history,
      };
    } catch (error) {
      lifecycle.fail(error);
      logger.error({ input, kind, error: error instanceof Error ? error.message : String(error) }, 'Request failed');
      throw error;
    }
  }
}

export interface AppOverrides {
  extractor?: MediaExtractor;
  files?: FileService;
}

/** Wires one session: a fresh metadata cache shared by every request made through the returned facade. */
export function createApp(config: Config, overrides: AppOverrides = {}): TubeFetch {
  const extractor =
    overrides.extractor ??
    new YtDlpExtractor({
      binary: config.YTDLP_PATH,
      ffmpegPath: config.FFMPEG_PATH,
      geoBypassCountry: config.GEO_BYPASS_COUNTRY,
    });
  const cache = new TtlCache<VideoInfo>({ ttlSeconds: config.CACHE_TTL_SECONDS });
  const metadata = new MetadataService(extractor, cache);
  const downloads = new DownloadService(extractor, metadata, {
    downloadDir: config.DOWNLOAD_DIR,
    audioCodec: config.AUDIO_CODEC,
    audioQuality: config.AUDIO_QUALITY,
  });
  const files = overrides.files ?? new FileService({ ffmpegPath: config.FFMPEG_PATH });

  return new TubeFetch({ metadata, downloads, files });
}
