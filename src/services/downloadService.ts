import fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../core/logger';
import { DownloadError, ERROR_CODES } from '../core/errors';
import { ensureOutputDir, sanitizeFilename } from '../core/fs';
import { watchUrl } from '../youtube/detect';
import type { ExtractorDownloadRequest, MediaExtractor } from '../youtube/ytdlp';
import type { DownloadOptions, VideoQuality } from '../types';
import type { MetadataService } from './metadataService';

const VIDEO_FORMATS: Record<VideoQuality, string> = {
  highest: 'bestvideo[ext=mp4]',
  '1080p': 'bestvideo[height<=1080][ext=mp4]',
  '720p': 'bestvideo[height<=720][ext=mp4]',
  '480p': 'bestvideo[height<=480][ext=mp4]',
  '360p': 'bestvideo[height<=360][ext=mp4]',
  '240p': 'bestvideo[height<=240][ext=mp4]',
};

const DEFAULT_AUDIO_SELECTOR = 'bestaudio/best';
const DEFAULT_VIDEO_AUDIO_SELECTOR = 'bestaudio[ext=m4a]';
const SUBTITLE_FORMAT = 'vtt';
const VIDEO_CONTAINER = 'mp4';

export interface DownloadSettings {
  downloadDir: string;
  audioCodec: string;
  audioQuality: number;
}

/**
 * Builds the yt-dlp selector for a video download: the quality-capped mp4 video
 * stream plus the chosen (or best m4a) audio, falling back to a muxed mp4 and
 * finally to whatever is best.
 */
export function buildVideoFormatSelector(quality: VideoQuality, audioFormatId?: string): string {
  const video = VIDEO_FORMATS[quality];
  const audio = audioFormatId || DEFAULT_VIDEO_AUDIO_SELECTOR;
  const height = quality === 'highest' ? '1080' : quality.slice(0, -1);
  return `${video}+${audio}/best[height<=${height}][ext=mp4]/best`;
}

export class DownloadService {
  constructor(
    private readonly extractor: MediaExtractor,
    private readonly metadata: MetadataService,
    private readonly settings: DownloadSettings
  ) {}

  async downloadAudio(videoId: string, options: DownloadOptions): Promise<string> {
    const { url, basePath } = await this.prepare(videoId, options.outputDirectory);

    const request: ExtractorDownloadRequest = {
      format: options.audioFormatId || DEFAULT_AUDIO_SELECTOR,
      outputTemplate: `${basePath}.%(ext)s`,
      extractAudio: { codec: this.settings.audioCodec, quality: this.settings.audioQuality },
      embedThumbnail: options.includeThumbnail,
      embedMetadata: options.includeMetadata,
    };

    logger.info({ url, format: request.format }, 'Downloading audio');
    await this.extractor.download(url, request);
    return this.expectFile(`${basePath}.${this.settings.audioCodec}`, url);
  }

  async downloadVideo(videoId: string, options: DownloadOptions): Promise<string> {
    const { url, basePath } = await this.prepare(videoId, options.outputDirectory);
    const quality = options.quality ?? 'highest';

    const request: ExtractorDownloadRequest = {
      format: buildVideoFormatSelector(quality, options.audioFormatId),
      outputTemplate: `${basePath}.%(ext)s`,
      mergeOutputFormat: VIDEO_CONTAINER,
      embedThumbnail: options.includeThumbnail,
      embedMetadata: options.includeMetadata,
      embedChapters: options.includeChapters,
    };

    logger.info({ url, quality, format: request.format }, 'Downloading video');
    await this.extractor.download(url, request);
    return this.expectFile(`${basePath}.${VIDEO_CONTAINER}`, url);
  }

  /**
   * Fetches the requested subtitle languages as vtt files next to the media.
   * Languages yt-dlp could not provide are logged and left out of the result.
   */
  async downloadSubtitles(
    videoId: string,
    subtitleIds: string[],
    outputDirectory: string = this.settings.downloadDir
  ): Promise<string[]> {
    if (subtitleIds.length === 0) return [];

    const { url, basePath } = await this.prepare(videoId, outputDirectory);
    await this.extractor.download(url, {
      outputTemplate: `${basePath}.%(ext)s`,
      subtitles: { languages: subtitleIds, format: SUBTITLE_FORMAT },
      skipDownload: true,
    });

    const files: string[] = [];
    for (const lang of subtitleIds) {
      const subtitlePath = `${basePath}.${lang}.${SUBTITLE_FORMAT}`;
      if (await fs.pathExists(subtitlePath)) {
        files.push(subtitlePath);
        logger.info({ subtitlePath }, 'Downloaded subtitle');
      } else {
        logger.warn({ url, lang }, 'Subtitle language not available');
      }
    }
    return files;
  }

  private async prepare(videoId: string, outputDirectory: string): Promise<{ url: string; basePath: string }> {
    const info = await this.metadata.getVideoInfo(videoId);
    const dir = await ensureOutputDir(outputDirectory);
    const basePath = path.join(dir, sanitizeFilename(info.title));
    if (path.dirname(basePath) !== dir) {
      throw new DownloadError(ERROR_CODES.ERR_INVALID_PATH, 'Output name escapes the output directory', {
        title: info.title,
        outputDirectory: dir,
      });
    }
    return { url: watchUrl(info.id), basePath };
  }

  private async expectFile(filePath: string, url: string): Promise<string> {
    if (!(await fs.pathExists(filePath))) {
      logger.error({ url, filePath }, 'Downloaded file not found after yt-dlp success');
      throw new DownloadError(ERROR_CODES.ERR_FILE_NOT_FOUND, 'Downloaded file not found after yt-dlp success', {
        url,
        filePath,
      });
    }
    logger.info({ url, filePath }, 'Download complete');
    return filePath;
  }
}
