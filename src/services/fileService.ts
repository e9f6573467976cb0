import axios from 'axios';
import fs from 'fs-extra';
import * as path from 'path';
import { run, type CommandRunner, type ExecResult } from '../core/exec';
import { logger as defaultLogger, type Logger } from '../core/logger';
import { AppError, ERROR_CODES, ProcessingError } from '../core/errors';
import { ensureFileExists, removeFile, withSuffix } from '../core/fs';
import type { ProcessOptions } from '../types';

const AUDIO_CONTAINERS = new Set(['mp3', 'm4a', 'aac', 'opus', 'ogg', 'flac', 'wav']);
const MP4_FAMILY = new Set(['mp4', 'm4v', 'mov']);
const SUBTITLE_LANG_PATTERN = /\.([A-Za-z0-9-]+)\.(?:vtt|srt|ass)$/;

export type ThumbnailFetcher = (url: string, destination: string) => Promise<void>;

export interface CleanupReport {
  removed: string[];
  failed: string[];
}

export interface FileServiceSettings {
  ffmpegPath: string;
}

export async function downloadThumbnail(url: string, destination: string): Promise<void> {
  const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
  await fs.writeFile(destination, Buffer.from(response.data));
}

export function subtitleCodecFor(outputFormat: string): string {
  const format = outputFormat.toLowerCase();
  if (MP4_FAMILY.has(format)) return 'mov_text';
  if (format === 'webm') return 'webvtt';
  return 'srt';
}

export function subtitleLanguage(subtitlePath: string): string | undefined {
  return SUBTITLE_LANG_PATTERN.exec(path.basename(subtitlePath))?.[1];
}

export function buildMergeArgs(mediaPath: string, subtitlePaths: string[], outputPath: string, outputFormat: string): string[] {
  const args = ['-y', '-i', mediaPath];
  subtitlePaths.forEach((subtitlePath) => {
    args.push('-i', subtitlePath);
  });

  args.push('-map', '0');
  subtitlePaths.forEach((_, index) => {
    args.push('-map', String(index + 1));
  });

  args.push('-c:v', 'copy', '-c:a', 'copy', '-c:s', subtitleCodecFor(outputFormat));

  subtitlePaths.forEach((subtitlePath, index) => {
    const lang = subtitleLanguage(subtitlePath);
    if (lang) args.push(`-metadata:s:s:${index}`, `language=${lang}`);
  });

  args.push(outputPath);
  return args;
}

export function buildThumbnailArgs(mediaPath: string, thumbnailPath: string, outputPath: string): string[] {
  const ext = path.extname(mediaPath).slice(1).toLowerCase();
  const isAudio = AUDIO_CONTAINERS.has(ext);
  const pictureStream = isAudio ? 0 : 1;

  return [
    '-y',
    '-i',
    mediaPath,
    '-i',
    thumbnailPath,
    '-map',
    isAudio ? '0:a' : '0',
    '-map',
    '1',
    '-c',
    'copy',
    `-c:v:${pictureStream}`,
    'mjpeg',
    `-disposition:v:${pictureStream}`,
    'attached_pic',
    outputPath,
  ];
}

const AUDIO_ENCODERS: Record<string, string> = {
  mp3: 'libmp3lame',
  m4a: 'aac',
  aac: 'aac',
  opus: 'libopus',
  ogg: 'libvorbis',
  flac: 'flac',
  wav: 'pcm_s16le',
};

/**
 * `-c copy` without a quality level. With one, video containers are re-encoded
 * at that CRF (VP9/Opus for webm, H.264/AAC otherwise) and audio containers
 * drop any video stream and re-encode with the container's own codec.
 */
export function buildProcessArgs(filePath: string, outputPath: string, options: ProcessOptions): string[] {
  const format = options.outputFormat.toLowerCase();
  const audioEncoder = AUDIO_ENCODERS[format];
  let codecArgs: string[];
  if (options.qualityLevel === undefined) {
    codecArgs = ['-c', 'copy'];
  } else if (audioEncoder) {
    codecArgs = ['-vn', '-c:a', audioEncoder];
  } else if (format === 'webm') {
    codecArgs = ['-c:v', 'libvpx-vp9', '-crf', String(options.qualityLevel), '-b:v', '0', '-c:a', 'libopus'];
  } else {
    codecArgs = ['-c:v', 'libx264', '-crf', String(options.qualityLevel), '-c:a', 'aac'];
  }
  return ['-y', '-i', filePath, ...codecArgs, outputPath];
}

export class FileService {
  constructor(
    private readonly settings: FileServiceSettings,
    private readonly runner: CommandRunner = run,
    private readonly fetchThumbnail: ThumbnailFetcher = downloadThumbnail,
    private readonly logger: Logger = defaultLogger
  ) {}

  async mergeSubtitles(mediaPath: string, subtitlePaths: string[], options: ProcessOptions): Promise<string> {
    if (subtitlePaths.length === 0) {
      this.logger.info({ mediaPath }, 'No subtitle files to merge');
      return mediaPath;
    }

    await ensureFileExists(mediaPath);
    const outputPath = withSuffix(mediaPath, '_with_subs', options.outputFormat);
    await this.ffmpeg(buildMergeArgs(mediaPath, subtitlePaths, outputPath, options.outputFormat), 'merge subtitles');
    this.logger.info({ outputPath, subtitles: subtitlePaths.length }, 'Merged subtitles');

    if (!options.keepOriginal) {
      await this.cleanupTempFiles([mediaPath, ...subtitlePaths]);
    }
    return outputPath;
  }

  async embedThumbnail(mediaPath: string, thumbnailUrl: string, options: ProcessOptions): Promise<string> {
    await ensureFileExists(mediaPath);
    const thumbnailPath = withSuffix(mediaPath, '.thumb', 'img');
    const outputPath = withSuffix(mediaPath, '_thumb', path.extname(mediaPath).slice(1) || options.outputFormat);

    try {
      try {
        await this.fetchThumbnail(thumbnailUrl, thumbnailPath);
      } catch (error) {
        this.logger.error({ thumbnailUrl, error: error instanceof Error ? error.message : String(error) }, 'Thumbnail download failed');
        throw new ProcessingError(ERROR_CODES.ERR_FETCH_FAILED, 'Failed to download thumbnail', { thumbnailUrl });
      }
      await this.ffmpeg(buildThumbnailArgs(mediaPath, thumbnailPath, outputPath), 'embed thumbnail');
    } finally {
      if (await fs.pathExists(thumbnailPath)) {
        await this.cleanupTempFiles([thumbnailPath]);
      }
    }

    this.logger.info({ outputPath }, 'Embedded thumbnail');
    if (!options.keepOriginal) {
      await this.cleanupTempFiles([mediaPath]);
    }
    return outputPath;
  }

  async processDownload(filePath: string, options: ProcessOptions): Promise<string> {
    await ensureFileExists(filePath);
    const outputPath = withSuffix(filePath, '_processed', options.outputFormat);
    await this.ffmpeg(buildProcessArgs(filePath, outputPath, options), 'process file');
    this.logger.info({ outputPath }, 'Processed file');

    if (!options.keepOriginal) {
      await this.cleanupTempFiles([filePath]);
    }
    return outputPath;
  }

  /** Best effort: every path is attempted and failures are only logged. */
  async cleanupTempFiles(paths: string[]): Promise<CleanupReport> {
    const report: CleanupReport = { removed: [], failed: [] };
    for (const filePath of paths) {
      try {
        await removeFile(filePath);
        report.removed.push(filePath);
      } catch (error) {
        report.failed.push(filePath);
        this.logger.warn({ path: filePath, error: error instanceof Error ? error.message : String(error) }, 'Failed to delete temporary file');
      }
    }
    return report;
  }

  private async ffmpeg(args: string[], step: string): Promise<ExecResult> {
    let result: ExecResult;
    try {
      result = await this.runner(this.settings.ffmpegPath, args);
    } catch (error) {
      if (error instanceof AppError) {
        throw new ProcessingError(error.code, `ffmpeg could not ${step}: ${error.message}`, error.details);
      }
      throw new ProcessingError(ERROR_CODES.ERR_INTERNAL, `ffmpeg could not ${step}`, { originalError: String(error) });
    }

    if (result.code !== 0) {
      this.logger.error({ step, code: result.code, stderrPreview: result.stderr.slice(-800) }, 'ffmpeg failed');
      throw new ProcessingError(ERROR_CODES.ERR_PROCESSING_FAILED, `ffmpeg failed to ${step} (exit ${result.code})`, {
        code: result.code,
        stderr: result.stderr.slice(-2000),
      });
    }
    return result;
  }
}
