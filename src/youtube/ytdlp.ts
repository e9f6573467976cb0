import { z } from 'zod';
import { run, type CommandRunner, type ExecResult } from '../core/exec';
import { logger } from '../core/logger';
import { AppError, DownloadError, ERROR_CODES, ExtractionError, type ErrorCode } from '../core/errors';
import type { MediaFormat, SubtitleDescriptor, SubtitleMap, VideoInfo } from '../types';

const optionalString = z.string().nullish().transform((value) => value ?? undefined);
const optionalNumber = z.number().nullish().transform((value) => value ?? undefined);

const rawFormatSchema = z.object({
  format_id: z.string(),
  ext: z.string().nullish().transform((value) => value ?? 'unknown'),
  vcodec: optionalString,
  acodec: optionalString,
  resolution: optionalString,
  format_note: optionalString,
  language: optionalString,
  abr: optionalNumber,
  protocol: optionalString,
  height: optionalNumber,
});

const rawSubtitleSchema = z.object({
  ext: z.string(),
  url: optionalString,
  name: optionalString,
});

const rawSubtitleMapSchema = z
  .record(z.array(rawSubtitleSchema))
  .nullish()
  .transform((value) => value ?? {});

const rawInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish().transform((value) => value ?? 'Untitled'),
  formats: z.array(rawFormatSchema).nullish().transform((value) => value ?? []),
  subtitles: rawSubtitleMapSchema,
  automatic_captions: rawSubtitleMapSchema,
  duration: optionalNumber,
  thumbnail: optionalString,
  description: optionalString,
});

type RawFormat = z.infer<typeof rawFormatSchema>;
type RawSubtitleMap = z.infer<typeof rawSubtitleMapSchema>;

export interface ExtractorDownloadRequest {
  /** yt-dlp format selector, e.g. `bestaudio/best`. */
  format?: string;
  /** Output template; may contain yt-dlp fields such as `%(ext)s`. */
  outputTemplate: string;
  extractAudio?: { codec: string; quality: number };
  mergeOutputFormat?: string;
  embedThumbnail?: boolean;
  embedMetadata?: boolean;
  embedChapters?: boolean;
  subtitles?: { languages: string[]; format: string };
  skipDownload?: boolean;
}

/**
 * Boundary to the extraction engine. `extractInfo` returns metadata only;
 * `download` writes files according to the request and resolves once they exist.
 */
export interface MediaExtractor {
  extractInfo(url: string): Promise<VideoInfo>;
  download(url: string, request: ExtractorDownloadRequest): Promise<void>;
}

export interface YtDlpSettings {
  binary: string;
  ffmpegPath: string;
  geoBypassCountry: string;
}

function toFormat(raw: RawFormat): MediaFormat {
  return {
    formatId: raw.format_id,
    ext: raw.ext,
    vcodec: raw.vcodec,
    acodec: raw.acodec,
    resolution: raw.resolution,
    formatNote: raw.format_note,
    language: raw.language,
    abr: raw.abr,
    protocol: raw.protocol,
    height: raw.height,
  };
}

function toSubtitleMap(raw: RawSubtitleMap): SubtitleMap {
  const map: Record<string, readonly SubtitleDescriptor[]> = {};
  for (const [code, descriptors] of Object.entries(raw)) {
    map[code] = Object.freeze(descriptors.map((d) => ({ ext: d.ext, url: d.url, name: d.name })));
  }
  return Object.freeze(map);
}

/** Validates a `--dump-single-json` document and converts it into a frozen VideoInfo. */
export function parseVideoInfo(json: unknown): VideoInfo {
  const parsed = rawInfoSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExtractionError(ERROR_CODES.ERR_INVALID_RESPONSE, 'yt-dlp returned an unexpected metadata shape', {
      issues: parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
  }

  const raw = parsed.data;
  return Object.freeze({
    id: raw.id,
    title: raw.title,
    formats: Object.freeze(raw.formats.map(toFormat)),
    subtitles: toSubtitleMap(raw.subtitles),
    automaticCaptions: toSubtitleMap(raw.automatic_captions),
    duration: raw.duration === undefined ? undefined : Math.round(raw.duration),
    thumbnailUrl: raw.thumbnail,
    description: raw.description,
  });
}

export function mapYtDlpError(stderr: string): ErrorCode {
  const s = (stderr || '').toLowerCase();
  if (s.includes('no space left')) return ERROR_CODES.ERR_DISK_FULL;
  if (s.includes('permission denied')) return ERROR_CODES.ERR_PERMISSION_DENIED;
  if (s.includes('private video') || s.includes('sign in') || s.includes('login') || s.includes('age-restricted') || s.includes('confirm your age') || s.includes('members-only')) return ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED;
  if (s.includes('available in your country') || s.includes('geo restrict') || s.includes('geo-restrict')) return ERROR_CODES.ERR_GEO_BLOCKED;
  if (s.includes('unsupported url') || s.includes('video unavailable') || s.includes('incomplete youtube id') || s.includes('is not a valid url') || s.includes('no video formats')) return ERROR_CODES.ERR_UNSUPPORTED_URL;
  if (s.includes('http error') || s.includes('unable to download') || s.includes('timed out') || s.includes('connection')) return ERROR_CODES.ERR_FETCH_FAILED;
  return ERROR_CODES.ERR_INTERNAL;
}

function baseArgs(settings: YtDlpSettings): string[] {
  const args = ['--ignore-config', '--no-playlist', '--no-warnings'];
  if (settings.ffmpegPath && settings.ffmpegPath !== 'ffmpeg') {
    args.push('--ffmpeg-location', settings.ffmpegPath);
  }
  if (settings.geoBypassCountry) {
    args.push('--geo-bypass-country', settings.geoBypassCountry);
  }
  return args;
}

export function buildInfoArgs(url: string, settings: YtDlpSettings): string[] {
  return [...baseArgs(settings), '--dump-single-json', '--skip-download', url];
}

export function buildDownloadArgs(url: string, request: ExtractorDownloadRequest, settings: YtDlpSettings): string[] {
  const args = baseArgs(settings);

  if (request.format) args.push('-f', request.format);
  if (request.extractAudio) {
    args.push('-x', '--audio-format', request.extractAudio.codec, '--audio-quality', `${request.extractAudio.quality}K`);
  }
  if (request.mergeOutputFormat) args.push('--merge-output-format', request.mergeOutputFormat);
  if (request.embedThumbnail) args.push('--embed-thumbnail');
  if (request.embedMetadata) args.push('--embed-metadata');
  if (request.embedChapters) args.push('--embed-chapters');
  if (request.subtitles && request.subtitles.languages.length > 0) {
    args.push(
      '--write-subs',
      '--write-auto-subs',
      '--sub-langs',
      request.subtitles.languages.join(','),
      '--sub-format',
      request.subtitles.format
    );
  }
  if (request.skipDownload) args.push('--skip-download');

  args.push('-o', request.outputTemplate, url);
  return args;
}

export class YtDlpExtractor implements MediaExtractor {
  constructor(
    private readonly settings: YtDlpSettings,
    private readonly runner: CommandRunner = run
  ) {}

  async extractInfo(url: string): Promise<VideoInfo> {
    logger.info({ url }, 'Fetching YouTube metadata');

    const args = buildInfoArgs(url, this.settings);
    let result: ExecResult;
    try {
      result = await this.runner(this.settings.binary, args);
    } catch (error) {
      throw this.wrap(error, url, (code, message, details) => new ExtractionError(code, message, details));
    }

    if (result.code !== 0) {
      logger.error({ url, code: result.code, stderrPreview: result.stderr.slice(-800) }, 'yt-dlp metadata attempt failed');
      throw new ExtractionError(mapYtDlpError(result.stderr), 'Failed to resolve metadata', {
        url,
        stderr: result.stderr,
        code: result.code,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout || '{}');
    } catch (error) {
      logger.error({ url, error: String(error) }, 'Failed to parse yt-dlp metadata JSON');
      throw new ExtractionError(ERROR_CODES.ERR_INVALID_RESPONSE, 'Failed to parse metadata response', {
        url,
        originalError: String(error),
      });
    }
    return parseVideoInfo(json);
  }

  async download(url: string, request: ExtractorDownloadRequest): Promise<void> {
    const args = buildDownloadArgs(url, request, this.settings);
    logger.info({ url, format: request.format, outputTemplate: request.outputTemplate }, 'Executing yt-dlp download');

    let result: ExecResult;
    try {
      result = await this.runner(this.settings.binary, args);
    } catch (error) {
      throw this.wrap(error, url, (code, message, details) => new DownloadError(code, message, details));
    }

    if (result.code !== 0) {
      logger.error({ url, code: result.code, stderrPreview: result.stderr.slice(-1200) }, 'yt-dlp download failed');
      throw new DownloadError(mapYtDlpError(result.stderr), 'yt-dlp download failed', {
        url,
        stderr: result.stderr,
        code: result.code,
      });
    }
  }

  private wrap(
    error: unknown,
    url: string,
    make: (code: ErrorCode, message: string, details: unknown) => AppError
  ): AppError {
    if (error instanceof AppError) {
      return make(error.code, error.message, { url, ...toRecord(error.details) });
    }
    logger.error({ url, error: error instanceof Error ? error.message : String(error) }, 'Unexpected error invoking yt-dlp');
    return make(ERROR_CODES.ERR_INTERNAL, 'Unexpected error invoking yt-dlp', { url, originalError: String(error) });
  }
}

function toRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? { ...value } : {};
}
