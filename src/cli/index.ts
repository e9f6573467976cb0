import enquirer from 'enquirer';
import * as path from 'path';
import type { MediaRequest, RequestOutcome, TubeFetch } from '../app';
import { AppError, toUserMessage } from '../core/errors';
import { logger } from '../core/logger';
import type { StateChange } from '../core/request';
import { VIDEO_QUALITIES, type DownloadOptions, type MediaKind, type VideoQuality } from '../types';
import {
  color,
  describeTransition,
  formatAudioTrackTable,
  formatDuration,
  formatSubtitleTable,
  subtitleLanguageChoices,
} from './format';

export interface CLIOptions {
  url?: string;
  kind: MediaKind;
  outputDirectory: string;
  quality: VideoQuality;
  audioFormatId?: string;
  subtitleIds: string[];
  embedSubtitles: boolean;
  keepOriginal: boolean;
  includeMetadata: boolean;
  includeThumbnail: boolean;
  includeChapters: boolean;
}

const DEFAULT_TRACK = '__default__';

export class CLI {
  constructor(private readonly app: TubeFetch) {}

  /** One-shot mode: every choice comes from flags. Returns false when the request failed. */
  async runOnce(options: CLIOptions & { url: string }): Promise<boolean> {
    const request: MediaRequest = {
      kind: options.kind,
      input: options.url,
      options: toDownloadOptions(options),
      embedSubtitles: options.embedSubtitles,
      keepOriginal: options.keepOriginal,
    };
    return this.execute(request);
  }

  async listStreams(url: string): Promise<boolean> {
    try {
      const info = await this.app.getVideoInfo(url);
      console.log(color.blue(`${info.title}`) + ` [${info.id}] (${formatDuration(info.duration)})`);

      const tracks = await this.app.getAudioTracks(url);
      console.log('\nAvailable Audio Tracks:');
      console.log(tracks.length > 0 ? formatAudioTrackTable(tracks) : color.yellow('No separate audio tracks found.'));

      const subtitles = await this.app.getAvailableSubtitles(url);
      console.log('\nAvailable Subtitles:');
      console.log(subtitles.length > 0 ? formatSubtitleTable(subtitles) : color.yellow('No subtitles available.'));
      return true;
    } catch (error) {
      this.report(error);
      return false;
    }
  }

  /** Interactive session: one request at a time until the user stops. A failed request never ends the session. */
  async runInteractive(defaults: CLIOptions): Promise<void> {
    console.log(color.blue('tubefetch - YouTube media downloader'));
    console.log('====================================\n');

    let another = true;
    while (another) {
      const request = await this.promptRequest(defaults);
      if (request) {
        await this.execute(request);
      }

      const { again } = await enquirer.prompt<{ again: boolean }>({
        type: 'confirm',
        name: 'again',
        message: 'Another download?',
        initial: false,
      });
      another = again;
    }
  }

  private async promptRequest(defaults: CLIOptions): Promise<MediaRequest | null> {
    const { kind } = await enquirer.prompt<{ kind: MediaKind }>({
      type: 'select',
      name: 'kind',
      message: 'Content type:',
      choices: [
        { name: 'audio', message: 'Audio' },
        { name: 'video', message: 'Video' },
      ],
    });

    const { url } = await enquirer.prompt<{ url: string }>({
      type: 'input',
      name: 'url',
      message: 'YouTube URL or video id:',
      validate: (value: string) => value.trim().length > 0 || 'Please enter a URL',
    });

    const { outputDirectory } = await enquirer.prompt<{ outputDirectory: string }>({
      type: 'input',
      name: 'outputDirectory',
      message: 'Download directory:',
      initial: defaults.outputDirectory,
      validate: (value: string) => value.trim().length > 0 || 'Please enter a directory path',
    });

    console.log(color.cyan('Fetching available audio tracks...'));
    let audioFormatId: string | undefined;
    let subtitleIds: string[] = [];
    try {
      audioFormatId = await this.selectAudioTrack(url);
      subtitleIds = await this.selectSubtitles(url);
    } catch (error) {
      this.report(error);
      return null;
    }

    const options: CLIOptions = {
      ...defaults,
      url,
      kind,
      outputDirectory: outputDirectory.trim(),
      subtitleIds,
    };
    if (audioFormatId) options.audioFormatId = audioFormatId;

    if (kind === 'video') {
      const { quality } = await enquirer.prompt<{ quality: VideoQuality }>({
        type: 'select',
        name: 'quality',
        message: 'Video quality:',
        choices: VIDEO_QUALITIES.map((value) => ({ name: value, message: value === 'highest' ? 'Highest quality' : value })),
      });
      options.quality = quality;

      const { extras } = await enquirer.prompt<{ extras: string[] }>({
        type: 'multiselect',
        name: 'extras',
        message: 'Include metadata:',
        choices: [
          { name: 'thumbnail', message: 'Thumbnail' },
          { name: 'chapters', message: 'Chapters' },
          { name: 'metadata', message: 'Title/description tags' },
        ],
      });
      options.includeThumbnail = extras.includes('thumbnail');
      options.includeChapters = extras.includes('chapters');
      options.includeMetadata = extras.includes('metadata');

      if (subtitleIds.length > 0) {
        const { embed } = await enquirer.prompt<{ embed: boolean }>({
          type: 'confirm',
          name: 'embed',
          message: 'Embed subtitles into the video file?',
          initial: true,
        });
        options.embedSubtitles = embed;
      }
    }

    return {
      kind,
      input: url,
      options: toDownloadOptions(options),
      embedSubtitles: options.embedSubtitles,
      keepOriginal: options.keepOriginal,
    };
  }

  private async selectAudioTrack(url: string): Promise<string | undefined> {
    const tracks = await this.app.getAudioTracks(url);
    if (tracks.length <= 1) {
      console.log(color.yellow('No separate audio tracks found. Using default audio.'));
      return undefined;
    }

    console.log(formatAudioTrackTable(tracks));
    const { track } = await enquirer.prompt<{ track: string }>({
      type: 'select',
      name: 'track',
      message: 'Select audio track:',
      choices: [
        { name: DEFAULT_TRACK, message: 'Default' },
        ...tracks.map((t) => ({ name: t.formatId, message: t.description })),
      ],
    });
    return track === DEFAULT_TRACK ? undefined : track;
  }

  private async selectSubtitles(url: string): Promise<string[]> {
    console.log(color.cyan('Checking available subtitles...'));
    const subtitles = subtitleLanguageChoices(await this.app.getAvailableSubtitles(url));
    if (subtitles.length === 0) {
      console.log(color.yellow('No subtitles available for this video.'));
      return [];
    }

    const { languages } = await enquirer.prompt<{ languages: string[] }>({
      type: 'multiselect',
      name: 'languages',
      message: 'Subtitles to download (space to select, enter to skip):',
      choices: subtitles.map((s) => ({
        name: s.languageCode,
        message: `${s.language} (${s.languageCode})${s.isAutoGenerated ? ' [auto]' : ''}`,
      })),
    });
    return Array.from(new Set(languages));
  }

  private async execute(request: MediaRequest): Promise<boolean> {
    const onTransition = (change: StateChange) => {
      if (change.to !== 'failed') console.log(color.cyan(describeTransition(change)));
    };

    try {
      const outcome = await this.app.runRequest(request, onTransition);
      this.printOutcome(outcome);
      return true;
    } catch (error) {
      this.report(error);
      return false;
    }
  }

  private printOutcome(outcome: RequestOutcome): void {
    console.log(color.green(`✓ Saved: ${outcome.outputPath}`));
    outcome.subtitlePaths.forEach((subtitlePath) => {
      console.log(color.green(`✓ Subtitle: ${path.basename(subtitlePath)}`));
    });
  }

  private report(error: unknown): void {
    if (error instanceof AppError) {
      console.error(color.red(toUserMessage(error)));
      logger.debug({ code: error.code, details: error.details }, error.message);
      return;
    }
    console.error(color.red('Error:'), error instanceof Error ? error.message : String(error));
  }
}

export function toDownloadOptions(options: CLIOptions): DownloadOptions {
  return {
    outputDirectory: options.outputDirectory,
    includeMetadata: options.includeMetadata,
    includeThumbnail: options.includeThumbnail,
    includeChapters: options.includeChapters,
    audioFormatId: options.audioFormatId,
    subtitleIds: options.subtitleIds,
    quality: options.quality,
  };
}
