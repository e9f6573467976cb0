import type { CLIOptions } from './index';
import { isVideoQuality, parseLanguageList } from './format';

/** Parsed commander flags; `--no-x` flags arrive as `x: boolean`. */
export interface CommandFlags {
  audio?: boolean;
  output: string;
  quality: string;
  audioFormat?: string;
  subs?: string;
  embedSubs?: boolean;
  keepOriginal?: boolean;
  thumbnail: boolean;
  metadata: boolean;
  chapters: boolean;
  list?: boolean;
}

export function toCliOptions(url: string | undefined, flags: CommandFlags): CLIOptions {
  const options: CLIOptions = {
    kind: flags.audio ? 'audio' : 'video',
    outputDirectory: flags.output,
    quality: isVideoQuality(flags.quality) ? flags.quality : 'highest',
    subtitleIds: parseLanguageList(flags.subs),
    embedSubtitles: flags.embedSubs ?? false,
    keepOriginal: flags.keepOriginal ?? false,
    includeMetadata: flags.metadata,
    includeThumbnail: flags.thumbnail,
    includeChapters: flags.chapters,
  };
  const trimmedUrl = url?.trim();
  if (trimmedUrl) options.url = trimmedUrl;
  if (flags.audioFormat) options.audioFormatId = flags.audioFormat;
  return options;
}
