import type { StateChange } from '../core/request';
import { VIDEO_QUALITIES, type AudioTrack, type Subtitle, type VideoQuality } from '../types';

export const color = {
  red: (text: string) => `\x1b[1;31m${text}\x1b[0m`,
  green: (text: string) => `\x1b[1;32m${text}\x1b[0m`,
  yellow: (text: string) => `\x1b[1;33m${text}\x1b[0m`,
  blue: (text: string) => `\x1b[1;34m${text}\x1b[0m`,
  cyan: (text: string) => `\x1b[1;36m${text}\x1b[0m`,
};

export function isVideoQuality(value: string): value is VideoQuality {
  return (VIDEO_QUALITIES as readonly string[]).includes(value);
}

/** Splits `"en, de,,fr"` into `['en', 'de', 'fr']`. */
export function parseLanguageList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code.length > 0);
}

export function formatDuration(totalSeconds: number | undefined): string {
  if (totalSeconds === undefined || totalSeconds < 0) return 'unknown';
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const mm = hours > 0 ? String(minutes).padStart(2, '0') : String(minutes);
  const ss = String(seconds).padStart(2, '0');
  return hours > 0 ? `${hours}:${mm}:${ss}` : `${mm}:${ss}`;
}

/**
 * Collapses the per-format subtitle entries to one row per language and
 * namespace, keeping the first entry seen. A language offered both as a
 * human-authored and an auto-generated track keeps both rows.
 */
export function uniqueSubtitleLanguages(subtitles: Subtitle[]): Subtitle[] {
  const seen = new Set<string>();
  return subtitles.filter((subtitle) => {
    const key = `${subtitle.languageCode}|${subtitle.isAutoGenerated ? 'auto' : 'manual'}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * One row per language, as yt-dlp resolves it: with both `--write-subs` and
 * `--write-auto-subs` a human-authored track wins over an auto-generated one.
 */
export function subtitleLanguageChoices(subtitles: Subtitle[]): Subtitle[] {
  const byCode = new Map<string, Subtitle>();
  for (const subtitle of subtitles) {
    const current = byCode.get(subtitle.languageCode);
    if (!current || (current.isAutoGenerated && !subtitle.isAutoGenerated)) {
      byCode.set(subtitle.languageCode, subtitle);
    }
  }
  return Array.from(byCode.values());
}

export function formatAudioTrackTable(tracks: AudioTrack[]): string {
  const rule = '-'.repeat(60);
  const header = `${'#'.padEnd(4)}${'Language'.padEnd(16)}${'Format ID'.padEnd(12)}${'Quality'.padEnd(10)}Codec`;
  const rows = tracks.map((track, index) => {
    const bitrate = track.bitrate ? `${track.bitrate}k` : 'N/A';
    return `${String(index + 1).padEnd(4)}${track.language.padEnd(16)}${track.formatId.padEnd(12)}${bitrate.padEnd(10)}${track.codec ?? 'unknown'}`;
  });
  return [rule, header, rule, ...rows, rule].join('\n');
}

export function formatSubtitleTable(subtitles: Subtitle[]): string {
  const rule = '-'.repeat(60);
  const header = `${'#'.padEnd(4)}${'Language'.padEnd(24)}${'Code'.padEnd(10)}Auto-generated`;
  const rows = uniqueSubtitleLanguages(subtitles).map((subtitle, index) => {
    const auto = subtitle.isAutoGenerated ? 'yes' : 'no';
    return `${String(index + 1).padEnd(4)}${subtitle.language.padEnd(24)}${subtitle.languageCode.padEnd(10)}${auto}`;
  });
  return [rule, header, rule, ...rows, rule].join('\n');
}

const STATE_LABELS: Record<StateChange['to'], string> = {
  pending: 'Queued',
  metadataFetched: 'Metadata fetched',
  downloading: 'Downloading...',
  processing: 'Post-processing...',
  complete: 'Done',
  failed: 'Failed',
};

export function describeTransition(change: StateChange): string {
  return STATE_LABELS[change.to];
}
