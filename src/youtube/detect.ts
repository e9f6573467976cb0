import { ERROR_CODES, ExtractionError } from '../core/errors';

const YOUTUBE_HOSTS = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtube-nocookie.com',
  'www.youtube-nocookie.com',
]);

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const PATH_PREFIXES = ['shorts', 'embed', 'live', 'v'];

export interface VideoRef {
  id: string;
  url: string;
}

export function isYouTubeUrl(url: string): boolean {
  try {
    const h = new URL(url).hostname.toLowerCase();
    return YOUTUBE_HOSTS.has(h) || h === 'youtu.be';
  } catch {
    return false;
  }
}

export function watchUrl(id: string): string {
  return `https://www.youtube.com/watch?v=${id}`;
}

function idFromUrl(url: URL): string | null {
  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter(Boolean);

  if (host === 'youtu.be') {
    return segments[0] ?? null;
  }
  if (!YOUTUBE_HOSTS.has(host)) {
    return null;
  }
  if (segments[0] === 'watch') {
    return url.searchParams.get('v');
  }
  if (segments.length >= 2 && PATH_PREFIXES.includes(segments[0] ?? '')) {
    return segments[1] ?? null;
  }
  return null;
}

function parseUrl(candidate: string): string | null {
  try {
    return idFromUrl(new URL(candidate));
  } catch {
    return null;
  }
}

/**
 * Resolves a watch/short/embed URL (scheme optional) or a bare video id to the
 * canonical id and watch URL. Anything else is rejected before yt-dlp is ever invoked.
 */
export function resolveVideoRef(input: string): VideoRef {
  const trimmed = input.trim();

  if (ID_PATTERN.test(trimmed)) {
    return { id: trimmed, url: watchUrl(trimmed) };
  }

  const id = parseUrl(trimmed) ?? (trimmed.includes('://') ? null : parseUrl(`https://${trimmed}`));
  if (!id || !ID_PATTERN.test(id)) {
    throw new ExtractionError(ERROR_CODES.ERR_UNSUPPORTED_URL, `Not a YouTube video URL or id: ${input}`, { input });
  }
  return { id, url: watchUrl(id) };
}
