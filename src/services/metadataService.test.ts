import { beforeEach, describe, expect, it } from 'vitest';
import { TtlCache } from '../core/cache';
import { ERROR_CODES, ExtractionError } from '../core/errors';
import { FakeExtractor, videoInfo } from '../testing/fakes';
import type { VideoInfo } from '../types';
import { isAudioOnly, MetadataService, toAudioTrack } from './metadataService';

describe('MetadataService', () => {
  let nowMs: number;
  let extractor: FakeExtractor;
  let cache: TtlCache<VideoInfo>;
  let service: MetadataService;

  beforeEach(() => {
    nowMs = 0;
    extractor = new FakeExtractor();
    cache = new TtlCache<VideoInfo>({ ttlSeconds: 60, now: () => nowMs });
    service = new MetadataService(extractor, cache);
  });

  describe('getVideoInfo', () => {
    it('serves repeat lookups inside the ttl from cache and refetches after it', async () => {
      const first = await service.getVideoInfo('abc');

      nowMs = 30_000;
      const second = await service.getVideoInfo('abc');
      expect(second).toBe(first);
      expect(extractor.infoCalls).toHaveLength(1);

      nowMs = 61_000;
      const third = await service.getVideoInfo('abc');
      expect(third).not.toBe(first);
      expect(third).toEqual(first);
      expect(extractor.infoCalls).toHaveLength(2);

      nowMs = 90_000;
      expect(await service.getVideoInfo('abc')).toBe(third);
      expect(extractor.infoCalls).toHaveLength(2);
    });

    it('shares one cache entry between a URL and its bare id', async () => {
      await service.getVideoInfo('https://youtu.be/abc');
      await service.getVideoInfo('abc');

      expect(extractor.infoCalls).toEqual(['https://www.youtube.com/watch?v=abc']);
    });

    it('propagates extraction failures and writes no cache entry', async () => {
      extractor.infoError = new ExtractionError(ERROR_CODES.ERR_UNSUPPORTED_URL, 'Video unavailable');

      await expect(service.getVideoInfo('abc')).rejects.toBeInstanceOf(ExtractionError);
      expect(cache.size).toBe(0);

      extractor.infoError = null;
      await service.getVideoInfo('abc');
      expect(extractor.infoCalls).toHaveLength(2);
    });

    it('rejects unsupported input without calling the extractor', async () => {
      await expect(service.getVideoInfo('https://vimeo.com/1')).rejects.toMatchObject({
        name: 'ExtractionError',
        code: ERROR_CODES.ERR_UNSUPPORTED_URL,
      });
      expect(extractor.infoCalls).toHaveLength(0);
    });
  });

  describe('getAudioTracks', () => {
    it('returns only the audio-only entry when one video-only and one audio-only format exist', async () => {
      extractor.infoFactory = () =>
        videoInfo({
          formats: [
            { format_id: '137', ext: 'mp4', vcodec: 'avc1.640028', acodec: 'none', height: 1080 },
            { format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2', abr: 127.6, protocol: 'https' },
          ],
        });

      expect(await service.getAudioTracks('abc')).toEqual([
        {
          language: 'original',
          formatId: '140',
          description: 'original (m4a, 128k)',
          codec: 'mp4a.40.2',
          bitrate: 128,
        },
      ]);
    });

    it('never returns formats without audio and keeps format order', async () => {
      extractor.infoFactory = () =>
        videoInfo({
          formats: [
            { format_id: 'sb0', ext: 'mhtml', vcodec: 'none', acodec: 'none', resolution: 'audio only' },
            { format_id: '18', ext: 'mp4', vcodec: 'avc1.42001E', acodec: 'mp4a.40.2' },
            { format_id: '251-1', ext: 'webm', vcodec: 'none', acodec: 'opus', abr: 130, language: 'de', format_note: 'German (dubbed), medium' },
            { format_id: '233', ext: 'mp4', resolution: 'audio only', protocol: 'm3u8_native', language: 'en' },
          ],
        });

      const tracks = await service.getAudioTracks('abc');

      expect(tracks.map((t) => t.formatId)).toEqual(['251-1', '233']);
      expect(tracks[0]?.description).toBe('de (webm, 130k) [dubbed]');
      expect(tracks[1]).toEqual({
        language: 'en',
        formatId: '233',
        description: 'en (mp4, m3u8_native)',
        codec: undefined,
        bitrate: undefined,
      });
    });
  });

  describe('getAvailableSubtitles', () => {
    it('returns one entry per raw descriptor with the auto flag taken from the namespace', async () => {
      extractor.infoFactory = () =>
        videoInfo({
          subtitles: {
            en: [
              { ext: 'vtt', name: 'English' },
              { ext: 'json3', name: 'English' },
            ],
            de: [{ ext: 'vtt' }],
          },
          automatic_captions: {
            en: [{ ext: 'vtt', name: 'English (auto-generated)' }],
          },
        });

      expect(await service.getAvailableSubtitles('abc')).toEqual([
        { language: 'English', languageCode: 'en', formatId: 'vtt', isAutoGenerated: false },
        { language: 'English', languageCode: 'en', formatId: 'json3', isAutoGenerated: false },
        { language: 'de', languageCode: 'de', formatId: 'vtt', isAutoGenerated: false },
        { language: 'English (auto-generated)', languageCode: 'en', formatId: 'vtt', isAutoGenerated: true },
      ]);
    });

    it('returns an empty list when the video has no subtitles', async () => {
      expect(await service.getAvailableSubtitles('abc')).toEqual([]);
    });
  });
});

describe('audio track helpers', () => {
  it('treats a missing acodec on an audio-only format as audio', () => {
    expect(isAudioOnly({ formatId: 'x', ext: 'm4a', vcodec: 'none' })).toBe(true);
    expect(isAudioOnly({ formatId: 'x', ext: 'mp4' })).toBe(false);
  });

  it('omits the protocol for plain http downloads', () => {
    expect(toAudioTrack({ formatId: '1', ext: 'webm', acodec: 'opus', abr: 50, protocol: 'http', language: 'fr' }).description).toBe(
      'fr (webm, 50k)'
    );
  });
});
