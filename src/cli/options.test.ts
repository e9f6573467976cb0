import { describe, expect, it } from 'vitest';
import { toDownloadOptions } from './index';
import { toCliOptions, type CommandFlags } from './options';

const flags = (overrides: Partial<CommandFlags> = {}): CommandFlags => ({
  output: './downloads',
  quality: 'highest',
  thumbnail: true,
  metadata: true,
  chapters: true,
  ...overrides,
});

describe('toCliOptions', () => {
  it('defaults to a video request with every embed enabled', () => {
    expect(toCliOptions(' https://youtu.be/abc ', flags())).toEqual({
      url: 'https://youtu.be/abc',
      kind: 'video',
      outputDirectory: './downloads',
      quality: 'highest',
      subtitleIds: [],
      embedSubtitles: false,
      keepOriginal: false,
      includeMetadata: true,
      includeThumbnail: true,
      includeChapters: true,
    });
  });

  it('maps audio, track, subtitle and negated flags', () => {
    const options = toCliOptions(
      'abc',
      flags({ audio: true, audioFormat: '251', subs: 'en,de', embedSubs: true, keepOriginal: true, thumbnail: false, chapters: false })
    );

    expect(options).toMatchObject({
      kind: 'audio',
      audioFormatId: '251',
      subtitleIds: ['en', 'de'],
      embedSubtitles: true,
      keepOriginal: true,
      includeThumbnail: false,
      includeChapters: false,
      includeMetadata: true,
    });
  });

  it('leaves the url unset for interactive mode', () => {
    expect(toCliOptions(undefined, flags()).url).toBeUndefined();
    expect(toCliOptions('   ', flags()).url).toBeUndefined();
  });

  it('falls back to the highest quality for an unknown label', () => {
    expect(toCliOptions('abc', flags({ quality: '8k' })).quality).toBe('highest');
  });
});

describe('toDownloadOptions', () => {
  it('carries the download-relevant fields only', () => {
    const options = toCliOptions('abc', flags({ quality: '720p', subs: 'en', audioFormat: '140' }));

    expect(toDownloadOptions(options)).toEqual({
      outputDirectory: './downloads',
      includeMetadata: true,
      includeThumbnail: true,
      includeChapters: true,
      audioFormatId: '140',
      subtitleIds: ['en'],
      quality: '720p',
    });
  });
});
