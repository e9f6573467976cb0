import { describe, expect, it } from 'vitest';
import { ERROR_CODES, ExtractionError } from '../core/errors';
import { isYouTubeUrl, resolveVideoRef } from './detect';

describe('resolveVideoRef', () => {
  it.each([
    ['dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['  dQw4w9WgXcQ  ', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=42s', 'dQw4w9WgXcQ'],
    ['https://m.youtube.com/watch?feature=share&v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://youtu.be/dQw4w9WgXcQ?si=tracking', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/shorts/aBcDeFgHiJk', 'aBcDeFgHiJk'],
    ['https://www.youtube-nocookie.com/embed/aBcDeFgHiJk', 'aBcDeFgHiJk'],
    ['https://music.youtube.com/watch?v=aBcDeFgHiJk', 'aBcDeFgHiJk'],
    ['abc', 'abc'],
    ['youtube.com/watch?v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['www.youtube.com/shorts/aBcDeFgHiJk', 'aBcDeFgHiJk'],
    ['youtu.be/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
  ])('resolves %s', (input, id) => {
    expect(resolveVideoRef(input)).toEqual({ id, url: `https://www.youtube.com/watch?v=${id}` });
  });

  it.each([
    'https://vimeo.com/123456',
    'https://www.youtube.com/watch',
    'https://www.youtube.com/@channel',
    'not a url at all',
    'vimeo.com/123456',
    'ftp://www.youtube.com/x/dQw4w9WgXcQ',
    '',
  ])('rejects %j', (input) => {
    expect(() => resolveVideoRef(input)).toThrow(ExtractionError);
  });

  it('tags rejections as unsupported urls', () => {
    try {
      resolveVideoRef('https://vimeo.com/1');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ERROR_CODES.ERR_UNSUPPORTED_URL });
    }
  });
});

describe('isYouTubeUrl', () => {
  it('accepts known hosts only', () => {
    expect(isYouTubeUrl('https://youtu.be/x')).toBe(true);
    expect(isYouTubeUrl('https://www.youtube.com/watch?v=x')).toBe(true);
    expect(isYouTubeUrl('https://youtube.com.evil.test/watch?v=x')).toBe(false);
    expect(isYouTubeUrl('dQw4w9WgXcQ')).toBe(false);
  });
});
