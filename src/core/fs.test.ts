import fs from 'fs-extra';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ERROR_CODES, FilesystemError } from './errors';
import { ensureFileExists, ensureOutputDir, mapFsError, removeFile, sanitizeFilename, withSuffix } from './fs';
import { makeTempDir } from '../testing/fakes';

function errno(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe('sanitizeFilename', () => {
  it('replaces characters that are unsafe in file names', () => {
    expect(sanitizeFilename('AC/DC: Live @ "Donington" | 1991?')).toBe('AC_DC_ Live _ _Donington_ _ 1991_');
  });

  it('keeps letters from any script and the allowed punctuation', () => {
    expect(sanitizeFilename('Café – Ünïcode 日本語 v1.2_final-cut')).toBe('Café _ Ünïcode 日本語 v1.2_final-cut');
  });

  it('is idempotent', () => {
    const titles = ['AC/DC: Live', '  padded  ', '%(title)s', '***', '', 'x'.repeat(400), 'Ok name.mp4', '..', ' . ', '日本語'.repeat(40)];
    for (const title of titles) {
      const once = sanitizeFilename(title);
      expect(sanitizeFilename(once)).toBe(once);
    }
  });

  it('falls back for blank titles and caps the length', () => {
    expect(sanitizeFilename('   ')).toBe('untitled');
    expect(sanitizeFilename('a'.repeat(400))).toHaveLength(200);
  });

  it('caps the UTF-8 length on a code-point boundary', () => {
    const name = sanitizeFilename('語'.repeat(100));

    expect(name).toBe('語'.repeat(66));
    expect(Buffer.byteLength(`${name}_with_subs.mp4`)).toBeLessThanOrEqual(255);
    expect(Buffer.byteLength(`${name}.ja.vtt`)).toBeLessThanOrEqual(255);
  });

  it('never yields a name that points at the current or parent directory', () => {
    expect(sanitizeFilename('.')).toBe('_');
    expect(sanitizeFilename('..')).toBe('__');
    expect(sanitizeFilename('  ...  ')).toBe('___');
    expect(sanitizeFilename('..hidden')).toBe('..hidden');
  });

  it('neutralizes yt-dlp template fields', () => {
    expect(sanitizeFilename('100% %(id)s')).toBe('100_ __id_s');
  });
});

describe('mapFsError', () => {
  it('maps errno codes to error codes', () => {
    expect(mapFsError(errno('EACCES'))).toBe(ERROR_CODES.ERR_PERMISSION_DENIED);
    expect(mapFsError(errno('ENOSPC'))).toBe(ERROR_CODES.ERR_DISK_FULL);
    expect(mapFsError(errno('ENOTDIR'))).toBe(ERROR_CODES.ERR_INVALID_PATH);
    expect(mapFsError(errno('ENOENT'))).toBe(ERROR_CODES.ERR_FILE_NOT_FOUND);
    expect(mapFsError(new Error('plain'))).toBe(ERROR_CODES.ERR_INTERNAL);
  });
});

describe('filesystem helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('creates a missing output directory and returns its absolute path', async () => {
    const target = path.join(dir, 'nested', 'out');
    await expect(ensureOutputDir(target)).resolves.toBe(path.resolve(target));
    expect(await fs.pathExists(target)).toBe(true);
  });

  it('rejects an output path that is a file', async () => {
    const file = path.join(dir, 'occupied');
    await fs.writeFile(file, 'x');

    const error = await ensureOutputDir(file).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FilesystemError);
    expect(error).toMatchObject({ code: ERROR_CODES.ERR_INVALID_PATH });
  });

  it('reports a missing file', async () => {
    await expect(ensureFileExists(path.join(dir, 'nope.mp4'))).rejects.toMatchObject({
      name: 'FilesystemError',
      code: ERROR_CODES.ERR_FILE_NOT_FOUND,
    });
  });

  it('fails to remove a file that is already gone', async () => {
    await expect(removeFile(path.join(dir, 'gone.tmp'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('builds sibling paths with a suffix and extension', () => {
    expect(withSuffix('/media/My Clip.mp4', '_with_subs', 'mkv')).toBe(path.join('/media', 'My Clip_with_subs.mkv'));
  });
});
