import fs from 'fs-extra';
import * as path from 'path';
import { logger } from './logger';
import { ERROR_CODES, FilesystemError, type ErrorCode } from './errors';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function mapFsError(error: unknown): ErrorCode {
  switch (errnoCode(error)) {
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return ERROR_CODES.ERR_PERMISSION_DENIED;
    case 'ENOSPC':
    case 'EDQUOT':
      return ERROR_CODES.ERR_DISK_FULL;
    case 'ENOENT':
      return ERROR_CODES.ERR_FILE_NOT_FOUND;
    case 'ENOTDIR':
    case 'EEXIST':
    case 'EISDIR':
    case 'ENAMETOOLONG':
    case 'EINVAL':
      return ERROR_CODES.ERR_INVALID_PATH;
    default:
      return ERROR_CODES.ERR_INTERNAL;
  }
}

export async function ensureOutputDir(dir: string): Promise<string> {
  const resolved = path.resolve(dir);
  try {
    await fs.ensureDir(resolved);
    await fs.access(resolved, fs.constants.W_OK);
    logger.debug({ dir: resolved }, 'Output directory ensured');
    return resolved;
  } catch (error) {
    const code = mapFsError(error);
    logger.error({ dir: resolved, code, error: error instanceof Error ? error.message : String(error) }, 'Output directory is not usable');
    throw new FilesystemError(code, `Output directory ${resolved} is not usable`, { dir: resolved, errno: errnoCode(error) });
  }
}

export async function ensureFileExists(filePath: string): Promise<void> {
  if (!(await fs.pathExists(filePath))) {
    throw new FilesystemError(ERROR_CODES.ERR_FILE_NOT_FOUND, `File not found: ${filePath}`, { filePath });
  }
}

/** Removes one file. Unlike `fs.remove`, a path that is already gone is reported as a failure. */
export async function removeFile(filePath: string): Promise<void> {
  await fs.unlink(filePath);
  logger.debug({ path: filePath }, 'File removed');
}

export function withSuffix(filePath: string, suffix: string, ext: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${suffix}.${ext}`);
}

const UNSAFE_FILENAME_CHARS = /[^\p{L}\p{N} ._-]/gu;
const DOTS_ONLY = /^\.+$/;
// Leaves room under the usual 255-byte name limit for `.lang.vtt` and `_with_subs.mp4` suffixes.
const MAX_FILENAME_BYTES = 200;

function truncateUtf8(text: string, maxBytes: number): string {
  let bytes = 0;
  let result = '';
  for (const char of text) {
    bytes += Buffer.byteLength(char, 'utf8');
    if (bytes > maxBytes) break;
    result += char;
  }
  return result;
}

/**
 * Maps a video title to a filesystem-safe base name. Every character outside
 * letters, digits, space, `.`, `-` and `_` becomes `_`, the UTF-8 length is
 * capped on a code-point boundary, and names made only of dots become
 * underscores. Idempotent.
 */
export function sanitizeFilename(title: string): string {
  const replaced = title.replace(UNSAFE_FILENAME_CHARS, '_');
  const trimmed = truncateUtf8(replaced, MAX_FILENAME_BYTES).trim();
  if (DOTS_ONLY.test(trimmed)) return trimmed.replace(/\./g, '_');
  return trimmed || 'untitled';
}
