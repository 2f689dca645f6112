/**
 * Video File Scanner
 * 
 * Finds the video files of an input folder, shallow or recursive.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Dirent } from 'node:fs';
import { getExtension, isErrnoException } from '@audex/utils';

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4',
  '.mkv',
  '.mov',
  '.avi',
  '.webm',
  '.m4v',
]);

export interface InputFile {
  readonly path: string;
  readonly extension: string; // lowercase, with dot
}

/**
 * Whether a filename carries a recognized video extension (any casing)
 */
export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.has(getExtension(filePath));
}

/**
 * Symlinked files count as files; symlinked directories are not followed.
 */
async function entryKind(fullPath: string, entry: Dirent): Promise<'file' | 'directory' | 'other'> {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (!entry.isSymbolicLink()) return 'other';

  try {
    const stats = await stat(fullPath);
    if (stats.isFile()) return 'file';
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
  }
  return 'other';
}

/**
 * List the video files under a folder. Order is not guaranteed.
 */
export async function scanVideoFiles(inputRoot: string, recursive: boolean): Promise<InputFile[]> {
  const files: InputFile[] = [];
  const pending: string[] = [inputRoot];

  for (let dirPath = pending.pop(); dirPath !== undefined; dirPath = pending.pop()) {
    const entries = await readdir(dirPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);
      const kind = await entryKind(fullPath, entry);

      if (kind === 'directory' && recursive) {
        pending.push(fullPath);
      } else if (kind === 'file' && isVideoFile(entry.name)) {
        files.push({ path: fullPath, extension: getExtension(entry.name) });
      }
    }
  }

  return files;
}
