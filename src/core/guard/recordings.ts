/**
 * Recordings Directory
 *
 * Source of tokens for the guard: supported media files directly under
 * the recordings directory, identified by file name.
 */

import { mkdir, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { isSupportedRecording } from '@/providers/transcriber';

export interface Recording {
  name: string;
  path: string;
  size: number;
  modifiedAt: string;
  processed: boolean;
}

/**
 * Create the directory if needed. Returns the same path.
 */
export async function ensureRecordingsDir(directory: string): Promise<string> {
  await mkdir(directory, { recursive: true });
  return directory;
}

/**
 * Supported file names, sorted. Subdirectories are not scanned.
 */
export async function listRecordingNames(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupportedRecording(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Supported files with their size, modification time and processed flag.
 */
export async function listRecordings(
  directory: string,
  isProcessed: (name: string) => boolean = () => false
): Promise<Recording[]> {
  const names = await listRecordingNames(directory);
  return Promise.all(
    names.map(async (name) => {
      const path = join(directory, name);
      const info = await stat(path);
      return {
        name,
        path,
        size: info.size,
        modifiedAt: info.mtime.toISOString(),
        processed: isProcessed(name)
      };
    })
  );
}
