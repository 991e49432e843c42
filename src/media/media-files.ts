import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname } from 'node:path';

export const MEDIA_EXTENSIONS = ['.mp4', '.mkv', '.webm'] as const;

/**
 * List media file names (not paths) directly inside a directory, sorted.
 * A missing directory has no media.
 */
export async function listMediaFiles(directory: string): Promise<string[]> {
  if (!existsSync(directory)) return [];

  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isMediaFileName(entry.name))
    .map((entry) => entry.name)
    .sort();
}

export function isMediaFileName(name: string): boolean {
  const ext = extname(name).toLowerCase();
  // Tagger temp files and unmerged format fragments (`name.f137.mp4`) share the extension
  if (name.endsWith('.tagging.mp4') || /\.f\d+\.[a-z0-9]+$/i.test(name)) return false;
  return MEDIA_EXTENSIONS.some((known) => known === ext);
}
