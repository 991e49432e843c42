import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ItemInfo } from '../types/collection.types.js';

const InfoJsonSchema = z.object({
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  description: z.string().nullish(),
  upload_date: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
});

/**
 * Read the info JSON the fetch tool writes beside the media
 *
 * @returns null when the file is missing, unreadable or not the expected shape
 */
export async function readItemInfo(infoJsonPath: string): Promise<ItemInfo | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(infoJsonPath, 'utf-8'));
  } catch {
    return null;
  }

  const parsed = InfoJsonSchema.safeParse(raw);
  if (!parsed.success) return null;

  const info = parsed.data;
  return {
    title: info.title ?? undefined,
    uploader: info.uploader ?? info.channel ?? undefined,
    description: info.description ?? undefined,
    uploadDate: info.upload_date ?? undefined,
    tags: info.tags ?? [],
  };
}
