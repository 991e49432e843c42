import { existsSync } from 'node:fs';
import { rename, rm } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { CANONICAL_CONTAINER } from '../config/config-defaults.js';
import type { MediaTools } from '../downloader/types.js';
import { errorMessage, TaggingError } from '../errors/custom-errors.js';
import type { CollectionRef, ItemInfo, ItemMetadata, RemoteItem } from '../types/collection.types.js';
import type { Logger } from '../utils/logger.js';
import { normalizeCompactDate } from '../utils/time-utils.js';

export type TagResult = { ok: true } | { ok: false; reason: string };

/**
 * Combine the listing entry, the fetch tool's item info and the collection
 * into the metadata written to the file
 */
export function buildItemMetadata(
  item: RemoteItem,
  info: ItemInfo | undefined,
  collection: CollectionRef,
): ItemMetadata {
  const metadata: ItemMetadata = {
    title: info?.title || item.title,
    album: `${collection.displayName} ${collection.seasonTag}`,
  };

  if (info?.uploader) metadata.artist = info.uploader;
  if (info?.description) metadata.comment = info.description;
  if (info?.uploadDate) metadata.date = normalizeCompactDate(info.uploadDate);
  if (info && info.tags.length > 0) metadata.genre = info.tags.join('; ');

  return metadata;
}

/**
 * Ordered `key=value` pairs for the metadata tool
 */
export function metadataPairs(metadata: ItemMetadata): Array<[string, string]> {
  const pairs: Array<[string, string]> = [
    ['title', metadata.title],
    ['album', metadata.album],
  ];
  if (metadata.artist !== undefined) pairs.push(['artist', metadata.artist]);
  if (metadata.comment !== undefined) pairs.push(['comment', metadata.comment]);
  if (metadata.date !== undefined) pairs.push(['date', metadata.date]);
  if (metadata.genre !== undefined) pairs.push(['genre', metadata.genre]);
  return pairs;
}

export function taggingTempPath(filePath: string): string {
  return `${filePath.slice(0, -extname(filePath).length)}.tagging.${CANONICAL_CONTAINER}`;
}

/**
 * Rewrites descriptive metadata by stream copy into a temp file, then swaps
 * it in. The original is only replaced once the temp file exists; on any
 * failure it is left as it was and the temp file is removed.
 */
export class MetadataTagger {
  constructor(
    private readonly tools: Pick<MediaTools, 'tagMetadata'>,
    private readonly log: Logger,
  ) {}

  async tag(filePath: string, metadata: ItemMetadata): Promise<TagResult> {
    if (extname(filePath).toLowerCase() !== `.${CANONICAL_CONTAINER}`) {
      return { ok: false, reason: `Only .${CANONICAL_CONTAINER} files can be tagged` };
    }

    const tempPath = taggingTempPath(filePath);
    try {
      await this.rewrite(filePath, tempPath, metadata);
      this.log.debug(`Tagged ${basename(filePath)}`);
      return { ok: true };
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.log.warning(`Failed to remove ${basename(tempPath)}: ${errorMessage(cleanupError)}`);
      });
      const reason = errorMessage(error);
      this.log.warning(`Tagging failed for ${basename(filePath)}: ${reason}`);
      return { ok: false, reason };
    }
  }

  private async rewrite(filePath: string, tempPath: string, metadata: ItemMetadata): Promise<void> {
    if (!existsSync(filePath)) {
      throw new TaggingError('File does not exist', filePath);
    }
    // Left over from a run that died before the swap
    await rm(tempPath, { force: true });

    const result = await this.tools.tagMetadata({
      input: filePath,
      output: tempPath,
      metadata: metadataPairs(metadata),
    });
    if (result.exitCode !== 0) {
      throw new TaggingError(`Metadata tool exited with ${result.exitCode}: ${result.output}`, filePath);
    }
    if (!existsSync(tempPath)) {
      throw new TaggingError('Metadata tool produced no output file', filePath);
    }

    // Replaces the original in one step
    await rename(tempPath, filePath);
  }
}
