import { join } from 'node:path';
import type { CollectionRef } from '../types/collection.types.js';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';

/**
 * Per-collection state files. Each collection owns its own set, so
 * collections can run in parallel without sharing a writable file.
 */
export type CollectionPaths = {
  archive: string;
  auditLog: string;
  violationsLog: string;
  subtitleFailures: string;
  mediaIndex: string;
};

export function collectionPaths(collection: CollectionRef): CollectionPaths {
  const prefix = join(collection.logDirectory, `${sanitizeFilename(collection.displayName)} ${collection.seasonTag}`);
  return {
    archive: `${prefix}.archive.txt`,
    auditLog: `${prefix}.log`,
    violationsLog: `${prefix}.violations.log`,
    subtitleFailures: `${prefix}.subtitle-failures.txt`,
    mediaIndex: `${prefix}.index.json`,
  };
}
