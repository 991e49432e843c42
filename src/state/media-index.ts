import { existsSync } from 'node:fs';
import { mkdir, rename, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { z } from 'zod';
import { listMediaFiles } from '../media/media-files.js';
import type { LocalMediaFile } from '../types/collection.types.js';
import { parseMediaBaseName, stripExtension } from '../utils/filename-sanitizer.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

const IndexEntrySchema = z.object({
  position: z.number().int().positive(),
  id: z.string().min(1),
  /** File name inside the collection directory */
  file: z.string().min(1),
});

const IndexFileSchema = z.object({
  version: z.literal(1),
  seasonTag: z.string(),
  entries: z.array(IndexEntrySchema),
});

type IndexEntry = z.infer<typeof IndexEntrySchema>;

export type IndexRebuildSummary = {
  kept: number;
  discovered: number;
  dropped: number;
};

/**
 * Persisted `{position, id} -> file` mapping for one collection directory.
 *
 * Rebuilt at startup from the saved index plus a directory scan: saved
 * entries whose file still exists are kept as-is, files the index does not
 * know are added when their name follows the naming convention for this
 * season, and entries whose file disappeared are dropped. Files fetched
 * during a run are registered from the remote item itself, so their title
 * never has to be parsed back.
 */
export class MediaIndex {
  private entries = new Map<string, IndexEntry>();

  constructor(
    private readonly indexPath: string,
    private readonly directory: string,
    private readonly seasonTag: string,
    private readonly log: Logger = defaultLogger,
  ) {}

  async rebuild(): Promise<IndexRebuildSummary> {
    const saved = await this.readSaved();
    const onDisk = await listMediaFiles(this.directory);
    const present = new Set(onDisk);
    const summary: IndexRebuildSummary = { kept: 0, discovered: 0, dropped: 0 };

    this.entries = new Map();
    for (const entry of saved) {
      if (present.has(entry.file)) {
        this.entries.set(entry.id, entry);
        summary.kept++;
      } else {
        summary.dropped++;
      }
    }

    const known = new Set([...this.entries.values()].map((entry) => entry.file));
    for (const file of onDisk) {
      if (known.has(file)) continue;
      const parts = parseMediaBaseName(stripExtension(file));
      if (!parts || parts.seasonTag !== this.seasonTag) continue;
      if (this.entries.has(parts.id)) {
        this.log.warning(`Duplicate file for item ${parts.id} ignored: ${file}`);
        continue;
      }
      this.entries.set(parts.id, { position: parts.position, id: parts.id, file });
      summary.discovered++;
    }

    await this.save();
    return summary;
  }

  /**
   * Add or replace the entry for a freshly materialized file
   */
  async register(file: LocalMediaFile): Promise<void> {
    this.entries.set(file.id, { position: file.position, id: file.id, file: basename(file.path) });
    await this.save();
  }

  /**
   * Highest position with a file on disk, 0 when the collection is empty
   */
  maxPosition(): number {
    let max = 0;
    for (const entry of this.entries.values()) {
      max = Math.max(max, entry.position);
    }
    return max;
  }

  findById(id: string): LocalMediaFile | undefined {
    const entry = this.entries.get(id);
    return entry ? { position: entry.position, id: entry.id, path: join(this.directory, entry.file) } : undefined;
  }

  private async readSaved(): Promise<IndexEntry[]> {
    if (!existsSync(this.indexPath)) return [];

    try {
      const parsed = IndexFileSchema.safeParse(JSON.parse(await readFile(this.indexPath, 'utf-8')));
      if (!parsed.success) {
        this.log.warning(`Ignoring malformed media index ${this.indexPath}; rebuilding from directory`);
        return [];
      }
      if (parsed.data.seasonTag !== this.seasonTag) {
        this.log.warning(`Media index ${this.indexPath} belongs to ${parsed.data.seasonTag}; rebuilding`);
        return [];
      }
      return parsed.data.entries;
    } catch (error) {
      this.log.warning(
        `Unreadable media index ${this.indexPath} (${error instanceof Error ? error.message : String(error)}); rebuilding`,
      );
      return [];
    }
  }

  private async save(): Promise<void> {
    const content = {
      version: 1 as const,
      seasonTag: this.seasonTag,
      entries: [...this.entries.values()].sort((a, b) => a.position - b.position),
    };
    await mkdir(dirname(this.indexPath), { recursive: true });
    const temp = `${this.indexPath}.tmp`;
    await writeFile(temp, `${JSON.stringify(content, null, 2)}\n`, 'utf-8');
    await rename(temp, this.indexPath);
  }
}
