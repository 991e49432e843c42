import { z } from 'zod';
import { ListingError } from '../../errors/custom-errors.js';
import { type CommandResult, type CommandRunner, runCommand } from '../../utils/process-runner.js';
import type { FetchRequest, ListedEntry, SubtitleRequest, TrailerRequest } from '../types.js';
import { YtdlpPresets } from './ytdlp-presets.js';

export type YtdlpWrapperOptions = {
  /** yt-dlp binary */
  binary?: string;
  /** Process runner, replaced in tests */
  run?: CommandRunner;
  /** Callback for progress updates */
  onProgress?: (progress: string) => void;
  /** Callback for other output lines */
  onLog?: (message: string) => void;
};

const PlaylistEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  url: z.string().nullish(),
  webpage_url: z.string().nullish(),
});

const PlaylistSchema = z.object({
  entries: z.array(PlaylistEntrySchema.nullable()).optional(),
});

const PROGRESS_PATTERN = /\[download\]\s+(\d+\.?\d*)%\s+of\s+~?\s*([\d.]+\w+)\s+at\s+~?\s*([\d.]+\w+\/s)\s+ETA\s+(\S+)/;

/**
 * Low-level wrapper for the yt-dlp CLI
 */
export class YtdlpWrapper {
  private readonly binary: string;
  private readonly run: CommandRunner;

  constructor(private readonly options: YtdlpWrapperOptions = {}) {
    this.binary = options.binary ?? 'yt-dlp';
    this.run = options.run ?? runCommand;
  }

  /**
   * List a playlist's entries in order
   *
   * @throws ListingError when yt-dlp fails or its JSON does not decode
   */
  async list(locator: string): Promise<ListedEntry[]> {
    const result = await this.run(this.binary, YtdlpPresets.list(locator));
    if (result.exitCode !== 0) {
      throw new ListingError(`yt-dlp listing exited with ${result.exitCode}: ${lastLine(result.output)}`, locator);
    }

    // Warnings may precede the document; it is the last line
    let json: unknown;
    try {
      json = JSON.parse(lastLine(result.output));
    } catch {
      throw new ListingError('yt-dlp listing did not print JSON', locator);
    }

    const parsed = PlaylistSchema.safeParse(json);
    if (!parsed.success) {
      throw new ListingError(`Unexpected listing shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`, locator);
    }

    // Unavailable entries are null but still hold their slot
    const entries: ListedEntry[] = [];
    (parsed.data.entries ?? []).forEach((entry, index) => {
      if (entry === null) return;
      entries.push({
        position: index + 1,
        id: entry.id,
        title: entry.title ?? entry.id,
        locator: entry.webpage_url ?? entry.url ?? undefined,
      });
    });
    return entries;
  }

  fetch(request: FetchRequest): Promise<CommandResult> {
    return this.run(this.binary, YtdlpPresets.fetch(request), (line) => this.handleLine(line));
  }

  fetchSubtitles(request: SubtitleRequest): Promise<CommandResult> {
    return this.run(this.binary, YtdlpPresets.subtitles(request), (line) => this.options.onLog?.(line));
  }

  fetchTrailer(request: TrailerRequest): Promise<CommandResult> {
    return this.run(this.binary, YtdlpPresets.trailer(request), (line) => this.handleLine(line));
  }

  async isInstalled(): Promise<boolean> {
    const result = await this.run(this.binary, ['--version']);
    return result.exitCode === 0;
  }

  private handleLine(text: string): void {
    if (text.startsWith('[download]')) {
      const progressMatch = PROGRESS_PATTERN.exec(text);
      if (progressMatch) {
        const [, percentage, totalSize, speed, eta] = progressMatch;
        this.options.onProgress?.(`[download] ${percentage}% of ${totalSize} at ${speed} ETA ${eta}`);
        return;
      }
    }
    this.options.onLog?.(text);
  }
}

function lastLine(output: string): string {
  const lines = output.split('\n');
  return lines[lines.length - 1] ?? '';
}
