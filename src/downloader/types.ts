import type { CommandResult } from '../utils/process-runner.js';

/**
 * One entry printed by the remote lister, in playlist order
 */
export type ListedEntry = {
  /** 1-based slot in the playlist, counting entries the lister could not resolve */
  position: number;
  id: string;
  title: string;
  locator?: string;
};

export type FetchRequest = {
  locator: string;
  /** Fetch-tool format selector of the current quality profile */
  format: string;
  /** Destination path without extension */
  outputBase: string;
  archiveFile: string;
  cookieFile?: string;
  socketTimeout?: number;
  /** Ask the tool to leave `<outputBase>.info.json` next to the media */
  writeInfoJson?: boolean;
};

export type SubtitleRequest = {
  locator: string;
  language: string;
  /** Destination path without extension; the tool writes `<outputBase>.<language>.srt` */
  outputBase: string;
  cookieFile?: string;
};

export type TrailerRequest = {
  query: string;
  outputBase: string;
};

export type TagRequest = {
  input: string;
  output: string;
  /** Ordered key=value pairs */
  metadata: ReadonlyArray<readonly [string, string]>;
};

export type StreamKind = 'video' | 'audio';

export type StreamProbe = {
  codec: string;
  /** Video streams only */
  height?: number;
};

/**
 * Every external process the pipeline depends on.
 *
 * Fetch-style calls resolve with the tool's exit code and output and leave
 * classification to the caller; `list` and `probe` reject when the tool fails.
 */
export type MediaTools = {
  /**
   * @throws ListingError when the lister fails or prints undecodable output
   */
  list(locator: string): Promise<ListedEntry[]>;

  fetch(request: FetchRequest): Promise<CommandResult>;

  /**
   * @returns null when the file has no stream of that kind
   * @throws ProbeError when the prober fails
   */
  probe(filePath: string, stream: StreamKind): Promise<StreamProbe | null>;

  tagMetadata(request: TagRequest): Promise<CommandResult>;

  fetchSubtitles(request: SubtitleRequest): Promise<CommandResult>;

  fetchTrailer(request: TrailerRequest): Promise<CommandResult>;
};

/**
 * Install check for the binaries behind {@link MediaTools}
 */
export type ToolCheck = {
  /**
   * @returns names of the tools that could not be run, empty when all are present
   */
  findMissingTools(): Promise<string[]>;
};
