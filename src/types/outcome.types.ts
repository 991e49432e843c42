import type { ItemInfo, LocalMediaFile } from './collection.types.js';

/**
 * Result of one item's quality cascade. Exactly one is produced per item.
 */
export type FetchOutcome =
  | { kind: 'success'; file: LocalMediaFile; profile: string; info?: ItemInfo }
  | { kind: 'skipped-permanent'; profile: string; reason: string }
  | { kind: 'failed'; attempts: number; lastError: string };

export type SubtitleSkipReason = 'cached' | 'present' | 'malformed-name';

/**
 * Result of one subtitle recovery attempt
 */
export type SubtitleOutcome =
  | { kind: 'recovered'; baseName: string; language: string; path: string }
  | { kind: 'failed'; baseName: string; languagesTried: string[] }
  | { kind: 'skipped'; baseName: string; reason: SubtitleSkipReason };

/**
 * Probe-derived compliance verdict for one file
 */
export type CompatibilityReport = {
  videoCodec: string;
  videoHeight: number;
  audioCodec: string;
  compliant: boolean;
  violations: string[];
};
