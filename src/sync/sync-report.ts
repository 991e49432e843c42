import type { SubtitleSweepSummary } from '../subtitles/subtitle-recovery.js';
import { SyncPhase } from './sync-phase.js';

/**
 * What one collection run did
 */
export type SyncReport = {
  /** `<displayName> <seasonTag>` */
  label: string;
  phase: SyncPhase;
  listed: number;
  cursor: number;
  queued: number;
  fetched: number;
  skippedPermanent: number;
  failed: number;
  /** Queued items skipped because the archive or the index already had them */
  alreadyKnown: number;
  violations: number;
  tagged: number;
  taggingFailed: number;
  subtitles: SubtitleSweepSummary;
  listingError?: string;
};

export function emptySyncReport(label: string): SyncReport {
  return {
    label,
    phase: SyncPhase.IDLE,
    listed: 0,
    cursor: 0,
    queued: 0,
    fetched: 0,
    skippedPermanent: 0,
    failed: 0,
    alreadyKnown: 0,
    violations: 0,
    tagged: 0,
    taggingFailed: 0,
    subtitles: { recovered: 0, failed: 0, skipped: 0 },
  };
}
