import type { CollectionRef } from '../types/collection.types.js';
import type { QualityProfile } from './config-schema.js';

export type ResolvedFetchSettings = {
  /** Seconds */
  retryDelay: number;
  /** Seconds */
  socketTimeout: number;
  cookieFile?: string;
  incompatibilityMarkers: string[];
  qualityProfiles: QualityProfile[];
};

export type CompliancePolicy = {
  videoCodec: string;
  audioCodec: string;
  maxHeight: number;
};

export type ResolvedSubtitleSettings = {
  enabled: boolean;
  languages: string[];
};

/**
 * Fully resolved settings for one collection, with no missing values
 */
export type ResolvedCollectionConfig = {
  collection: CollectionRef;
  sourceKind: string;
  itemUrlTemplate: string;
  tagMetadata: boolean;
  fetch: ResolvedFetchSettings;
  compliance: CompliancePolicy;
  subtitles: ResolvedSubtitleSettings;
};

export type ResolvedTools = {
  ytDlp: string;
  ffprobe: string;
  ffmpeg: string;
};
