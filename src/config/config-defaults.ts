import type { QualityProfile } from './config-schema.js';

/**
 * Default quality cascade: 720p first, then 1080p, both preferring H.264 video
 * with AAC audio so the result is already inside the compliance profile.
 */
export const DEFAULT_QUALITY_PROFILES: QualityProfile[] = [
  {
    name: '720p',
    format: 'bv*[height<=720][vcodec^=avc1]+ba[acodec^=mp4a]/b[height<=720][vcodec^=avc1]',
  },
  {
    name: '1080p',
    format: 'bv*[height<=1080][vcodec^=avc1]+ba[acodec^=mp4a]/b[height<=1080]',
  },
];

export const DEFAULT_FETCH_SETTINGS = {
  retryDelay: 10,
  socketTimeout: 30,
  incompatibilityMarkers: ['YouTube is forcing SABR streaming for this client', 'This video is DRM protected'],
  qualityProfiles: DEFAULT_QUALITY_PROFILES,
};

export const DEFAULT_COMPLIANCE_SETTINGS = {
  videoCodec: 'h264',
  audioCodec: 'aac',
  maxHeight: 1080,
};

export const DEFAULT_SUBTITLE_SETTINGS = {
  enabled: true,
  languages: ['en-US', 'en'],
};

export const DEFAULT_CONFIG_PATH = './reelsync.yaml';
export const DEFAULT_LOG_DIRECTORY = './logs';
export const DEFAULT_SOURCE_KIND = 'youtube';
export const DEFAULT_ITEM_URL_TEMPLATE = 'https://www.youtube.com/watch?v={id}';
export const DEFAULT_CONCURRENCY = 2;
export const DEFAULT_TRAILER_CONCURRENCY = 4;

export const DEFAULT_TOOLS = {
  ytDlp: 'yt-dlp',
  ffprobe: 'ffprobe',
  ffmpeg: 'ffmpeg',
};

/** Container every fetch is merged into; the tagger accepts only this */
export const CANONICAL_CONTAINER = 'mp4';
