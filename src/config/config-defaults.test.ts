import { describe, expect, it } from 'vitest';
import { validateConfig } from './config-schema.js';
import {
  DEFAULT_COMPLIANCE_SETTINGS,
  DEFAULT_FETCH_SETTINGS,
  DEFAULT_ITEM_URL_TEMPLATE,
  DEFAULT_QUALITY_PROFILES,
  DEFAULT_SUBTITLE_SETTINGS,
} from './config-defaults.js';

describe('Config Defaults', () => {
  it('should try 720p before 1080p', () => {
    expect(DEFAULT_QUALITY_PROFILES.map((profile) => profile.name)).toEqual(['720p', '1080p']);
  });

  it('should have correct default fetch settings', () => {
    expect(DEFAULT_FETCH_SETTINGS).toEqual({
      retryDelay: 10,
      socketTimeout: 30,
      incompatibilityMarkers: ['YouTube is forcing SABR streaming for this client', 'This video is DRM protected'],
      qualityProfiles: DEFAULT_QUALITY_PROFILES,
    });
  });

  it('should target h264 and aac up to 1080 lines', () => {
    expect(DEFAULT_COMPLIANCE_SETTINGS).toEqual({ videoCodec: 'h264', audioCodec: 'aac', maxHeight: 1080 });
  });

  it('should prefer US English subtitles', () => {
    expect(DEFAULT_SUBTITLE_SETTINGS).toEqual({ enabled: true, languages: ['en-US', 'en'] });
  });

  it('should be accepted by the schema', () => {
    const config = validateConfig({
      globalConfig: {
        itemUrlTemplate: DEFAULT_ITEM_URL_TEMPLATE,
        fetch: DEFAULT_FETCH_SETTINGS,
        compliance: DEFAULT_COMPLIANCE_SETTINGS,
        subtitles: DEFAULT_SUBTITLE_SETTINGS,
      },
      collections: [
        {
          name: 'Show',
          url: 'https://www.youtube.com/playlist?list=PLtest',
          seasonTag: 'S01',
          directory: './Show',
        },
      ],
    });

    expect(config.globalConfig?.fetch?.qualityProfiles).toHaveLength(2);
  });
});
