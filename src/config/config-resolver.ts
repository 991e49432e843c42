import { resolve } from 'node:path';
import { ConfigError } from '../errors/custom-errors.js';
import {
  DEFAULT_COMPLIANCE_SETTINGS,
  DEFAULT_CONCURRENCY,
  DEFAULT_FETCH_SETTINGS,
  DEFAULT_ITEM_URL_TEMPLATE,
  DEFAULT_LOG_DIRECTORY,
  DEFAULT_SOURCE_KIND,
  DEFAULT_SUBTITLE_SETTINGS,
  DEFAULT_TOOLS,
} from './config-defaults.js';
import type {
  CollectionConfig,
  ComplianceSettings,
  FetchSettings,
  GlobalConfig,
  SubtitleSettings,
  ToolsConfig,
} from './config-schema.js';
import type {
  CompliancePolicy,
  ResolvedCollectionConfig,
  ResolvedFetchSettings,
  ResolvedSubtitleSettings,
  ResolvedTools,
} from './resolved-config.types.js';

/**
 * Centralized configuration resolver
 *
 * Handles the merging hierarchy:
 * 1. Collection Config (Highest Priority)
 * 2. Global Config
 * 3. Default Config (Lowest Priority)
 */
export class ConfigResolver {
  private globalConfig?: GlobalConfig;

  constructor(globalConfig?: GlobalConfig) {
    this.globalConfig = globalConfig;
  }

  /**
   * Resolve configuration for one collection. Directories become absolute,
   * relative to the working directory.
   */
  public resolve(collection: CollectionConfig): ResolvedCollectionConfig {
    const global = this.globalConfig;

    const config: ResolvedCollectionConfig = {
      collection: {
        remoteLocator: collection.url,
        displayName: collection.name,
        seasonTag: collection.seasonTag,
        localDirectory: resolve(collection.directory),
        logDirectory: resolve(collection.logDirectory ?? global?.logDirectory ?? DEFAULT_LOG_DIRECTORY),
      },
      sourceKind: collection.sourceKind ?? global?.sourceKind ?? DEFAULT_SOURCE_KIND,
      itemUrlTemplate: collection.itemUrlTemplate ?? global?.itemUrlTemplate ?? DEFAULT_ITEM_URL_TEMPLATE,
      tagMetadata: collection.tagMetadata ?? global?.tagMetadata ?? true,
      fetch: this.mergeFetchSettings(collection.fetch),
      compliance: this.mergeComplianceSettings(collection.compliance),
      subtitles: this.mergeSubtitleSettings(collection.subtitles),
    };

    this.validate(config);
    return config;
  }

  /**
   * Number of collections processed in parallel
   */
  public getConcurrency(): number {
    return this.globalConfig?.concurrency ?? DEFAULT_CONCURRENCY;
  }

  /**
   * Resolve external tool binaries
   */
  public static resolveTools(tools?: ToolsConfig): ResolvedTools {
    return {
      ytDlp: tools?.ytDlp ?? DEFAULT_TOOLS.ytDlp,
      ffprobe: tools?.ffprobe ?? DEFAULT_TOOLS.ffprobe,
      ffmpeg: tools?.ffmpeg ?? DEFAULT_TOOLS.ffmpeg,
    };
  }

  private mergeFetchSettings(collection?: FetchSettings): ResolvedFetchSettings {
    const global = this.globalConfig?.fetch;
    const defaults = DEFAULT_FETCH_SETTINGS;

    return {
      retryDelay: collection?.retryDelay ?? global?.retryDelay ?? defaults.retryDelay,
      socketTimeout: collection?.socketTimeout ?? global?.socketTimeout ?? defaults.socketTimeout,
      cookieFile: resolveOptionalPath(collection?.cookieFile ?? global?.cookieFile),
      incompatibilityMarkers:
        collection?.incompatibilityMarkers ?? global?.incompatibilityMarkers ?? defaults.incompatibilityMarkers,
      qualityProfiles: collection?.qualityProfiles ?? global?.qualityProfiles ?? defaults.qualityProfiles,
    };
  }

  private mergeComplianceSettings(collection?: ComplianceSettings): CompliancePolicy {
    const global = this.globalConfig?.compliance;
    const defaults = DEFAULT_COMPLIANCE_SETTINGS;

    return {
      videoCodec: collection?.videoCodec ?? global?.videoCodec ?? defaults.videoCodec,
      audioCodec: collection?.audioCodec ?? global?.audioCodec ?? defaults.audioCodec,
      maxHeight: collection?.maxHeight ?? global?.maxHeight ?? defaults.maxHeight,
    };
  }

  private mergeSubtitleSettings(collection?: SubtitleSettings): ResolvedSubtitleSettings {
    const global = this.globalConfig?.subtitles;
    const defaults = DEFAULT_SUBTITLE_SETTINGS;

    return {
      enabled: collection?.enabled ?? global?.enabled ?? defaults.enabled,
      languages: collection?.languages ?? global?.languages ?? defaults.languages,
    };
  }

  private validate(config: ResolvedCollectionConfig): void {
    const names = config.fetch.qualityProfiles.map((profile) => profile.name);
    const duplicate = names.find((name, index) => names.indexOf(name) !== index);
    if (duplicate) {
      throw new ConfigError(
        `Quality profile "${duplicate}" is listed twice for ${config.collection.displayName} ${config.collection.seasonTag}`,
      );
    }
  }
}

function resolveOptionalPath(path: string | undefined): string | undefined {
  return path ? resolve(path) : undefined;
}
