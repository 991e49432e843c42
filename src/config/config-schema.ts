/**
 * Zod schemas for configuration validation
 *
 * This file defines both the validation schemas AND the TypeScript types.
 * Types are inferred from the schemas, so they stay in sync.
 */

import { z } from 'zod';

/**
 * One step of the fetch cascade: a name for logs and a fetch-tool format selector
 */
export const QualityProfileSchema = z.object({
  name: z.string().min(1).describe('Profile name used in logs'),
  format: z.string().min(1).describe('Format selector passed to the fetch tool'),
});

export type QualityProfile = z.infer<typeof QualityProfileSchema>;

/**
 * Fetch cascade settings
 */
export const FetchSettingsSchema = z.object({
  retryDelay: z.number().nonnegative().optional().describe('Fixed delay between profiles in seconds'),
  socketTimeout: z.number().positive().optional().describe('Socket timeout passed through to the fetch tool'),
  cookieFile: z.string().optional().describe('Netscape cookie file passed to the fetch tool'),
  incompatibilityMarkers: z
    .array(z.string().min(1))
    .optional()
    .describe('Output substrings that mark an item as permanently unfetchable'),
  qualityProfiles: z
    .array(QualityProfileSchema)
    .min(1, 'At least one quality profile is required')
    .optional()
    .describe('Quality profiles, most preferred first'),
});

export type FetchSettings = z.infer<typeof FetchSettingsSchema>;

/**
 * Target codec profile for output files
 */
export const ComplianceSettingsSchema = z.object({
  videoCodec: z.string().min(1).optional(),
  audioCodec: z.string().min(1).optional(),
  maxHeight: z.number().int().positive().optional(),
});

export type ComplianceSettings = z.infer<typeof ComplianceSettingsSchema>;

export const SubtitleSettingsSchema = z.object({
  enabled: z.boolean().optional().describe('Run the subtitle recovery sweep'),
  languages: z.array(z.string().min(1)).min(1).optional().describe('Language preferences, most preferred first'),
});

export type SubtitleSettings = z.infer<typeof SubtitleSettingsSchema>;

const CommonSettingsSchema = z.object({
  logDirectory: z.string().optional().describe('Directory for archive, cache, index and log files'),
  sourceKind: z.string().min(1).optional().describe('Archive tag for remote items, e.g. "youtube"'),
  itemUrlTemplate: z
    .string()
    .includes('{id}', { message: 'Must contain the {id} placeholder' })
    .optional()
    .describe('Item locator template used for subtitle recovery'),
  tagMetadata: z.boolean().optional().describe('Rewrite descriptive metadata after each fetch'),
  fetch: FetchSettingsSchema.optional(),
  compliance: ComplianceSettingsSchema.optional(),
  subtitles: SubtitleSettingsSchema.optional(),
});

export const LogLevelNameSchema = z.enum(['DEBUG', 'INFO', 'SUCCESS', 'WARNING', 'ERROR', 'HIGHLIGHT']);

/**
 * Global configuration defaults
 */
export const GlobalConfigSchema = CommonSettingsSchema.extend({
  concurrency: z.number().int().positive().optional().describe('Collections processed in parallel'),
  logLevel: LogLevelNameSchema.optional(),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * One collection to mirror
 */
export const CollectionConfigSchema = CommonSettingsSchema.extend({
  name: z.string().min(1).describe('Show name'),
  url: z.url().describe('Remote playlist URL'),
  seasonTag: z
    .string()
    .regex(/^[A-Za-z0-9]+$/, { message: 'Must be alphanumeric (e.g., "S01")' })
    .describe('Season token used in filenames'),
  directory: z.string().min(1).describe('Local directory for this collection'),
});

export type CollectionConfig = z.infer<typeof CollectionConfigSchema>;

export const ToolsSchema = z.object({
  ytDlp: z.string().min(1).optional(),
  ffprobe: z.string().min(1).optional(),
  ffmpeg: z.string().min(1).optional(),
});

export type ToolsConfig = z.infer<typeof ToolsSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z
  .object({
    collections: z.array(CollectionConfigSchema).min(1, 'Cannot be empty').describe('Collections to mirror'),
    globalConfig: GlobalConfigSchema.optional(),
    tools: ToolsSchema.optional(),
  })
  .superRefine((config, ctx) => {
    // Two entries with the same name and season would share archive and log files
    const seen = new Set<string>();
    config.collections.forEach((collection, index) => {
      const key = `${collection.name}\u0000${collection.seasonTag}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: 'custom',
          path: ['collections', index],
          message: `Duplicate collection "${collection.name}" ${collection.seasonTag}`,
        });
      }
      seen.add(key);
    });
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate configuration using Zod
 *
 * @throws z.ZodError if validation fails
 */
export function validateConfig(rawConfig: unknown): Config {
  return ConfigSchema.parse(rawConfig);
}

/**
 * Validate with custom error formatting
 */
export function validateConfigSafe(
  rawConfig: unknown,
): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.map(String).join('.')}"` : 'value';
      return `${path} ${issue.message} [${issue.code.toUpperCase()}]`;
    })
    .join('; ');
}
