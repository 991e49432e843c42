/**
 * Filename helpers. The media filename is the durable link between a remote
 * item and its local file:
 *
 *   <ShowName> - <SeasonTag>E<NN> - <SanitizedTitle> [<Id>].<ext>
 */

/** Remote item ids are fixed-length 11 character tokens */
export const ITEM_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

const MEDIA_NAME_PATTERN = /^(?<show>.+?) - (?<season>[^\s]+?)E(?<position>\d{2,}) - (?<title>.*) \[(?<id>[^\]]+)\]$/;

const BRACKETED_ID_PATTERN = /\[([A-Za-z0-9_-]{11})\](?=[^[\]]*$)/;

/**
 * Sanitize a filename component for cross-platform compatibility.
 * Targets Windows restrictions, which are stricter than *nix.
 */
export function sanitizeFilename(name: string): string {
  return (
    name
      // Windows illegal characters: < > : " / \ | ? *
      .replace(/[<>:"/\\|?*]/g, '_')
      // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
      .replace(/[\x00-\x1F]/g, '')
      // Square brackets would confuse the id token at the end of the name
      .replace(/[[\]]/g, '')
      .replace(/[\s.]+$/, '')
  );
}

export type MediaNameParts = {
  showName: string;
  seasonTag: string;
  position: number;
  title: string;
  id: string;
};

/**
 * Build the base name (no extension) for a materialized item
 */
export function buildMediaBaseName(parts: MediaNameParts): string {
  const episode = String(parts.position).padStart(2, '0');
  return `${sanitizeFilename(parts.showName)} - ${parts.seasonTag}E${episode} - ${sanitizeFilename(parts.title)} [${parts.id}]`;
}

/**
 * Parse a base name produced by {@link buildMediaBaseName}.
 *
 * @returns Parts, or null when the name does not follow the convention
 */
export function parseMediaBaseName(baseName: string): MediaNameParts | null {
  const groups = MEDIA_NAME_PATTERN.exec(baseName)?.groups;
  if (!groups?.show || !groups.season || !groups.position || groups.title === undefined || !groups.id) {
    return null;
  }
  if (!ITEM_ID_PATTERN.test(groups.id)) return null;

  return {
    showName: groups.show,
    seasonTag: groups.season,
    position: Number.parseInt(groups.position, 10),
    title: groups.title,
    id: groups.id,
  };
}

/**
 * Extract the bracketed item id from a base name, even when the rest of the
 * name does not follow the convention.
 */
export function extractItemId(baseName: string): string | null {
  return BRACKETED_ID_PATTERN.exec(baseName)?.[1] ?? null;
}

/**
 * Strip the last extension from a file name
 */
export function stripExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}
