import { CANONICAL_CONTAINER } from '../../config/config-defaults.js';
import type { FetchRequest, SubtitleRequest, TrailerRequest } from '../types.js';

/**
 * Argument presets for the yt-dlp scenarios the pipeline uses
 */
export class YtdlpPresets {
  /**
   * Flat playlist listing as one JSON document
   */
  static list(locator: string): string[] {
    return ['--flat-playlist', '--dump-single-json', '--no-warnings', locator];
  }

  /**
   * Fetch one item with a format constraint, merged into the canonical
   * container and recorded in the shared download archive
   */
  static fetch(request: FetchRequest): string[] {
    const args = [
      '--newline',
      '--no-playlist',
      '-f',
      request.format,
      '--merge-output-format',
      CANONICAL_CONTAINER,
      '--download-archive',
      request.archiveFile,
      '-o',
      `${request.outputBase}.%(ext)s`,
    ];

    if (request.writeInfoJson) {
      args.push('--write-info-json', '--no-write-playlist-metafiles');
    }
    if (request.socketTimeout !== undefined) {
      args.push('--socket-timeout', String(request.socketTimeout));
    }
    if (request.cookieFile) {
      args.unshift('--cookies', request.cookieFile);
    }

    args.push(request.locator);
    return args;
  }

  /**
   * Subtitles only (skip the media), converted to SRT
   */
  static subtitles(request: SubtitleRequest): string[] {
    const args = [
      '--skip-download',
      '--no-playlist',
      '--write-subs',
      '--write-auto-subs',
      '--sub-langs',
      request.language,
      '--convert-subs',
      'srt',
      '-o',
      `${request.outputBase}.%(ext)s`,
    ];

    if (request.cookieFile) {
      args.unshift('--cookies', request.cookieFile);
    }

    args.push(request.locator);
    return args;
  }

  /**
   * First search hit for a trailer query
   */
  static trailer(request: TrailerRequest): string[] {
    return [
      '--newline',
      '--no-playlist',
      '--merge-output-format',
      CANONICAL_CONTAINER,
      '-o',
      `${request.outputBase}.%(ext)s`,
      `ytsearch1:${request.query}`,
    ];
  }
}
