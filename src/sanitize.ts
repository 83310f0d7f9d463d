/**
 * Path-segment sanitization and link file naming
 */

import { extname } from 'path';
import type { Logger } from './logger.js';
import type { TrackRecord } from './types.js';

/** Hard ceiling for any single path segment, whatever the configured length */
export const ABSOLUTE_NAME_LIMIT = 250;

/** Characters of the identity key appended to "safe" link names */
export const IDENTITY_SUFFIX_LENGTH = 4;

const RESERVED_CHARS = /[\\/:*?"<>|]/g;
const WHITESPACE_RUN = /\s+/g;

function truncate(value: string, limit: number): string {
  let cut = value.slice(0, limit);
  const last = cut.charCodeAt(cut.length - 1);
  // Do not leave half of a surrogate pair behind
  if (last >= 0xd800 && last <= 0xdbff) {
    cut = cut.slice(0, -1);
  }
  return cut;
}

/**
 * Make a string usable as a single path segment: strips characters reserved on
 * common filesystems, collapses whitespace and truncates to `maxLength`.
 * The length is clamped to 1..{@link ABSOLUTE_NAME_LIMIT}, so a non-empty
 * value always keeps at least one character.
 */
export function sanitizeForPath(value: string, maxLength: number, logger?: Logger): string {
  let s = value.replace(RESERVED_CHARS, '').replace(WHITESPACE_RUN, ' ').trim();

  const limit = Math.max(1, Math.min(maxLength, ABSOLUTE_NAME_LIMIT));
  if (s.length > limit) {
    logger?.warn(`Massive string being cut down: ${s.slice(0, 50)}...`, { length: s.length, limit });
    s = truncate(s, limit).trim();
  }

  if (s === '' || s === '.' || s === '..') {
    return '_';
  }
  return s;
}

export interface LinkNameOptions {
  maxLength: number;
  safeFilenames: boolean;
  logger?: Logger;
}

/**
 * Short identity fragment used to keep same-titled tracks apart
 */
export function identitySuffix(identityKey: string): string {
  return identityKey.slice(0, IDENTITY_SUFFIX_LENGTH);
}

/**
 * Pick the link file name for a track.
 *
 * Tries `Title[-abcd].ext`, then `7-abcd.ext`, then the source file name,
 * taking the first that fits `maxLength`, and sanitizes the result.
 */
export function deriveLinkName(
  track: Pick<TrackRecord, 'title' | 'trackNumber' | 'identityKey' | 'fileName'>,
  options: LinkNameOptions
): string {
  const ext = extname(track.fileName).toLowerCase();
  const short = identitySuffix(track.identityKey);
  const tag = options.safeFilenames ? `-${short}` : '';

  let name = `${track.title}${tag}${ext}`;
  if (name.length > options.maxLength) {
    name = `${track.trackNumber}-${short}${ext}`;
  }
  if (name.length > options.maxLength) {
    name = track.fileName;
  }
  return sanitizeForPath(name, options.maxLength, options.logger);
}
