/**
 * Turns an audio file into a TrackRecord: a content identity, a version key
 * over everything that shapes the link, and display attributes.
 */

import { createHash } from 'crypto';
import { createReadStream, existsSync } from 'fs';
import { basename, extname, resolve } from 'path';
import { createSilentLogger, errorMessage, type Logger } from './logger.js';
import type { MetadataReader } from './metadata-reader.js';
import type { TrackRecord } from './types.js';

export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';

/**
 * MD5 of a file's full content
 */
export async function hashFileContent(filePath: string): Promise<string> {
  const hasher = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hasher.update(chunk);
  }
  return hasher.digest('hex');
}

/**
 * Checksum over file name, artist, album, title and identity. The file name is
 * included so that a rename alone causes the link to be rebuilt.
 */
export function computeVersionKey(fields: {
  fileName: string;
  artist: string;
  album: string;
  title: string;
  identityKey: string;
}): string {
  const hasher = createHash('md5');
  hasher.update(fields.fileName, 'utf8');
  hasher.update(fields.artist, 'utf8');
  hasher.update(fields.album, 'utf8');
  hasher.update(fields.title, 'utf8');
  hasher.update(fields.identityKey, 'utf8');
  return hasher.digest('hex');
}

export class IdentityResolver {
  private readonly reader: MetadataReader;
  private readonly logger: Logger;

  constructor(reader: MetadataReader, logger: Logger = createSilentLogger()) {
    this.reader = reader;
    this.logger = logger;
  }

  /**
   * Resolve a file into a track record, or null when the file cannot be read.
   * Unreadable files are logged and skipped, never fatal.
   */
  async resolve(filePath: string): Promise<TrackRecord | null> {
    const sourcePath = resolve(filePath);
    const fileName = basename(sourcePath);
    this.logger.trace(`Resolving track: ${fileName}`);

    if (!existsSync(sourcePath)) {
      this.logger.warn(`File does not exist: ${sourcePath}`);
      return null;
    }

    try {
      const metadata = await this.reader.read(sourcePath);

      let identityKey = metadata.identitySignature?.toLowerCase() ?? '';
      if (!identityKey) {
        this.logger.warn(`No audio signature found for ${sourcePath}, hashing the whole file instead`);
        identityKey = await hashFileContent(sourcePath);
      }

      const artist = metadata.artist ?? UNKNOWN_ARTIST;
      const album = metadata.album ?? UNKNOWN_ALBUM;
      const title = metadata.title ?? basename(fileName, extname(fileName));

      return {
        identityKey,
        versionKey: computeVersionKey({ fileName, artist, album, title, identityKey }),
        artist,
        album,
        title,
        trackNumber: metadata.trackNumber ?? 0,
        fileName,
        sourcePath,
        linkPath: '',
      };
    } catch (error) {
      this.logger.warn(`Failed to read track ${sourcePath}: ${errorMessage(error)}`);
      return null;
    }
  }
}
