/**
 * Audio tag and signature reading
 */

import { parseFile } from 'music-metadata';

/**
 * Fields the reconciler needs from an audio file. Anything the container does
 * not carry is left undefined.
 */
export interface AudioMetadata {
  /** Hex audio signature embedded by the container (FLAC STREAMINFO MD5) */
  identitySignature?: string;
  artist?: string;
  album?: string;
  title?: string;
  trackNumber?: number;
}

export interface MetadataReader {
  read(filePath: string): Promise<AudioMetadata>;
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Reads tags with music-metadata. Throws when the file cannot be parsed.
 */
export class MusicMetadataReader implements MetadataReader {
  async read(filePath: string): Promise<AudioMetadata> {
    const metadata = await parseFile(filePath, { duration: false, skipCovers: true });
    const { common, format } = metadata;

    // An unset STREAMINFO signature is written as sixteen zero bytes
    const signature =
      format.audioMD5 && format.audioMD5.some(byte => byte !== 0) ? toHex(format.audioMD5) : undefined;

    return {
      identitySignature: signature,
      artist: nonEmpty(common.albumartist) ?? nonEmpty(common.artist),
      album: nonEmpty(common.album),
      title: nonEmpty(common.title),
      trackNumber: common.track.no ?? undefined,
    };
  }
}
