/**
 * SQLite-backed index of the last reconciled state of every track identity
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { AppError, createSilentLogger, errorMessage, type Logger } from './logger.js';
import type { IndexEntry, TrackRecord } from './types.js';

/**
 * Keyed store consulted by the diff engine and written after each batch
 */
export interface IndexStore {
  lookupMany(identityKeys: Iterable<string>): Map<string, IndexEntry>;
  /** All-or-nothing: throws and writes nothing on failure */
  upsertMany(records: readonly TrackRecord[]): void;
  count(): number;
  close(): void;
}

export interface TrackIndexOptions {
  /** Never write: open an existing file read-only, or use an in-memory index */
  readonly?: boolean;
  logger?: Logger;
}

interface TrackRow {
  identity_key: string;
  version_key: string;
  artist: string;
  album: string;
  title: string;
  source_path: string;
  link_path: string;
  updated_at: string | null;
}

// Stay well below SQLite's bound-parameter limit
const LOOKUP_CHUNK_SIZE = 500;

export class TrackIndex implements IndexStore {
  private db: Database.Database;
  private readonly logger: Logger;
  private readonly readonly: boolean;
  private hasTable = true;

  constructor(dbPath: string = './music_metadata.db', options: TrackIndexOptions = {}) {
    this.logger = options.logger ?? createSilentLogger('TrackIndex');
    this.readonly = options.readonly ?? false;

    const inMemory = dbPath === ':memory:' || (this.readonly && !existsSync(dbPath));
    this.db = this.open(dbPath, inMemory);

    if (this.readonly && !inMemory) {
      this.hasTable = this.tableExists();
      this.logger.debug(`Opened index read-only: ${dbPath}`);
    } else {
      if (this.readonly) {
        this.logger.debug(`Index ${dbPath} does not exist yet, using an empty in-memory index`);
      }
      this.initSchema();
    }
  }

  private open(dbPath: string, inMemory: boolean): Database.Database {
    try {
      if (inMemory) {
        return new Database(':memory:');
      }
      if (this.readonly) {
        return new Database(dbPath, { readonly: true, fileMustExist: true });
      }
      mkdirSync(dirname(dbPath), { recursive: true });
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      return db;
    } catch (error) {
      throw new AppError(`Cannot open index ${dbPath}: ${errorMessage(error)}`, 'INDEX_OPEN_FAILED', { dbPath }, {
        cause: error,
      });
    }
  }

  private tableExists(): boolean {
    const row = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tracks'")
      .get() as { name: string } | undefined;
    return row !== undefined;
  }

  private hasColumn(columnName: string): boolean {
    const columns = this.db.prepare('PRAGMA table_info(tracks)').all() as Array<{ name: string }>;
    return columns.some(col => col.name === columnName);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tracks (
        identity_key TEXT PRIMARY KEY CHECK (length(identity_key) > 0),
        version_key TEXT NOT NULL,
        artist TEXT NOT NULL,
        album TEXT NOT NULL,
        title TEXT NOT NULL,
        source_path TEXT NOT NULL,
        link_path TEXT NOT NULL DEFAULT ''
      );
    `);

    // Indexes written before updated_at existed
    if (!this.hasColumn('updated_at')) {
      this.db.exec('ALTER TABLE tracks ADD COLUMN updated_at TEXT');
    }

    this.db.exec('CREATE INDEX IF NOT EXISTS idx_tracks_source ON tracks(source_path)');
    this.hasTable = true;
  }

  private toEntry(row: TrackRow): IndexEntry {
    return {
      identityKey: row.identity_key,
      versionKey: row.version_key,
      artist: row.artist,
      album: row.album,
      title: row.title,
      sourcePath: row.source_path,
      linkPath: row.link_path,
      updatedAt: row.updated_at ?? '',
      sourceMissing: !existsSync(row.source_path),
    };
  }

  /**
   * Fetch the stored entries for a set of identities. Entries whose source file
   * has moved are still returned, flagged `sourceMissing`.
   */
  lookupMany(identityKeys: Iterable<string>): Map<string, IndexEntry> {
    const keys = [...new Set(identityKeys)];
    const found = new Map<string, IndexEntry>();
    if (keys.length === 0 || !this.hasTable) {
      return found;
    }

    this.logger.debug(`Looking up ${keys.length} tracks by identity`);
    for (let start = 0; start < keys.length; start += LOOKUP_CHUNK_SIZE) {
      const chunk = keys.slice(start, start + LOOKUP_CHUNK_SIZE);
      const placeholders = chunk.map(() => '?').join(',');
      const rows = this.db
        .prepare(`SELECT * FROM tracks WHERE identity_key IN (${placeholders})`)
        .all(...chunk) as TrackRow[];

      for (const row of rows) {
        const entry = this.toEntry(row);
        if (entry.sourceMissing) {
          this.logger.info(`Stored source path for '${entry.artist} - ${entry.title}' no longer exists`);
          this.logger.warn(`Reconstructing track info from index for '${entry.artist} - ${entry.title}'`, {
            sourcePath: entry.sourcePath,
          });
        } else {
          this.logger.trace(`Previous track info available for ${entry.artist} - ${entry.title}`);
        }
        found.set(entry.identityKey, entry);
      }
    }

    this.logger.info(`Found ${found.size} matching tracks in index`);
    return found;
  }

  /**
   * Insert or replace records in one transaction
   */
  upsertMany(records: readonly TrackRecord[]): void {
    if (records.length === 0) return;
    if (this.readonly) {
      throw new AppError('Index is open read-only', 'INDEX_WRITE_FAILED');
    }

    const stmt = this.db.prepare(`
      INSERT INTO tracks (identity_key, version_key, artist, album, title, source_path, link_path, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(identity_key) DO UPDATE SET
        version_key = excluded.version_key,
        artist = excluded.artist,
        album = excluded.album,
        title = excluded.title,
        source_path = excluded.source_path,
        link_path = excluded.link_path,
        updated_at = excluded.updated_at
    `);

    const transaction = this.db.transaction((batch: readonly TrackRecord[]) => {
      const now = new Date().toISOString();
      for (const record of batch) {
        stmt.run(
          record.identityKey,
          record.versionKey,
          record.artist,
          record.album,
          record.title,
          record.sourcePath,
          record.linkPath,
          now
        );
      }
    });

    try {
      transaction(records);
    } catch (error) {
      throw new AppError(
        `Failed to write ${records.length} tracks to index: ${errorMessage(error)}`,
        'INDEX_WRITE_FAILED',
        { records: records.length },
        { cause: error }
      );
    }
    this.logger.info(`Updated ${records.length} tracks in the index`);
  }

  count(): number {
    if (!this.hasTable) return 0;
    const row = this.db.prepare('SELECT COUNT(*) as count FROM tracks').get() as { count: number };
    return row.count;
  }

  /**
   * Counts for the status command
   */
  getStats(): { tracks: number; artists: number; albums: number; missingSources: number; lastUpdated?: string } {
    if (!this.hasTable) {
      return { tracks: 0, artists: 0, albums: 0, missingSources: 0 };
    }
    const totals = this.db
      .prepare(
        `SELECT COUNT(*) as tracks,
                COUNT(DISTINCT artist) as artists,
                COUNT(DISTINCT artist || char(0) || album) as albums,
                MAX(updated_at) as lastUpdated
         FROM tracks`
      )
      .get() as { tracks: number; artists: number; albums: number; lastUpdated: string | null };

    const paths = this.db.prepare('SELECT source_path FROM tracks').all() as Array<{ source_path: string }>;
    const missingSources = paths.filter(row => !existsSync(row.source_path)).length;

    return {
      tracks: totals.tracks,
      artists: totals.artists,
      albums: totals.albums,
      missingSources,
      lastUpdated: totals.lastUpdated ?? undefined,
    };
  }

  close(): void {
    this.db.close();
  }
}
