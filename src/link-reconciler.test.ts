import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, lstatSync, mkdirSync, mkdtempSync, readlinkSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { LinkReconciler } from './link-reconciler.js';
import { createSilentLogger } from './logger.js';
import type { IndexEntry, TrackRecord } from './types.js';

describe('LinkReconciler', () => {
  let dir: string;
  let mirror: string;
  let source: string;
  let track: TrackRecord;

  const linkFor = (...segments: string[]) => join(mirror, ...segments);

  const previousEntry = (overrides: Partial<IndexEntry> = {}): IndexEntry => ({
    ...track,
    versionKey: 'old',
    artist: 'Old Artist',
    linkPath: linkFor('Old Artist', 'Album', 'Song.flac'),
    updatedAt: '2024-01-01T00:00:00.000Z',
    sourceMissing: false,
    ...overrides,
  });

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(TEST_DIR, 'links-')));
    mirror = join(dir, 'mirror');
    source = join(dir, 'source', 'song.flac');
    mkdirSync(join(dir, 'source'));
    writeFileSync(source, 'audio');
    track = {
      identityKey: 'abcdef',
      versionKey: 'new',
      artist: 'Artist',
      album: 'Album',
      title: 'Song',
      trackNumber: 2,
      fileName: 'song.flac',
      sourcePath: source,
      linkPath: '',
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const reconciler = (options: { dryRun?: boolean; safeFilenames?: boolean } = {}) =>
    new LinkReconciler({
      mirrorRoot: mirror,
      maxNameLength: 50,
      safeFilenames: options.safeFilenames ?? false,
      dryRun: options.dryRun,
    });

  it('should locate links by artist, album and title', () => {
    expect(reconciler().locate(track)).toEqual({
      dir: linkFor('Artist', 'Album'),
      path: linkFor('Artist', 'Album', 'Song.flac'),
    });
    expect(reconciler({ safeFilenames: true }).locate(track).path).toBe(linkFor('Artist', 'Album', 'Song-abcd.flac'));
  });

  it('should locate the previous link from the stored entry', () => {
    const linker = reconciler();
    expect(linker.locatePrevious(previousEntry())).toBe(linkFor('Old Artist', 'Album', 'Song.flac'));
    expect(linker.locatePrevious(previousEntry({ linkPath: '' }))).toBeNull();
  });

  it('should create a link for a new track', async () => {
    const outcome = await reconciler().reconcile({ tag: 'new', track });
    const linkPath = linkFor('Artist', 'Album', 'Song.flac');

    expect(outcome).toMatchObject({ identityKey: 'abcdef', linked: true, action: 'created', removedPrevious: false });
    expect(outcome.record.linkPath).toBe(linkPath);
    expect(readlinkSync(linkPath)).toBe(source);
  });

  it('should keep a link that already points at the source', async () => {
    const linker = reconciler();
    await linker.reconcile({ tag: 'new', track });

    const outcome = await linker.reconcile({ tag: 'unchanged', track, previous: previousEntry() });

    expect(outcome.action).toBe('kept');
    expect(outcome.linked).toBe(true);
  });

  it('should replace whatever occupies the link path', async () => {
    const linkPath = linkFor('Artist', 'Album', 'Song.flac');
    mkdirSync(linkFor('Artist', 'Album'), { recursive: true });
    writeFileSync(linkPath, 'stale');

    const outcome = await reconciler().reconcile({ tag: 'new', track });

    expect(outcome.action).toBe('replaced');
    expect(lstatSync(linkPath).isSymbolicLink()).toBe(true);
    expect(readlinkSync(linkPath)).toBe(source);
  });

  it('should move the link of a changed track', async () => {
    const oldLink = linkFor('Old Artist', 'Album', 'Song.flac');
    mkdirSync(linkFor('Old Artist', 'Album'), { recursive: true });
    symlinkSync(source, oldLink);

    const outcome = await reconciler().reconcile({ tag: 'changed', track, previous: previousEntry() });

    expect(outcome).toMatchObject({ linked: true, action: 'created', removedPrevious: true });
    expect(existsSync(oldLink)).toBe(false);
    expect(readlinkSync(linkFor('Artist', 'Album', 'Song.flac'))).toBe(source);
  });

  it('should not remove a previous entry that is not a link', async () => {
    const oldPath = linkFor('Old Artist', 'Album', 'Song.flac');
    mkdirSync(linkFor('Old Artist', 'Album'), { recursive: true });
    writeFileSync(oldPath, 'keep me');
    const logger = createSilentLogger();
    const linker = new LinkReconciler({ mirrorRoot: mirror, maxNameLength: 50, safeFilenames: false, logger });

    const outcome = await linker.reconcile({ tag: 'changed', track, previous: previousEntry() });

    expect(outcome.removedPrevious).toBe(false);
    expect(existsSync(oldPath)).toBe(true);
    expect(logger.getLogs('warn')[0].message).toBe(`Not removing ${oldPath}: it is not a link`);
  });

  it('should treat an already removed previous link as nothing to do', async () => {
    const outcome = await reconciler().reconcile({ tag: 'changed', track, previous: previousEntry() });

    expect(outcome).toMatchObject({ linked: true, action: 'created', removedPrevious: false });
  });

  it('should only report actions in dry-run mode', async () => {
    const oldLink = linkFor('Old Artist', 'Album', 'Song.flac');
    mkdirSync(linkFor('Old Artist', 'Album'), { recursive: true });
    symlinkSync(source, oldLink);

    const outcome = await reconciler({ dryRun: true }).reconcile({ tag: 'changed', track, previous: previousEntry() });

    expect(outcome).toMatchObject({ linked: true, action: 'created', removedPrevious: true });
    expect(lstatSync(oldLink).isSymbolicLink()).toBe(true);
    expect(existsSync(linkFor('Artist'))).toBe(false);
  });

  it('should report a failure when the source is gone', async () => {
    rmSync(source);

    const outcome = await reconciler().reconcile({ tag: 'new', track });

    expect(outcome.linked).toBe(false);
    expect(outcome.action).toBe('failed');
    expect(outcome.error?.code).toBe('LINK_FAILED');
    expect(outcome.record).toBe(track);
    expect(existsSync(linkFor('Artist'))).toBe(false);
  });

  it('should warn when two tracks claim the same link', async () => {
    const logger = createSilentLogger();
    const linker = new LinkReconciler({ mirrorRoot: mirror, maxNameLength: 50, safeFilenames: false, logger });
    const otherSource = join(dir, 'source', 'other.flac');
    writeFileSync(otherSource, 'other');

    await linker.reconcile({ tag: 'new', track });
    const outcome = await linker.reconcile({
      tag: 'new',
      track: { ...track, identityKey: '99ffee', fileName: 'other.flac', sourcePath: otherSource },
    });

    expect(outcome.action).toBe('replaced');
    expect(readlinkSync(linkFor('Artist', 'Album', 'Song.flac'))).toBe(otherSource);
    expect(logger.getLogs('warn')).toHaveLength(1);
  });

  it('should remove the old link of an unchanged track whose link name moved', async () => {
    const oldLink = linkFor('Artist', 'Album', 'Song.flac');
    mkdirSync(linkFor('Artist', 'Album'), { recursive: true });
    symlinkSync(source, oldLink);
    const linker = reconciler({ safeFilenames: true });

    const outcome = await linker.reconcile({
      tag: 'unchanged',
      track,
      previous: previousEntry({ artist: 'Artist', linkPath: oldLink }),
    });

    expect(outcome).toMatchObject({ linked: true, action: 'created', removedPrevious: true });
    expect(existsSync(oldLink)).toBe(false);
    expect(readlinkSync(linkFor('Artist', 'Album', 'Song-abcd.flac'))).toBe(source);
  });

  it('should leave a previous link that now points at another file', async () => {
    const oldLink = linkFor('Old Artist', 'Album', 'Song.flac');
    const otherSource = join(dir, 'source', 'other.flac');
    writeFileSync(otherSource, 'other');
    mkdirSync(linkFor('Old Artist', 'Album'), { recursive: true });
    symlinkSync(otherSource, oldLink);
    const logger = createSilentLogger();
    const linker = new LinkReconciler({ mirrorRoot: mirror, maxNameLength: 50, safeFilenames: false, logger });

    const outcome = await linker.reconcile({ tag: 'changed', track, previous: previousEntry() });

    expect(outcome).toMatchObject({ linked: true, action: 'created', removedPrevious: false });
    expect(readlinkSync(oldLink)).toBe(otherSource);
    expect(logger.getLogs('debug')[0].message).toBe(`Not removing ${oldLink}: it points at ${otherSource}`);
  });

  it('should leave a previous link claimed by another track this run', async () => {
    const oldLink = linkFor('Old Artist', 'Album', 'Song.flac');
    const otherSource = join(dir, 'source', 'other.flac');
    writeFileSync(otherSource, 'other');
    const logger = createSilentLogger();
    const linker = new LinkReconciler({ mirrorRoot: mirror, maxNameLength: 50, safeFilenames: false, logger });

    await linker.reconcile({
      tag: 'new',
      track: { ...track, identityKey: '99ffee', artist: 'Old Artist', fileName: 'other.flac', sourcePath: otherSource },
    });
    logger.clear();
    const outcome = await linker.reconcile({ tag: 'changed', track, previous: previousEntry() });

    expect(outcome.removedPrevious).toBe(false);
    expect(readlinkSync(oldLink)).toBe(otherSource);
    expect(logger.getLogs('debug')[0].message).toBe(`Not removing ${oldLink}: now linked for 99ffee`);
  });
});
