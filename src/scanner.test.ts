import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { scanSource } from './scanner.js';

describe('scanSource', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(TEST_DIR, 'scan-'));
    mkdirSync(join(root, 'sub'));
    mkdirSync(join(root, 'mirror', 'Artist'), { recursive: true });
    writeFileSync(join(root, 'a.flac'), '');
    writeFileSync(join(root, 'sub', 'B.FLAC'), '');
    writeFileSync(join(root, 'c.mp3'), '');
    writeFileSync(join(root, 'mirror', 'Artist', 'x.flac'), '');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should find matching files case-insensitively, sorted', async () => {
    const files = await scanSource(root, { extensions: ['.flac'], exclude: [join(root, 'mirror')] });

    expect(files).toEqual([join(root, 'a.flac'), join(root, 'sub', 'B.FLAC')]);
  });

  it('should include excluded folders when no exclusion is given', async () => {
    const files = await scanSource(root, { extensions: ['.flac'] });

    expect(files).toContain(join(root, 'mirror', 'Artist', 'x.flac'));
    expect(files).toHaveLength(3);
  });

  it('should accept several extensions', async () => {
    const files = await scanSource(root, { extensions: ['.flac', '.mp3'], exclude: [join(root, 'mirror')] });

    expect(files).toEqual([join(root, 'a.flac'), join(root, 'c.mp3'), join(root, 'sub', 'B.FLAC')]);
  });

  it('should ignore exclusions outside the source', async () => {
    const files = await scanSource(join(root, 'sub'), { extensions: ['.flac'], exclude: [join(root, 'mirror')] });

    expect(files).toEqual([join(root, 'sub', 'B.FLAC')]);
  });
});
