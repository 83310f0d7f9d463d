import { beforeAll, afterAll } from 'vitest';
import { existsSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';

// Scratch space for source trees, mirrors and index files
const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';

beforeAll(() => {
  if (!existsSync(TEST_DIR)) {
    mkdirSync(TEST_DIR, { recursive: true });
  }
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP) {
    return;
  }
  if (existsSync(TEST_DIR)) {
    try {
      rmSync(TEST_DIR, { recursive: true, force: true });
    } catch {
      // Parallel workers may still hold files open.
    }
  }
});

global.TEST_DIR = TEST_DIR;

declare global {
  var TEST_DIR: string;
}
