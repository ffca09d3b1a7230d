import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { normalizeRawResponseMode, RawResponseStore } from '../../core/raw-response-store';

const NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

describe('normalizeRawResponseMode', () => {
  test('should map disabled spellings to none', () => {
    for (const value of ['none', 'off', 'false', '0', 'NONE']) {
      expect(normalizeRawResponseMode(value)).toBe('none');
    }
  });

  test('should default to errors', () => {
    for (const value of ['errors', 'error', '', undefined, null]) {
      expect(normalizeRawResponseMode(value)).toBe('errors');
    }
  });

  test('should treat anything else as all', () => {
    expect(normalizeRawResponseMode('all')).toBe('all');
    expect(normalizeRawResponseMode('yes')).toBe('all');
  });
});

describe('RawResponseStore', () => {
  let dataDir: string;
  let rawDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ig-raw-'));
    rawDir = path.join(dataDir, 'raw_responses');
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  const seedFile = async (name: string, content: string, mtimeSeconds: number): Promise<void> => {
    await fs.mkdir(rawDir, { recursive: true });
    const filePath = path.join(rawDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    await fs.utimes(filePath, mtimeSeconds, mtimeSeconds);
  };

  describe('shouldSave', () => {
    test('should follow the mode', () => {
      const make = (mode: string) => new RawResponseStore({ dataDir, mode, keep: -1, maxMb: 0 });

      expect(make('none').shouldSave(500)).toBe(false);
      expect(make('errors').shouldSave(200)).toBe(false);
      expect(make('errors').shouldSave(429)).toBe(true);
      expect(make('all').shouldSave(200)).toBe(true);
    });
  });

  describe('save', () => {
    test('should write the response document', async () => {
      const store = new RawResponseStore({ dataDir, mode: 'all', keep: 200, maxMb: 100, now: () => NOW });

      const filePath = await store.save('comment_replies', 'https://www.instagram.com/api/graphql', { a: 1 }, 200, {
        ok: true,
      });

      expect(filePath).toBe(path.join(rawDir, '20240102_030405_006_comment_replies_response.json'));
      expect(JSON.parse(await fs.readFile(path.join(rawDir, '20240102_030405_006_comment_replies_response.json'), 'utf-8'))).toEqual({
        url: 'https://www.instagram.com/api/graphql',
        timestamp: '2024-01-02T03:04:05.006Z',
        status: 200,
        params: { a: 1 },
        data: { ok: true },
      });
    });

    test('should skip writing when the mode says so', async () => {
      const store = new RawResponseStore({ dataDir, mode: 'none', keep: 200, maxMb: 100 });

      await expect(store.save('comments', 'https://example.test', {}, 500, {})).resolves.toBeNull();
      await expect(fs.readdir(dataDir)).resolves.toEqual([]);
    });
  });

  describe('sweep', () => {
    test('should keep only the newest files', async () => {
      await seedFile('a_response.json', '{}', 1000);
      await seedFile('b_response.json', '{}', 2000);
      await seedFile('c_response.json', '{}', 3000);
      await seedFile('d_response.json', '{}', 4000);
      await seedFile('notes.txt', 'keep me', 500);
      const store = new RawResponseStore({ dataDir, mode: 'all', keep: 2, maxMb: 0 });

      await expect(store.sweep()).resolves.toBe(2);
      expect((await fs.readdir(rawDir)).sort()).toEqual(['c_response.json', 'd_response.json', 'notes.txt']);
    });

    test('should drop the oldest files until the size budget fits', async () => {
      await seedFile('a_response.json', '1234', 1000);
      await seedFile('b_response.json', '1234', 2000);
      await seedFile('c_response.json', '1234', 3000);
      // 0.00001 MB is a little over 10 bytes
      const store = new RawResponseStore({ dataDir, mode: 'all', keep: -1, maxMb: 0.00001 });

      await expect(store.sweep()).resolves.toBe(1);
      expect((await fs.readdir(rawDir)).sort()).toEqual(['b_response.json', 'c_response.json']);
    });

    test('should leave everything when both caps are off', async () => {
      await seedFile('a_response.json', '{}', 1000);
      await seedFile('b_response.json', '{}', 2000);
      const store = new RawResponseStore({ dataDir, mode: 'all', keep: -1, maxMb: 0 });

      await expect(store.sweep()).resolves.toBe(0);
    });

    test('should remove every file when keep is 0', async () => {
      await seedFile('a_response.json', '{}', 1000);
      const store = new RawResponseStore({ dataDir, mode: 'all', keep: 0, maxMb: 0 });

      await expect(store.sweep()).resolves.toBe(1);
      expect(await fs.readdir(rawDir)).toEqual([]);
    });

    test('should cope with a missing directory', async () => {
      const store = new RawResponseStore({ dataDir, mode: 'all', keep: 1, maxMb: 1 });

      await expect(store.sweep()).resolves.toBe(0);
    });
  });
});
