/**
 * ResumeStore unit tests
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createEventBus } from '../../core/event-bus';
import type { CrawlerEventBus, LogMessageData } from '../../core/event-bus';
import { ResumeStore } from '../../core/resume-store';
import type { CrawlCheckpoint } from '../../types/comment';

function sampleCheckpoint(): CrawlCheckpoint {
  return {
    post: { url: 'https://www.instagram.com/p/ABC/', shortcode: 'ABC', media_id: '4162' },
    comment_count: 1,
    comments: [
      {
        id: 'c1',
        text: 'first',
        created_at: '2023-11-14T22:13:20Z',
        like_count: 2,
        gif_url: null,
        user: { id: 'u1', username: 'alice', full_name: null, is_verified: false },
        is_author: false,
        reply_count: 1,
        replies: [
          {
            id: 'r1',
            text: 'reply',
            created_at: null,
            like_count: null,
            gif_url: null,
            user: { id: null, username: null, full_name: null, is_verified: null },
            is_author: false,
            reply_count: 0,
            replies: [],
            parent_id: 'c1',
          },
        ],
      },
    ],
    seen_comment_ids: ['c1', 'r1'],
    cursor: 'cur1',
    last_cursor: 'cur1',
    pages: 1,
    expected_comment_count: 10,
    stop_reason: null,
    complete: false,
    updated_at: '2024-01-01T00:00:00.000Z',
  };
}

describe('ResumeStore', () => {
  let dataDir: string;
  let eventBus: CrawlerEventBus;
  let logs: LogMessageData[];
  let store: ResumeStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ig-resume-'));
    eventBus = createEventBus();
    logs = [];
    eventBus.onLog((data) => logs.push(data));
    store = new ResumeStore(dataDir, eventBus);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  test('should place checkpoints beside the outputs', () => {
    expect(store.pathFor('ABC')).toBe(path.join(dataDir, 'ig_comments', 'ABC_resume.json'));
  });

  test('should return null when no checkpoint exists', async () => {
    await expect(store.load('ABC')).resolves.toBeNull();
  });

  test('should round-trip a checkpoint', async () => {
    const checkpoint = sampleCheckpoint();

    await expect(store.save(checkpoint)).resolves.toBe(true);
    expect(checkpoint.updated_at).not.toBe('2024-01-01T00:00:00.000Z');

    await expect(store.load('ABC')).resolves.toEqual(checkpoint);
    expect(logs.at(-1)?.message).toBe('Loaded checkpoint for ABC: 1 comments, 1 pages');
  });

  test('should mark every stored comment id as seen', async () => {
    await fs.mkdir(path.join(dataDir, 'ig_comments'), { recursive: true });
    await fs.writeFile(store.pathFor('ABC'), JSON.stringify({ ...sampleCheckpoint(), seen_comment_ids: ['x9'] }), 'utf-8');

    const loaded = await store.load('ABC');

    expect(loaded?.seen_comment_ids).toEqual(['x9', 'c1', 'r1']);
  });

  test('should ignore unparseable checkpoints', async () => {
    await fs.mkdir(path.join(dataDir, 'ig_comments'), { recursive: true });
    await fs.writeFile(store.pathFor('ABC'), '{"post":', 'utf-8');

    await expect(store.load('ABC')).resolves.toBeNull();
  });

  test('should ignore checkpoints with the wrong shape', async () => {
    const { cursor: _cursor, ...withoutCursor } = sampleCheckpoint();
    await fs.mkdir(path.join(dataDir, 'ig_comments'), { recursive: true });
    await fs.writeFile(store.pathFor('ABC'), JSON.stringify(withoutCursor), 'utf-8');

    await expect(store.load('ABC')).resolves.toBeNull();
    expect(logs.at(-1)?.level).toBe('warn');
    expect(logs.at(-1)?.message.startsWith('Ignoring malformed checkpoint for ABC')).toBe(true);
  });

  test('should reject unknown stop reasons', async () => {
    await fs.mkdir(path.join(dataDir, 'ig_comments'), { recursive: true });
    await fs.writeFile(store.pathFor('ABC'), JSON.stringify({ ...sampleCheckpoint(), stop_reason: 'bored' }), 'utf-8');

    await expect(store.load('ABC')).resolves.toBeNull();
  });

  test('should clear a checkpoint and tolerate a missing one', async () => {
    await store.save(sampleCheckpoint());

    await store.clear('ABC');
    await store.clear('ABC');

    await expect(fs.access(store.pathFor('ABC'))).rejects.toThrow();
  });

  test('should report save failures without throwing', async () => {
    const blocker = path.join(dataDir, 'not-a-dir');
    await fs.writeFile(blocker, 'x', 'utf-8');
    const blocked = new ResumeStore(blocker, eventBus);

    await expect(blocked.save(sampleCheckpoint())).resolves.toBe(false);
    expect(logs.at(-1)).toMatchObject({ level: 'error', message: 'Failed to save checkpoint for ABC' });
  });
});
