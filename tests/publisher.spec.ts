import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PublishError } from '../src/errors.js';
import { ConsolePublisher, JsonFeedPublisher, MultiPublisher } from '../src/publisher.js';
import { RecordingPublisher } from './support/memory-vcs.js';

describe('JsonFeedPublisher', () => {
  let tmpDir: string;
  let feedPath: string;
  const now = () => new Date('2024-05-01T12:00:00.000Z');

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'branch-watch-feed-'));
    feedPath = path.join(tmpDir, 'nested', 'feed.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the feed file with one item', async () => {
    const publisher = new JsonFeedPublisher({ path: feedPath, title: 'Watched branches' }, now);

    await publisher.publish('demo (aaaa1111 .. bbbb2222)', '<b>body</b>', 'https://example.test/demo.git', 'demo@bbbb2222');

    const feed = publisher.read();
    expect(feed.version).toBe('https://jsonfeed.org/version/1.1');
    expect(feed.title).toBe('Watched branches');
    expect(feed.items).toHaveLength(1);
    expect(feed.items[0]).toEqual({
      id: 'demo@bbbb2222',
      title: 'demo (aaaa1111 .. bbbb2222)',
      content_html: '<b>body</b>',
      url: 'https://example.test/demo.git',
      date_published: '2024-05-01T12:00:00.000Z',
    });
  });

  it('derives an id from link and title when none is given', async () => {
    const publisher = new JsonFeedPublisher({ path: feedPath, title: 'feed' }, now);

    await publisher.publish('manual', 'body', 'https://example.test/a.git');

    expect(publisher.read().items[0]?.id).toMatch(/^[0-9a-f]{16}$/);
  });

  it('puts the newest item first and keeps at most maxItems', async () => {
    const publisher = new JsonFeedPublisher({ path: feedPath, title: 'feed', maxItems: 2 }, now);

    await publisher.publish('first', 'body', 'https://example.test/a.git');
    await publisher.publish('second', 'body', 'https://example.test/a.git');
    await publisher.publish('third', 'body', 'https://example.test/a.git');

    expect(publisher.read().items.map((item) => item.title)).toEqual(['third', 'second']);
  });

  it('replaces an item published twice for the same commit', async () => {
    const publisher = new JsonFeedPublisher({ path: feedPath, title: 'feed' }, now);

    await publisher.publish('demo (aaaa1111 .. bbbb2222)', 'old body', 'https://example.test/a.git', 'demo@bbbb2222');
    await publisher.publish('other (cccc3333 .. dddd4444)', 'body', 'https://example.test/b.git', 'other@dddd4444');
    await publisher.publish('demo (aaaa1111 .. bbbb2222)', 'new body', 'https://example.test/a.git', 'demo@bbbb2222');

    expect(publisher.read().items.map((item) => [item.id, item.content_html])).toEqual([
      ['demo@bbbb2222', 'new body'],
      ['other@dddd4444', 'body'],
    ]);
  });

  it('does not lose items published concurrently', async () => {
    const publisher = new JsonFeedPublisher({ path: feedPath, title: 'feed' }, now);

    await Promise.all(['a', 'b', 'c'].map((title) => publisher.publish(title, 'body', 'https://example.test/x.git')));

    expect(publisher.read().items.map((item) => item.title).sort()).toEqual(['a', 'b', 'c']);
  });

  it('refuses to overwrite a file that is not a feed', async () => {
    fs.mkdirSync(path.dirname(feedPath), { recursive: true });
    fs.writeFileSync(feedPath, '{"hello": "world"}');
    const publisher = new JsonFeedPublisher({ path: feedPath, title: 'feed' }, now);

    await expect(publisher.publish('t', 'b', 'l')).rejects.toBeInstanceOf(PublishError);
    expect(fs.readFileSync(feedPath, 'utf-8')).toBe('{"hello": "world"}');
  });
});

describe('ConsolePublisher', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the title, link and each body line without markup', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await new ConsolePublisher().publish('demo', '<b>aaaa</b><br>Added - a.ts<br><b>bbbb</b>', 'https://example.test/demo.git');

    expect(log).toHaveBeenCalledTimes(5);
    expect(String(log.mock.calls[2]?.[0])).toContain('aaaa');
    expect(String(log.mock.calls[3]?.[0])).toContain('Added - a.ts');
  });
});

describe('MultiPublisher', () => {
  it('delivers to every publisher', async () => {
    const first = new RecordingPublisher();
    const second = new RecordingPublisher();

    await new MultiPublisher([first, second]).publish('t', 'b', 'l', 'demo@bbbb2222');

    expect(first.items).toEqual([{ id: 'demo@bbbb2222', title: 't', body: 'b', link: 'l' }]);
    expect(second.items).toEqual([{ id: 'demo@bbbb2222', title: 't', body: 'b', link: 'l' }]);
  });

  it('still delivers to the others when one fails', async () => {
    const failing = new RecordingPublisher();
    failing.failWith = new Error('disk full');
    const working = new RecordingPublisher();

    await expect(new MultiPublisher([failing, working]).publish('t', 'b', 'l')).rejects.toThrow(
      '1 of 2 publishers failed: disk full',
    );
    expect(working.items).toHaveLength(1);
  });
});
