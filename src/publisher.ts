import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import chalk from 'chalk';
import { z } from 'zod';
import { KeyedLock } from './keyed-lock.js';
import { describeError, PublishError } from './errors.js';
import type { FeedSettings, Publisher } from './types.js';

export const DEFAULT_FEED_MAX_ITEMS = 50;

const feedItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  content_html: z.string(),
  url: z.string(),
  date_published: z.string(),
});

const feedSchema = z.object({
  version: z.string(),
  title: z.string(),
  items: z.array(feedItemSchema),
});

export type FeedItem = z.infer<typeof feedItemSchema>;
export type Feed = z.infer<typeof feedSchema>;

export class ConsolePublisher implements Publisher {
  async publish(title: string, body: string, link: string): Promise<void> {
    console.log(chalk.green(`\n${title}`));
    console.log(chalk.blue(link));
    // the body is HTML for feed readers; print one entry per line here
    for (const line of body.split('<br>')) {
      const text = line.replace(/<[^>]+>/g, '').trim();
      if (text) console.log(chalk.gray(text));
    }
  }
}

/**
 * Writes notifications into a JSON Feed (https://jsonfeed.org/version/1.1)
 * file, newest first. Writes are serialized so concurrent repository polls
 * never interleave on the same file.
 */
export class JsonFeedPublisher implements Publisher {
  private readonly lock = new KeyedLock();
  private readonly maxItems: number;

  constructor(
    private readonly settings: Pick<FeedSettings, 'path' | 'title'> & { maxItems?: number },
    private readonly now: () => Date = () => new Date(),
  ) {
    this.maxItems = settings.maxItems ?? DEFAULT_FEED_MAX_ITEMS;
  }

  publish(title: string, body: string, link: string, id?: string): Promise<void> {
    return this.lock.runExclusive(this.settings.path, async () => {
      const feed = this.read();
      const item: FeedItem = {
        id: id ?? crypto.createHash('sha256').update(`${link}\n${title}`).digest('hex').slice(0, 16),
        title,
        content_html: body,
        url: link,
        date_published: this.now().toISOString(),
      };

      feed.items = [item, ...feed.items.filter((existing) => existing.id !== item.id)].slice(0, this.maxItems);
      this.write(feed);
    });
  }

  read(): Feed {
    const empty: Feed = { version: 'https://jsonfeed.org/version/1.1', title: this.settings.title, items: [] };
    if (!fs.existsSync(this.settings.path)) return empty;

    try {
      const parsed = feedSchema.parse(JSON.parse(fs.readFileSync(this.settings.path, 'utf-8')));
      return { ...parsed, title: this.settings.title };
    } catch (error) {
      throw new PublishError(`Cannot read feed ${this.settings.path}: ${describeError(error)}`, error);
    }
  }

  private write(feed: Feed): void {
    try {
      fs.mkdirSync(path.dirname(this.settings.path), { recursive: true });
      fs.writeFileSync(this.settings.path, JSON.stringify(feed, null, 2) + '\n');
    } catch (error) {
      throw new PublishError(`Cannot write feed ${this.settings.path}: ${describeError(error)}`, error);
    }
  }
}

export class MultiPublisher implements Publisher {
  constructor(private readonly publishers: Publisher[]) {}

  async publish(title: string, body: string, link: string, id?: string): Promise<void> {
    const results = await Promise.allSettled(
      this.publishers.map((publisher) => publisher.publish(title, body, link, id)),
    );
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failures.length > 0) {
      throw new PublishError(
        `${failures.length} of ${this.publishers.length} publishers failed: ${failures.map((failure) => describeError(failure.reason)).join('; ')}`,
      );
    }
  }
}
