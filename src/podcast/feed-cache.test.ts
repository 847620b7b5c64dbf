import { createWriteStream, existsSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import archiver from 'archiver';
import * as yauzl from 'yauzl';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EmptyArchiveError, FetchError, StorageError } from '../errors/custom-errors.js';
import { rssFeed, stubFetch } from '../test-utils/http-stub.js';
import type { Podcast } from '../types/podcast.types.js';
import { FeedCache } from './feed-cache.js';

const FEED_URL = 'https://feeds.example.com/show.xml';

function entryNames(path: string): Promise<string[]> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, { lazyEntries: false }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error);
        return;
      }
      const names: string[] = [];
      zipfile.on('entry', (entry: yauzl.Entry) => names.push(entry.fileName));
      zipfile.once('end', () => resolve(names));
    });
  });
}

describe('FeedCache', () => {
  let dir: string;
  let podcast: Podcast;
  const cache = new FeedCache();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podcatch-cache-'));
    podcast = { name: 'show', feedUrl: FEED_URL, localStore: join(dir, 'nested', 'show') };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should place the snapshot at feed.zip in the local store', () => {
    expect(cache.snapshotPath(podcast)).toBe(join(dir, 'nested', 'show', 'feed.zip'));
  });

  it('should store the feed as a single entry named after the podcast', async () => {
    const feed = rssFeed([{ title: 'Ep1', url: 'https://cdn.example.com/ep1.mp3' }]);
    stubFetch({ [FEED_URL]: feed });

    await cache.refresh(podcast);

    expect(await readdir(podcast.localStore)).toEqual(['feed.zip']);
    expect(await entryNames(cache.snapshotPath(podcast))).toEqual(['show']);
    expect(await cache.open(podcast)).toBe(feed);
  });

  it('should replace the previous snapshot on refresh', async () => {
    const first = rssFeed([{ title: 'Ep1', url: 'https://cdn.example.com/ep1.mp3' }]);
    const second = rssFeed([
      { title: 'Ep2', url: 'https://cdn.example.com/ep2.mp3' },
      { title: 'Ep1', url: 'https://cdn.example.com/ep1.mp3' },
    ]);

    stubFetch({ [FEED_URL]: first });
    await cache.refresh(podcast);
    stubFetch({ [FEED_URL]: second });
    await cache.refresh(podcast);

    expect(await cache.open(podcast)).toBe(second);
    expect(await entryNames(cache.snapshotPath(podcast))).toEqual(['show']);
  });

  it('should keep the previous snapshot when the server answers with an error', async () => {
    const feed = rssFeed([{ title: 'Ep1', url: 'https://cdn.example.com/ep1.mp3' }]);
    stubFetch({ [FEED_URL]: feed });
    await cache.refresh(podcast);

    stubFetch({ [FEED_URL]: { status: 503 } });
    const refresh = cache.refresh(podcast);

    await expect(refresh).rejects.toBeInstanceOf(FetchError);
    await expect(refresh).rejects.toMatchObject({ url: FEED_URL, status: 503 });
    expect(await cache.open(podcast)).toBe(feed);
    expect(await readdir(podcast.localStore)).toEqual(['feed.zip']);
  });

  it('should keep the previous snapshot when the feed breaks off mid-transfer', async () => {
    const feed = rssFeed([{ title: 'Ep1', url: 'https://cdn.example.com/ep1.mp3' }]);
    stubFetch({ [FEED_URL]: feed });
    await cache.refresh(podcast);

    let pulls = 0;
    stubFetch({
      [FEED_URL]: () =>
        new Response(
          new ReadableStream<Uint8Array>({
            pull(controller) {
              if (pulls++ === 0) {
                controller.enqueue(new TextEncoder().encode('<rss version="2.0">'));
              } else {
                controller.error(new Error('connection reset'));
              }
            },
          }),
        ),
    });

    await expect(cache.refresh(podcast)).rejects.toThrow(FetchError);
    expect(await cache.open(podcast)).toBe(feed);
    expect(await readdir(podcast.localStore)).toEqual(['feed.zip']);
  });

  it('should not touch the disk when the host is unreachable', async () => {
    stubFetch({});

    await expect(cache.refresh(podcast)).rejects.toThrow(FetchError);
    expect(existsSync(podcast.localStore)).toBe(false);
  });

  it('should raise StorageError when the store cannot be created', async () => {
    await writeFile(join(dir, 'blocker'), 'not a directory');
    const blocked = { ...podcast, localStore: join(dir, 'blocker', 'show') };
    stubFetch({ [FEED_URL]: rssFeed([]) });

    await expect(cache.refresh(blocked)).rejects.toThrow(StorageError);
  });

  it('should raise StorageError when there is no snapshot', async () => {
    await expect(cache.open(podcast)).rejects.toThrow(StorageError);
  });

  it('should raise StorageError for a corrupt snapshot', async () => {
    await mkdir(podcast.localStore, { recursive: true });
    await writeFile(cache.snapshotPath(podcast), 'definitely not a zip archive');

    await expect(cache.open(podcast)).rejects.toThrow(StorageError);
  });

  it('should raise EmptyArchiveError for a snapshot without entries', async () => {
    await mkdir(podcast.localStore, { recursive: true });
    const archive = archiver('zip');
    const written = pipeline(archive, createWriteStream(cache.snapshotPath(podcast)));
    await archive.finalize();
    await written;

    await expect(cache.open(podcast)).rejects.toThrow(EmptyArchiveError);
  });
});
