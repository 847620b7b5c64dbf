import { existsSync } from 'node:fs';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchError, InvalidURLError, StorageError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { episodeFileStem } from '../podcast/diff-engine.js';
import { listLocalIndex } from '../podcast/local-index.js';
import { stubFetch } from '../test-utils/http-stub.js';
import type { Episode } from '../types/podcast.types.js';
import { EpisodeDownloader } from './episode-downloader.js';

describe('EpisodeDownloader', () => {
  let dir: string;
  let notifier: Notifier;
  let downloader: EpisodeDownloader;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podcatch-download-'));
    notifier = { notify: vi.fn(), progress: vi.fn(), endProgress: vi.fn() };
    downloader = new EpisodeDownloader(notifier);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the media as <title><ext> and record the byte count', async () => {
    const audio = 'a'.repeat(2048);
    stubFetch({ 'https://cdn.example.com/shows/ep2.mp3?token=abc': audio });
    const episode: Episode = {
      title: 'Ep2',
      mediaUrl: 'https://cdn.example.com/shows/ep2.mp3?token=abc',
      expectedSize: 2048,
    };

    await downloader.fetch(episode, dir);

    expect(await readFile(join(dir, 'Ep2.mp3'), 'utf-8')).toBe(audio);
    expect(episode.transferredBytes).toBe(2048);
    expect(notifier.notify).toHaveBeenCalledWith('success', 'Downloaded Ep2 (2.00 KB)');
    expect(notifier.progress).toHaveBeenLastCalledWith('Ep2: 2.00 KB / 2.00 KB (100%)');
    expect(notifier.endProgress).toHaveBeenCalled();
  });

  it('should report progress without a percentage when the size is unknown', async () => {
    stubFetch({ 'https://cdn.example.com/ep.ogg': 'x'.repeat(10) });
    const episode: Episode = { title: 'Ep', mediaUrl: 'https://cdn.example.com/ep.ogg', expectedSize: 0 };

    await downloader.fetch(episode, dir);

    expect(notifier.progress).toHaveBeenLastCalledWith('Ep: 10.00 B');
  });

  it('should store files without extension when the URL has none', async () => {
    stubFetch({ 'https://cdn.example.com/download/42': 'audio' });
    const episode: Episode = { title: 'Ep42', mediaUrl: 'https://cdn.example.com/download/42', expectedSize: 0 };

    await downloader.fetch(episode, dir);

    expect(await readdir(dir)).toEqual(['Ep42']);
  });

  it('should make the file findable by the local index afterwards', async () => {
    stubFetch({ 'https://cdn.example.com/q.mp3': 'audio' });
    const episode: Episode = { title: 'Q&A: Part 1', mediaUrl: 'https://cdn.example.com/q.mp3', expectedSize: 5 };

    await downloader.fetch(episode, dir);

    expect(await readdir(dir)).toEqual(['Q&A_ Part 1.mp3']);
    expect((await listLocalIndex(dir)).has(episodeFileStem(episode))).toBe(true);
  });

  it('should reject malformed media URLs before any request', async () => {
    const fetchSpy = stubFetch({});
    const episode: Episode = { title: 'Ep1', mediaUrl: 'ep1.mp3', expectedSize: 0 };

    await expect(downloader.fetch(episode, dir)).rejects.toThrow(InvalidURLError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should not create a file when the server answers with an error', async () => {
    stubFetch({ 'https://cdn.example.com/ep1.mp3': { status: 404 } });
    const episode: Episode = { title: 'Ep1', mediaUrl: 'https://cdn.example.com/ep1.mp3', expectedSize: 0 };

    await expect(downloader.fetch(episode, dir)).rejects.toMatchObject({ kind: 'fetch', status: 404 });
    expect(await readdir(dir)).toEqual([]);
    expect(episode.transferredBytes).toBeUndefined();
  });

  it('should raise FetchError when the transfer breaks off', async () => {
    stubFetch({
      'https://cdn.example.com/ep1.mp3': () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.error(new Error('connection reset'));
            },
          }),
        ),
    });
    const episode: Episode = { title: 'Ep1', mediaUrl: 'https://cdn.example.com/ep1.mp3', expectedSize: 0 };

    await expect(downloader.fetch(episode, dir)).rejects.toThrow(FetchError);
    expect(episode.transferredBytes).toBeUndefined();
  });

  it('should raise StorageError when the directory is missing', async () => {
    stubFetch({ 'https://cdn.example.com/ep1.mp3': 'audio' });
    const episode: Episode = { title: 'Ep1', mediaUrl: 'https://cdn.example.com/ep1.mp3', expectedSize: 0 };

    await expect(downloader.fetch(episode, join(dir, 'gone'))).rejects.toThrow(StorageError);
    expect(existsSync(join(dir, 'gone'))).toBe(false);
  });
});
