import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import archiver from 'archiver';
import * as yauzl from 'yauzl';
import { EmptyArchiveError, FetchError, StorageError, errorMessage } from '../errors/custom-errors.js';
import { FEED_SNAPSHOT_NAME, type Podcast } from '../types/podcast.types.js';
import { openRemote } from '../utils/http.js';
import { logger } from '../utils/logger.js';
import { watchFailure } from '../utils/stream-failure.js';

/**
 * Keeps one zipped snapshot of the latest feed document per podcast
 */
export class FeedCache {
  /**
   * Full path of the zipped feed inside the podcast's local store
   */
  snapshotPath(podcast: Podcast): string {
    return join(podcast.localStore, FEED_SNAPSHOT_NAME);
  }

  /**
   * Fetch the feed and replace the snapshot with it.
   *
   * The archive is built next to the snapshot and renamed over it once
   * complete, so a failed refresh leaves the previous snapshot in place.
   */
  async refresh(podcast: Podcast): Promise<void> {
    const source = await openRemote(podcast.feedUrl);

    try {
      await mkdir(podcast.localStore, { recursive: true });
    } catch (error) {
      source.destroy();
      throw new StorageError(
        `Cannot create storage directory ${podcast.localStore}: ${errorMessage(error)}`,
        podcast.localStore,
        { cause: error },
      );
    }

    const target = this.snapshotPath(podcast);
    const partial = `${target}.partial`;

    const sink = createWriteStream(partial);
    const failedSide = watchFailure(source, sink);

    try {
      const archive = archiver('zip', { zlib: { level: 6 } });
      // archiver pipes entries internally and never sees their errors
      source.once('error', (error: Error) => archive.destroy(error));
      archive.append(source, { name: podcast.name });
      await Promise.all([pipeline(archive, sink), archive.finalize()]);
      await rename(partial, target);
    } catch (error) {
      source.destroy();
      await rm(partial, { force: true });

      if (failedSide() === 'source') {
        throw new FetchError(
          `Feed download interrupted (${podcast.feedUrl}): ${errorMessage(error)}`,
          podcast.feedUrl,
          undefined,
          { cause: error },
        );
      }
      throw new StorageError(`Failed to write feed snapshot ${target}: ${errorMessage(error)}`, target, {
        cause: error,
      });
    }

    logger.debug(`Feed snapshot of ${podcast.name} stored at ${target}`);
  }

  /**
   * Read the feed document back out of the snapshot
   *
   * @throws StorageError if the snapshot is missing or unreadable
   * @throws EmptyArchiveError if the snapshot has no entries
   */
  async open(podcast: Podcast): Promise<string> {
    const path = this.snapshotPath(podcast);
    const zipfile = await openZip(path);

    try {
      if (zipfile.entryCount === 0) {
        throw new EmptyArchiveError(path);
      }
      return await readFirstEntry(zipfile, path);
    } finally {
      zipfile.close();
    }
  }
}

function openZip(path: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, { lazyEntries: true, autoClose: false }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(new StorageError(`Cannot open feed snapshot ${path}: ${errorMessage(error)}`, path, { cause: error }));
        return;
      }
      resolve(zipfile);
    });
  });
}

function readFirstEntry(zipfile: yauzl.ZipFile, path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const fail = (error: unknown) =>
      reject(new StorageError(`Cannot read feed snapshot ${path}: ${errorMessage(error)}`, path, { cause: error }));

    zipfile.once('error', fail);
    zipfile.once('end', () => reject(new EmptyArchiveError(path)));
    zipfile.once('entry', (entry: yauzl.Entry) => {
      zipfile.openReadStream(entry, (error, stream) => {
        if (error || !stream) {
          fail(error);
          return;
        }

        const chunks: Buffer[] = [];
        stream.on('data', (chunk: Buffer) => chunks.push(chunk));
        stream.once('error', fail);
        stream.once('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      });
    });

    zipfile.readEntry();
  });
}
