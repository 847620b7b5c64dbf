import { createWriteStream } from 'node:fs';
import { join } from 'node:path';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { FetchError, StorageError, errorMessage } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { episodeFileStem } from '../podcast/diff-engine.js';
import type { Episode } from '../types/podcast.types.js';
import { formatSize } from '../utils/format-size.js';
import { openRemote } from '../utils/http.js';
import { LogLevel } from '../utils/logger.js';
import { watchFailure } from '../utils/stream-failure.js';
import { extensionFromUrl, parseUrl } from '../utils/url-utils.js';

/**
 * Downloads a single episode into a podcast's local store
 */
export type Downloader = {
  fetch(episode: Episode, storageDir: string): Promise<void>;
};

/**
 * Streams episode media to disk, reporting progress through the notifier
 */
export class EpisodeDownloader implements Downloader {
  constructor(private readonly notifier: Notifier) {}

  /**
   * Download the episode's media to `<storageDir>/<title><ext>` and record
   * the number of bytes written in `episode.transferredBytes`.
   *
   * The destination is only created once the response is open. A failure
   * mid-transfer can leave a truncated file behind.
   *
   * @throws InvalidURLError if the media URL is malformed
   * @throws FetchError if the request or the transfer fails
   * @throws StorageError if the file cannot be written
   */
  async fetch(episode: Episode, storageDir: string): Promise<void> {
    const url = parseUrl(episode.mediaUrl);
    const source = await openRemote(url.toString());

    const destination = join(storageDir, `${episodeFileStem(episode)}${extensionFromUrl(url)}`);

    const sink = createWriteStream(destination, { flags: 'w' });
    const failedSide = watchFailure(source, sink);

    let bytes = 0;
    const counter = new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        bytes += chunk.length;
        this.reportProgress(episode, bytes);
        callback(null, chunk);
      },
    });

    try {
      await pipeline(source, counter, sink);
    } catch (error) {
      this.notifier.endProgress();
      if (failedSide() === 'source') {
        throw new FetchError(
          `Download of "${episode.title}" interrupted: ${errorMessage(error)}`,
          episode.mediaUrl,
          undefined,
          { cause: error },
        );
      }
      throw new StorageError(`Failed to write ${destination}: ${errorMessage(error)}`, destination, { cause: error });
    }

    this.notifier.endProgress();
    episode.transferredBytes = bytes;
    this.notifier.notify(LogLevel.SUCCESS, `Downloaded ${episode.title} (${formatSize(bytes)})`);
  }

  private reportProgress(episode: Episode, bytes: number): void {
    if (episode.expectedSize > 0) {
      const percentage = Math.min(100, Math.floor((bytes / episode.expectedSize) * 100));
      this.notifier.progress(
        `${episode.title}: ${formatSize(bytes)} / ${formatSize(episode.expectedSize)} (${percentage}%)`,
      );
    } else {
      this.notifier.progress(`${episode.title}: ${formatSize(bytes)}`);
    }
  }
}
