import type { Confirm } from '../confirm/prompt-confirmer.js';
import type { Downloader } from '../downloader/episode-downloader.js';
import { UsageError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { diffPodcast } from '../podcast/diff-engine.js';
import type { FeedCache } from '../podcast/feed-cache.js';
import type { PodcastRegistry } from '../registry/podcast-registry.js';
import { type Episode, type Podcast, RESERVED_PODCAST_NAME } from '../types/podcast.types.js';
import { formatSize } from '../utils/format-size.js';
import { LogLevel } from '../utils/logger.js';

export type PodcastEpisodes = {
  podcast: Podcast;
  episodes: Episode[];
};

export type BatchStatus = 'up-to-date' | 'declined' | 'downloaded';

export type BatchResult = {
  status: BatchStatus;
  /** New episodes across all podcasts */
  episodeCount: number;
  /** Sum of the sizes advertised by the feeds */
  expectedBytes: number;
  /** Bytes actually written (0 unless downloaded) */
  transferredBytes: number;
  podcasts: PodcastEpisodes[];
};

export type BatchUpdaterOptions = {
  /** Approve the batch without asking */
  skipConfirmation?: boolean;
};

/**
 * Resolve command line names to podcasts. The reserved name selects every
 * managed podcast; otherwise names are looked up in the given order, each
 * podcast once.
 *
 * @throws UsageError if no name is given
 * @throws NotFoundError for an unknown name
 */
export async function resolveTargets(registry: PodcastRegistry, names: readonly string[]): Promise<Podcast[]> {
  if (names.length === 0) {
    throw new UsageError(`Name at least one podcast, or "${RESERVED_PODCAST_NAME}"`);
  }

  if (names.includes(RESERVED_PODCAST_NAME)) {
    return registry.listAll();
  }

  const podcasts: Podcast[] = [];
  for (const name of new Set(names)) {
    podcasts.push(await registry.getByName(name));
  }
  return podcasts;
}

/**
 * Refreshes and diffs a batch of podcasts, then downloads every new episode
 * behind a single confirmation.
 *
 * Any failure aborts the whole batch. Files downloaded before the failure stay on disk.
 */
export class BatchUpdater {
  constructor(
    private readonly feedCache: FeedCache,
    private readonly downloader: Downloader,
    private readonly confirm: Confirm,
    private readonly notifier: Notifier,
    private readonly options: BatchUpdaterOptions = {},
  ) {}

  async update(podcasts: readonly Podcast[]): Promise<BatchResult> {
    const pending: PodcastEpisodes[] = [];

    for (const podcast of podcasts) {
      this.notifier.notify(LogLevel.DEBUG, `Checking ${podcast.name} for new episodes...`);
      const episodes = await diffPodcast(podcast, this.feedCache);
      pending.push({ podcast, episodes });
    }

    const episodeCount = pending.reduce((sum, p) => sum + p.episodes.length, 0);
    const expectedBytes = pending.reduce(
      (sum, p) => sum + p.episodes.reduce((bytes, e) => bytes + e.expectedSize, 0),
      0,
    );
    const result: BatchResult = {
      status: 'up-to-date',
      episodeCount,
      expectedBytes,
      transferredBytes: 0,
      podcasts: pending,
    };

    if (episodeCount === 0) {
      this.notifier.notify(LogLevel.INFO, 'No new episodes. Nothing to do.');
      return result;
    }

    this.report(pending);

    const approved =
      this.options.skipConfirmation === true ||
      (await this.confirm(`Download ${episodeCount} episodes for ${formatSize(expectedBytes)}?`));

    if (!approved) {
      this.notifier.notify(LogLevel.INFO, 'Download cancelled.');
      return { ...result, status: 'declined' };
    }

    let transferredBytes = 0;
    for (const { podcast, episodes } of pending) {
      for (const episode of episodes) {
        this.notifier.notify(LogLevel.HIGHLIGHT, `Downloading ${episode.title} (${podcast.name})`);
        await this.downloader.fetch(episode, podcast.localStore);
        transferredBytes += episode.transferredBytes ?? 0;
      }
    }

    this.notifier.notify(LogLevel.SUCCESS, `Downloaded ${episodeCount} episodes (${formatSize(transferredBytes)})`);
    return { ...result, status: 'downloaded', transferredBytes };
  }

  /**
   * List the new episodes grouped by podcast
   */
  private report(pending: readonly PodcastEpisodes[]): void {
    for (const { podcast, episodes } of pending) {
      if (episodes.length === 0) continue;

      this.notifier.notify(LogLevel.INFO, `${podcast.name}:`);
      this.notifier.notify(LogLevel.INFO, '------------------');
      for (const episode of episodes) {
        this.notifier.notify(LogLevel.INFO, episode.title);
      }
    }
  }
}
