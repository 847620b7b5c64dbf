import { AlreadyExistsError, ReservedNameError } from '../errors/custom-errors.js';
import type { PodcastRegistry } from '../registry/podcast-registry.js';
import { type Podcast, RESERVED_PODCAST_NAME } from '../types/podcast.types.js';
import { logger } from '../utils/logger.js';
import type { FeedCache } from './feed-cache.js';

/**
 * Start managing a podcast: fetch its feed into the local store, then
 * persist the subscription. Nothing is registered if the first refresh fails.
 *
 * @throws ReservedNameError if the name is the reserved "all"
 * @throws AlreadyExistsError if a podcast with that name is registered
 */
export async function subscribe(registry: PodcastRegistry, feedCache: FeedCache, podcast: Podcast): Promise<Podcast> {
  if (podcast.name === RESERVED_PODCAST_NAME) {
    throw new ReservedNameError(podcast.name);
  }

  const existing = await registry.listAll();
  if (existing.some((p) => p.name === podcast.name)) {
    throw new AlreadyExistsError(podcast.name);
  }

  logger.info(`Fetching feed of ${podcast.name} from ${podcast.feedUrl}...`);
  await feedCache.refresh(podcast);

  await registry.register(podcast);
  logger.success(`Now managing ${podcast.name} in ${podcast.localStore}`);

  return podcast;
}
