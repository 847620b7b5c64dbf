import type { Episode, Podcast } from '../types/podcast.types.js';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';
import type { FeedCache } from './feed-cache.js';
import { parseFeed } from './feed-parser.js';
import { listLocalIndex } from './local-index.js';

/**
 * File name (without extension) an episode is stored under.
 * Also its identity when compared against the local index.
 */
export function episodeFileStem(episode: Pick<Episode, 'title'>): string {
  return sanitizeFilename(episode.title);
}

/**
 * Episodes of the feed that are not in local storage yet, in feed order
 *
 * @param feedDocument - Raw feed document
 * @param localIndex - Extension-stripped names of the stored files
 * @throws ParseError if the feed cannot be parsed completely
 */
export function newEpisodes(feedDocument: string, localIndex: ReadonlySet<string>): Episode[] {
  return parseFeed(feedDocument).filter((episode) => !localIndex.has(episodeFileStem(episode)));
}

/**
 * Refresh the podcast's feed snapshot, then diff it against its local store
 */
export async function diffPodcast(podcast: Podcast, feedCache: FeedCache): Promise<Episode[]> {
  await feedCache.refresh(podcast);

  const stored = await listLocalIndex(podcast.localStore);
  const document = await feedCache.open(podcast);

  return newEpisodes(document, stored);
}
