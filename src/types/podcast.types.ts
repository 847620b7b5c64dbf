/**
 * Name that stands for every managed podcast in batch commands
 */
export const RESERVED_PODCAST_NAME = 'all';

/**
 * File name of the cached feed snapshot inside a podcast's local store
 */
export const FEED_SNAPSHOT_NAME = 'feed.zip';

/**
 * A managed podcast subscription
 */
export type Podcast = {
  /** Unique name, also the entry name inside the feed snapshot */
  name: string;
  /** URL to retrieve the feed from */
  feedUrl: string;
  /** Directory holding downloaded media and the feed snapshot */
  localStore: string;
};

/**
 * Feed item plus its download result
 */
export type Episode = {
  title: string;
  /** Enclosure URL of the media file */
  mediaUrl: string;
  /** Size advertised by the feed in bytes (0 if unknown) */
  expectedSize: number;
  /** Bytes written to disk, set once the download succeeded */
  transferredBytes?: number;
};
