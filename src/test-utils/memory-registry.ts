import { AlreadyExistsError, NotFoundError, ReservedNameError } from '../errors/custom-errors.js';
import type { PodcastRegistry } from '../registry/podcast-registry.js';
import { type Podcast, RESERVED_PODCAST_NAME } from '../types/podcast.types.js';

/**
 * Registry kept in memory, for tests that do not care about the file format
 */
export class MemoryPodcastRegistry implements PodcastRegistry {
  readonly podcasts: Podcast[];

  constructor(podcasts: Podcast[] = []) {
    this.podcasts = [...podcasts];
  }

  async listAll(): Promise<Podcast[]> {
    return [...this.podcasts];
  }

  async getByName(name: string): Promise<Podcast> {
    const podcast = this.podcasts.find((p) => p.name === name);
    if (!podcast) {
      throw new NotFoundError(name);
    }
    return podcast;
  }

  async register(podcast: Podcast): Promise<void> {
    if (podcast.name === RESERVED_PODCAST_NAME) {
      throw new ReservedNameError(podcast.name);
    }
    if (this.podcasts.some((p) => p.name === podcast.name)) {
      throw new AlreadyExistsError(podcast.name);
    }
    this.podcasts.push(podcast);
  }

  async remove(name: string): Promise<Podcast> {
    const index = this.podcasts.findIndex((p) => p.name === name);
    const podcast = this.podcasts[index];
    if (!podcast) {
      throw new NotFoundError(name);
    }
    this.podcasts.splice(index, 1);
    return podcast;
  }
}
