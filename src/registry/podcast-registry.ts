import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import {
  AlreadyExistsError,
  NotFoundError,
  RegistryError,
  ReservedNameError,
  errorMessage,
} from '../errors/custom-errors.js';
import { formatZodError } from '../config/config-schema.js';
import { type Podcast, RESERVED_PODCAST_NAME } from '../types/podcast.types.js';

/**
 * Persisted set of podcast subscriptions
 */
export type PodcastRegistry = {
  listAll(): Promise<Podcast[]>;

  /**
   * @throws NotFoundError if no podcast has that name
   */
  getByName(name: string): Promise<Podcast>;

  /**
   * @throws ReservedNameError if the name is the reserved "all"
   * @throws AlreadyExistsError if the name is taken
   */
  register(podcast: Podcast): Promise<void>;

  /**
   * Forget a podcast. Its local store is left untouched.
   *
   * @throws NotFoundError if no podcast has that name
   */
  remove(name: string): Promise<Podcast>;
};

export const PodcastSchema = z.object({
  name: z
    .string()
    .min(1, 'Cannot be empty')
    .refine((name) => name !== RESERVED_PODCAST_NAME, { message: `"${RESERVED_PODCAST_NAME}" is reserved` })
    .describe('Unique podcast name'),
  feedUrl: z.url().describe('Feed URL'),
  localStore: z.string().min(1, 'Cannot be empty').describe('Directory for media and the feed snapshot'),
});

const RegistryFileSchema = z.object({
  podcasts: z.array(PodcastSchema).default([]),
});

type RegistryFile = z.infer<typeof RegistryFileSchema>;

/**
 * Registry stored as a YAML file:
 *
 * ```yaml
 * podcasts:
 *   - name: example
 *     feedUrl: https://example.com/feed.xml
 *     localStore: /srv/podcasts/example
 * ```
 *
 * The file is read on every call; nothing is cached between operations.
 */
export class YamlPodcastRegistry implements PodcastRegistry {
  private readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async listAll(): Promise<Podcast[]> {
    const file = await this.read();
    return file.podcasts;
  }

  async getByName(name: string): Promise<Podcast> {
    const file = await this.read();
    const podcast = file.podcasts.find((p) => p.name === name);
    if (!podcast) {
      throw new NotFoundError(name);
    }
    return podcast;
  }

  async register(podcast: Podcast): Promise<void> {
    if (podcast.name === RESERVED_PODCAST_NAME) {
      throw new ReservedNameError(podcast.name);
    }

    const file = await this.read();
    if (file.podcasts.some((p) => p.name === podcast.name)) {
      throw new AlreadyExistsError(podcast.name);
    }

    file.podcasts.push({ name: podcast.name, feedUrl: podcast.feedUrl, localStore: podcast.localStore });
    await this.write(file);
  }

  async remove(name: string): Promise<Podcast> {
    const file = await this.read();
    const index = file.podcasts.findIndex((p) => p.name === name);
    const podcast = file.podcasts[index];
    if (!podcast) {
      throw new NotFoundError(name);
    }

    file.podcasts.splice(index, 1);
    await this.write(file);
    return podcast;
  }

  private async read(): Promise<RegistryFile> {
    if (!existsSync(this.path)) {
      return { podcasts: [] };
    }

    let raw: unknown;
    try {
      raw = yaml.load(await readFile(this.path, 'utf-8'));
    } catch (error) {
      throw new RegistryError(`Cannot read registry ${this.path}: ${errorMessage(error)}`, this.path, { cause: error });
    }

    // An empty file parses to undefined
    const result = RegistryFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new RegistryError(`Invalid registry ${this.path}: ${formatZodError(result.error)}`, this.path);
    }
    return result.data;
  }

  private async write(file: RegistryFile): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, yaml.dump(file), 'utf-8');
    } catch (error) {
      throw new RegistryError(`Cannot write registry ${this.path}: ${errorMessage(error)}`, this.path, {
        cause: error,
      });
    }
  }
}
