import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AlreadyExistsError, NotFoundError, RegistryError, ReservedNameError } from '../errors/custom-errors.js';
import type { Podcast } from '../types/podcast.types.js';
import { YamlPodcastRegistry } from './podcast-registry.js';

const show: Podcast = { name: 'show', feedUrl: 'https://feeds.example.com/show.xml', localStore: '/srv/podcasts/show' };
const other: Podcast = {
  name: 'other',
  feedUrl: 'https://feeds.example.com/other.xml',
  localStore: '/srv/podcasts/other',
};

describe('YamlPodcastRegistry', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podcatch-registry-'));
    file = join(dir, 'podcasts.yaml');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should treat a missing file as an empty registry', async () => {
    const registry = new YamlPodcastRegistry(file);

    expect(await registry.listAll()).toEqual([]);
    expect(existsSync(file)).toBe(false);
  });

  it('should treat an empty file as an empty registry', async () => {
    await writeFile(file, '');

    expect(await new YamlPodcastRegistry(file).listAll()).toEqual([]);
  });

  it('should persist registrations across instances in insertion order', async () => {
    await new YamlPodcastRegistry(file).register(show);
    await new YamlPodcastRegistry(file).register(other);

    const registry = new YamlPodcastRegistry(file);
    expect(await registry.listAll()).toEqual([show, other]);
    expect(await registry.getByName('other')).toEqual(other);
  });

  it('should write the registry as YAML', async () => {
    await new YamlPodcastRegistry(file).register(show);

    expect(await readFile(file, 'utf-8')).toBe(
      [
        'podcasts:',
        '  - name: show',
        '    feedUrl: https://feeds.example.com/show.xml',
        '    localStore: /srv/podcasts/show',
        '',
      ].join('\n'),
    );
  });

  it('should create missing parent directories on write', async () => {
    const nested = join(dir, 'a', 'b', 'podcasts.yaml');

    await new YamlPodcastRegistry(nested).register(show);

    expect(existsSync(nested)).toBe(true);
  });

  it('should reject a taken name and keep the original entry', async () => {
    const registry = new YamlPodcastRegistry(file);
    await registry.register(show);

    await expect(registry.register({ ...other, name: 'show' })).rejects.toThrow(AlreadyExistsError);
    expect(await registry.listAll()).toEqual([show]);
  });

  it('should reject the reserved name', async () => {
    const registry = new YamlPodcastRegistry(file);

    await expect(registry.register({ ...show, name: 'all' })).rejects.toThrow(ReservedNameError);
    expect(existsSync(file)).toBe(false);
  });

  it('should fail lookups of unknown names', async () => {
    const registry = new YamlPodcastRegistry(file);

    await expect(registry.getByName('missing')).rejects.toThrow(NotFoundError);
    await expect(registry.getByName('missing')).rejects.toThrow('No podcast named "missing"');
  });

  it('should remove a podcast and return it', async () => {
    const registry = new YamlPodcastRegistry(file);
    await registry.register(show);
    await registry.register(other);

    const removed = await registry.remove('show');

    expect(removed).toEqual(show);
    expect(await new YamlPodcastRegistry(file).listAll()).toEqual([other]);
  });

  it('should fail to remove an unknown podcast', async () => {
    await expect(new YamlPodcastRegistry(file).remove('missing')).rejects.toThrow(NotFoundError);
  });

  it('should reject malformed YAML', async () => {
    await writeFile(file, 'podcasts: [unclosed');

    await expect(new YamlPodcastRegistry(file).listAll()).rejects.toThrow(RegistryError);
  });

  it('should reject entries that fail validation', async () => {
    await writeFile(file, ['podcasts:', '  - name: show', '    feedUrl: not a url', '    localStore: /tmp/x'].join('\n'));

    await expect(new YamlPodcastRegistry(file).listAll()).rejects.toThrow(RegistryError);
  });
});
