import { join } from 'node:path';
import { boolean, command, flag, option, optional, positional, restPositionals, string, subcommands } from 'cmd-ts';
import { loadConfig } from './config/config-loader.js';
import type { ResolvedConfig } from './config/config-defaults.js';
import { type Confirm, promptConfirm } from './confirm/prompt-confirmer.js';
import { type Downloader, EpisodeDownloader } from './downloader/episode-downloader.js';
import { InvalidURLError, errorMessage, isPodcatchError } from './errors/custom-errors.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import type { Notifier } from './notifications/notifier.js';
import { FeedCache } from './podcast/feed-cache.js';
import { subscribe } from './podcast/subscriptions.js';
import { type PodcastRegistry, YamlPodcastRegistry } from './registry/podcast-registry.js';
import type { Podcast } from './types/podcast.types.js';
import { type BatchResult, BatchUpdater, resolveTargets } from './updater/batch-updater.js';
import { sanitizeFilename } from './utils/filename-sanitizer.js';
import { logger } from './utils/logger.js';
import { isValidUrl } from './utils/url-utils.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  createRegistry: (registryFile: string) => PodcastRegistry;
  createFeedCache: () => FeedCache;
  createNotifier: () => Notifier;
  createDownloader: (notifier: Notifier) => Downloader;
  confirm: Confirm;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  createRegistry: (file) => new YamlPodcastRegistry(file),
  createFeedCache: () => new FeedCache(),
  createNotifier: () => new ConsoleNotifier(),
  createDownloader: (notifier) => new EpisodeDownloader(notifier),
  confirm: promptConfirm,
};

type AppContext = {
  config: ResolvedConfig;
  registry: PodcastRegistry;
};

/**
 * Load configuration, apply logger settings and open the registry
 */
async function setup(configPath: string | undefined, deps: AppDependencies): Promise<AppContext> {
  const config = await deps.loadConfig(configPath);
  logger.setLevel(config.logLevel);
  logger.setColors(config.useColors);
  logger.debug(`Using registry ${config.registryFile}`);

  return { config, registry: deps.createRegistry(config.registryFile) };
}

export async function runAdd(
  input: { name: string; feedUrl: string; dir?: string },
  configPath: string | undefined,
  deps: AppDependencies = defaultDependencies,
): Promise<Podcast> {
  if (!isValidUrl(input.feedUrl)) {
    throw new InvalidURLError(input.feedUrl);
  }

  const { config, registry } = await setup(configPath, deps);
  const localStore = input.dir ?? join(config.storageRoot, sanitizeFilename(input.name));

  return subscribe(registry, deps.createFeedCache(), { name: input.name, feedUrl: input.feedUrl, localStore });
}

export async function runList(
  configPath: string | undefined,
  deps: AppDependencies = defaultDependencies,
): Promise<Podcast[]> {
  const { registry } = await setup(configPath, deps);
  const podcasts = await registry.listAll();

  if (podcasts.length === 0) {
    logger.info('No podcasts managed yet. Add one with "podcatch add <name> <feed-url>".');
    return podcasts;
  }

  for (const podcast of podcasts) {
    console.log(`${podcast.name}\t${podcast.feedUrl}\t${podcast.localStore}`);
  }
  return podcasts;
}

export async function runUpdate(
  names: readonly string[],
  options: { configPath?: string; yes?: boolean },
  deps: AppDependencies = defaultDependencies,
): Promise<BatchResult> {
  const { registry } = await setup(options.configPath, deps);
  const podcasts = await resolveTargets(registry, names);

  const notifier = deps.createNotifier();
  const updater = new BatchUpdater(deps.createFeedCache(), deps.createDownloader(notifier), deps.confirm, notifier, {
    skipConfirmation: options.yes,
  });

  return updater.update(podcasts);
}

export async function runRemove(
  name: string,
  configPath: string | undefined,
  deps: AppDependencies = defaultDependencies,
): Promise<Podcast> {
  const { registry } = await setup(configPath, deps);
  const podcast = await registry.remove(name);
  logger.success(`Stopped managing ${podcast.name}. Files in ${podcast.localStore} were kept.`);
  return podcast;
}

/**
 * Run a command handler, turning any error into a log line and exit code 1
 */
async function handleErrors(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (isPodcatchError(error)) {
      logger.error(`${error.name}: ${error.message}`);
    } else {
      logger.error(`Fatal error: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}

const configOption = option({
  type: optional(string),
  long: 'config',
  short: 'c',
  description: 'Path to configuration file (default: ./podcatch.yaml, optional)',
});

const add = command({
  name: 'add',
  description: 'Start managing a podcast and fetch its feed',
  args: {
    config: configOption,
    name: positional({ type: string, displayName: 'name', description: 'Name to manage the podcast under' }),
    feedUrl: positional({ type: string, displayName: 'feed-url', description: 'URL of the RSS feed' }),
    dir: option({
      type: optional(string),
      long: 'dir',
      short: 'd',
      description: 'Local storage directory (default: <storageRoot>/<name>)',
    }),
  },
  handler: ({ config, name, feedUrl, dir }) => handleErrors(() => runAdd({ name, feedUrl, dir }, config)),
});

const list = command({
  name: 'list',
  description: 'List managed podcasts',
  args: { config: configOption },
  handler: ({ config }) => handleErrors(() => runList(config)),
});

const update = command({
  name: 'update',
  description:
    'Download all episodes not yet present in local storage. The special name "all" updates every managed podcast.',
  args: {
    config: configOption,
    first: positional({ type: string, displayName: 'podcast', description: 'Podcast name or "all"' }),
    rest: restPositionals({ type: string, displayName: 'podcast' }),
    yes: flag({ type: boolean, long: 'yes', short: 'y', description: 'Download without asking for confirmation' }),
  },
  handler: ({ config, first, rest, yes }) =>
    handleErrors(() => runUpdate([first, ...rest], { configPath: config, yes })),
});

const remove = command({
  name: 'remove',
  description: 'Stop managing a podcast (downloaded files are kept)',
  args: {
    config: configOption,
    name: positional({ type: string, displayName: 'name' }),
  },
  handler: ({ config, name }) => handleErrors(() => runRemove(name, config)),
});

export const cli = subcommands({
  name: 'podcatch',
  description: 'Mirror podcast feeds into local directories',
  version: '0.1.0',
  cmds: { add, list, update, remove },
});
