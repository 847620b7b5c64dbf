import { LogLevel } from '../utils/logger.js';
import type { Config } from './config-schema.js';

export const DEFAULT_CONFIG_PATH = './podcatch.yaml';

export type ResolvedConfig = Required<Config>;

export const defaults: ResolvedConfig = {
  registryFile: 'podcasts.yaml',
  storageRoot: './podcasts',
  logLevel: LogLevel.INFO,
  useColors: true,
};
