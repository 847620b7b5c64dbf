/**
 * Zod schema for the podcatch configuration file
 *
 * Types are inferred from the schema, so the two cannot drift apart.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/custom-errors.js';
import { LogLevelSchema } from '../utils/logger.js';

export const ConfigSchema = z.object({
  registryFile: z.string().min(1).optional().describe('Path to the podcast registry (YAML)'),
  storageRoot: z.string().min(1).optional().describe('Parent directory for new podcasts without --dir'),
  logLevel: LogLevelSchema.optional().describe('Minimum log level'),
  useColors: z.boolean().optional().describe('Colored console output'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate a parsed configuration file
 *
 * @param rawConfig - Parsed YAML (environment placeholders already resolved)
 * @throws ConfigError listing every issue found
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
