import { ConfigError } from '../errors/custom-errors.js';

/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} syntax
 *
 * @param value - String that may contain ${VAR_NAME} placeholders
 * @returns String with environment variables resolved
 * @throws ConfigError if a referenced variable is not set
 */
export function resolveEnv(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const envValue = process.env[varName];
    if (envValue === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not set`);
    }
    return envValue;
  });
}

/**
 * Recursively resolve environment variables in parsed YAML
 */
export function resolveEnvRecursive(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvRecursive(item);
    }
    return result;
  }

  return value;
}
