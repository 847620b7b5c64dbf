import { createEnum } from '../utils/create-enum.js';

const errorKind = createEnum([
  'fetch',
  'storage',
  'parse',
  'empty-archive',
  'invalid-url',
  'not-found',
  'already-exists',
  'reserved-name',
  'registry',
  'config',
  'usage',
] as const);

export const ErrorKind = errorKind.object;

export type ErrorKind = typeof errorKind.type;

/**
 * Base error class for podcatch
 */
export class PodcatchError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PodcatchError';
  }
}

/**
 * Network, transport or non-success response
 */
export class FetchError extends PodcatchError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorKind.FETCH, options);
    this.name = 'FetchError';
  }
}

/**
 * Filesystem create/list/write failure
 */
export class StorageError extends PodcatchError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorKind.STORAGE, options);
    this.name = 'StorageError';
  }
}

/**
 * Malformed feed document
 */
export class ParseError extends PodcatchError {
  constructor(message: string) {
    super(message, ErrorKind.PARSE);
    this.name = 'ParseError';
  }
}

/**
 * Feed snapshot without a content entry
 */
export class EmptyArchiveError extends PodcatchError {
  constructor(public readonly path: string) {
    super(`Feed snapshot has no entries: ${path}`, ErrorKind.EMPTY_ARCHIVE);
    this.name = 'EmptyArchiveError';
  }
}

export class InvalidURLError extends PodcatchError {
  constructor(public readonly url: string) {
    super(`Invalid URL: "${url}"`, ErrorKind.INVALID_URL);
    this.name = 'InvalidURLError';
  }
}

export class NotFoundError extends PodcatchError {
  constructor(public readonly podcast: string) {
    super(`No podcast named "${podcast}"`, ErrorKind.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends PodcatchError {
  constructor(public readonly podcast: string) {
    super(`A podcast named "${podcast}" is already registered`, ErrorKind.ALREADY_EXISTS);
    this.name = 'AlreadyExistsError';
  }
}

export class ReservedNameError extends PodcatchError {
  constructor(public readonly podcast: string) {
    super(`"${podcast}" is reserved and cannot be used as a podcast name`, ErrorKind.RESERVED_NAME);
    this.name = 'ReservedNameError';
  }
}

/**
 * Registry file cannot be read or written
 */
export class RegistryError extends PodcatchError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorKind.REGISTRY, options);
    this.name = 'RegistryError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends PodcatchError {
  constructor(message: string) {
    super(message, ErrorKind.CONFIG);
    this.name = 'ConfigError';
  }
}

/**
 * Command invoked with arguments it cannot act on
 */
export class UsageError extends PodcatchError {
  constructor(message: string) {
    super(message, ErrorKind.USAGE);
    this.name = 'UsageError';
  }
}

/**
 * Narrow an unknown value to a podcatch error, optionally of a given kind
 */
export function isPodcatchError(error: unknown, kind?: ErrorKind): error is PodcatchError {
  return error instanceof PodcatchError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
