import { posix } from 'node:path';
import { InvalidURLError } from '../errors/custom-errors.js';

/**
 * Parse an absolute URL
 *
 * @throws InvalidURLError if the value is not an absolute URL
 */
export function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch {
    throw new InvalidURLError(url);
  }
}

/**
 * Check if URL is valid
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * File extension of the URL path, including the dot ("" when there is none).
 * Query string and fragment are ignored.
 *
 * @example extensionFromUrl(new URL('https://cdn.example.com/ep/1.mp3?token=x')) === '.mp3'
 */
export function extensionFromUrl(url: URL): string {
  return posix.extname(url.pathname);
}
