import { Readable } from 'node:stream';
import { FetchError, errorMessage } from '../errors/custom-errors.js';

/**
 * Fetch an HTTP resource and hand back its body as a Node stream.
 *
 * @throws FetchError on transport failure, non-2xx status or a missing body
 */
export async function openRemote(url: string): Promise<Readable> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new FetchError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, undefined, { cause: error });
  }

  if (!response.ok) {
    const status = [response.status, response.statusText].filter(Boolean).join(' ');
    throw new FetchError(`HTTP ${status} (${url})`, url, response.status);
  }

  if (!response.body) {
    throw new FetchError(`Empty response body (${url})`, url, response.status);
  }

  return Readable.fromWeb(response.body as Parameters<typeof Readable.fromWeb>[0]);
}
