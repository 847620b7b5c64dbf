import { readdir } from 'node:fs/promises';
import { extname } from 'node:path';
import { StorageError, errorMessage } from '../errors/custom-errors.js';
import { FEED_SNAPSHOT_NAME } from '../types/podcast.types.js';

/**
 * Names of everything already stored for a podcast, without extensions.
 *
 * The feed snapshot is left out. Subdirectories are listed like files.
 *
 * @param storageDir - The podcast's local store
 * @throws StorageError if the directory cannot be listed
 */
export async function listLocalIndex(storageDir: string): Promise<Set<string>> {
  let entries: string[];
  try {
    entries = await readdir(storageDir);
  } catch (error) {
    throw new StorageError(`Cannot list ${storageDir}: ${errorMessage(error)}`, storageDir, { cause: error });
  }

  const stored = new Set<string>();
  for (const entry of entries) {
    if (entry === FEED_SNAPSHOT_NAME) {
      continue;
    }
    stored.add(stripExtension(entry));
  }

  return stored;
}

export function stripExtension(fileName: string): string {
  const ext = extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
}
