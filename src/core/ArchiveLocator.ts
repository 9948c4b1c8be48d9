import fs from 'fs';
import path from 'path';
import { ConfigurationError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ArchiveLocator');

/**
 * One region (or TRF category) and every archive found beneath its directory
 */
export interface SourceGroup {
  readonly name: string;
  readonly directory: string;
  readonly archives: readonly string[];
}

const ARCHIVE_EXTENSION = '.zip';

/**
 * Recursively collect archive paths under a directory, sorted by path
 */
export function findArchives(directory: string): string[] {
  const found: string[] = [];
  const pending = [directory];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(ARCHIVE_EXTENSION)) {
        found.push(entryPath);
      }
    }
  }

  return found.sort();
}

/**
 * Discover source groups under the input root
 *
 * Yields one group per configured region, in configured order, for the
 * first immediate subdirectory whose name matches case-insensitively.
 *
 * @throws ConfigurationError if the root is missing or not a directory
 */
export function* locateSourceGroups(
  rootDir: string,
  regions: readonly string[]
): Generator<SourceGroup> {
  if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
    throw new ConfigurationError(`Input directory not found: ${rootDir}`);
  }

  const subdirectories = fs
    .readdirSync(rootDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const region of regions) {
    const match = subdirectories.find((name) => name.toLowerCase() === region.toLowerCase());
    if (!match) {
      logger.warn(`Region directory not found, skipping: ${region}`, { rootDir });
      continue;
    }

    const directory = path.join(rootDir, match);
    const archives = findArchives(directory);
    if (archives.length === 0) {
      logger.warn(`No archives found for region ${region}`, { directory });
    }

    yield Object.freeze({
      name: region,
      directory,
      archives: Object.freeze(archives),
    });
  }
}
