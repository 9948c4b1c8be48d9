import AdmZip from 'adm-zip';
import { CorruptArchiveError } from './errors.js';

const TABULAR_EXTENSION = '.csv';

/**
 * A CSV member of an archive, inflated in memory
 */
export interface TabularEntry {
  entryName: string;
  data: Buffer;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Yield every CSV member of a zip archive, in archive order
 *
 * Directories and non-CSV members are skipped. The sequence is single-pass;
 * the archive is released once the generator finishes.
 *
 * @throws CorruptArchiveError if the archive cannot be opened or a member cannot be inflated
 */
export function* extractTabularEntries(archivePath: string): Generator<TabularEntry> {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (error) {
    throw new CorruptArchiveError(archivePath, describe(error), { cause: error });
  }

  for (const entry of zip.getEntries()) {
    if (entry.isDirectory || !entry.entryName.toLowerCase().endsWith(TABULAR_EXTENSION)) {
      continue;
    }

    let data: Buffer;
    try {
      data = entry.getData();
    } catch (error) {
      throw new CorruptArchiveError(
        archivePath,
        `${entry.entryName}: ${describe(error)}`,
        { cause: error }
      );
    }

    yield { entryName: entry.entryName, data };
  }
}
