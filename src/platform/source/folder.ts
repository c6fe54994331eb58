/**
 * Folder-based image source
 *
 * Lists the photographs waiting in an input directory. Entries that are not
 * regular files or do not match the pattern are reported as skipped.
 */

import { promises as fs } from 'fs';
import path from 'path';

export const DEFAULT_SOURCE_PATTERN = /\.jpg$/i;

export interface SourceListing {
  accepted: string[];
  skipped: string[];
}

export async function listSourceImages(
  directory: string,
  pattern: RegExp = DEFAULT_SOURCE_PATTERN
): Promise<SourceListing> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const accepted: string[] = [];
  const skipped: string[] = [];

  for (const entry of entries) {
    if (entry.isFile() && pattern.test(entry.name)) {
      accepted.push(entry.name);
    } else {
      skipped.push(entry.name);
    }
  }

  // Process files in a stable order regardless of filesystem
  accepted.sort();
  skipped.sort();

  return { accepted, skipped };
}

export function sourcePath(directory: string, filename: string): string {
  return path.join(directory, filename);
}
