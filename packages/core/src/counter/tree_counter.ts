/**
 * TreeCounter - tallies the entries the walker emits
 *
 * Directories and links to directories count as directories; every other
 * kind counts as a file. Roots are never counted.
 *
 * @module counter
 */

import { isDirectoryLike } from '../types/entry';
import type { Entry } from '../types/entry';

export interface TreeCounts {
  directories: number;
  files: number;
}

export class TreeCounter {
  private directories = 0;
  private files = 0;

  record(entry: Entry): void {
    if (isDirectoryLike(entry)) {
      this.directories++;
    } else {
      this.files++;
    }
  }

  counts(): TreeCounts {
    return { directories: this.directories, files: this.files };
  }
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * Summary line, e.g. "1 directory, 2 files". Directories-only output drops
 * the file part.
 */
export function formatSummary(counts: TreeCounts, directoriesOnly: boolean): string {
  const directories = plural(counts.directories, 'directory', 'directories');
  return directoriesOnly ? directories : `${directories}, ${plural(counts.files, 'file', 'files')}`;
}
