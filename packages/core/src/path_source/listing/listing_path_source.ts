/**
 * ListingPathSource - PathSource over one or more path listings
 *
 * Rebuilds an implied hierarchy from flat listings without touching the real
 * filesystem. Each listing becomes one root, labelled with the location it
 * was read from ("." for standard input).
 *
 * @module path_source/listing/listing_path_source
 */

import { joinDisplayPath } from '../../types/entry';
import type { Entry, EntryKind, EntryMetadata } from '../../types/entry';
import type { PathSource, RootResolution } from '../path_source';
import { PathSourceError } from '../path_source.errors';
import { parseListing } from './listing_parser';
import type { ListingRecord } from './listing_parser';

/**
 * A listing to expose as a root: its text, or the error that kept it from
 * being read.
 */
export type ListingInput =
  | { label: string; text: string }
  | { label: string; error: PathSourceError };

interface ListingNode {
  name: string;
  explicitDirectory: boolean;
  symlink: boolean;
  linkTarget?: string;
  metadata?: EntryMetadata;
  children: Map<string, ListingNode>;
}

function createNode(name: string): ListingNode {
  return { name, explicitDirectory: false, symlink: false, children: new Map() };
}

function nodeKind(node: ListingNode): EntryKind {
  if (node.symlink) return 'symlink';
  // Files that later lines gave children are promoted to directories
  if (node.explicitDirectory || node.children.size > 0) return 'directory';
  return 'file';
}

function insert(root: ListingNode, record: ListingRecord): void {
  let parent = root;

  record.segments.forEach((segment, index) => {
    let node = parent.children.get(segment);
    if (!node) {
      node = createNode(segment);
      parent.children.set(segment, node);
    }

    const isLeaf = index === record.segments.length - 1;
    if (!isLeaf) {
      // Intermediate segments are directories whether listed or not
      node.explicitDirectory = true;
    } else {
      if (record.isDirectory) node.explicitDirectory = true;
      if (record.isSymlink) node.symlink = true;
      if (record.linkTarget !== undefined) node.linkTarget = record.linkTarget;
      if (record.metadata) node.metadata = record.metadata;
    }

    parent = node;
  });
}

export class ListingPathSource implements PathSource {
  private readonly rootResolutions: RootResolution[] = [];
  // One node tree per listing, reached through the entries handed out
  private readonly nodesByEntry = new WeakMap<Entry, ListingNode>();

  constructor(listings: readonly ListingInput[]) {
    for (const listing of listings) {
      if ('error' in listing) {
        this.rootResolutions.push({ location: listing.label, error: listing.error });
        continue;
      }

      const root = createNode(listing.label);
      root.explicitDirectory = true;
      for (const record of parseListing(listing.text)) {
        insert(root, record);
      }

      const entry: Entry = { name: listing.label, path: listing.label, kind: 'directory', depth: 0, isLast: false };
      this.nodesByEntry.set(entry, root);
      this.rootResolutions.push({ location: listing.label, entry });
    }
  }

  /**
   * Convenience constructor for a single in-memory listing.
   */
  static fromText(text: string, label: string = '.'): ListingPathSource {
    return new ListingPathSource([{ label, text }]);
  }

  roots(): RootResolution[] {
    return [...this.rootResolutions];
  }

  isTraversable(entry: Entry): boolean {
    return entry.kind === 'directory';
  }

  readChildren(entry: Entry): Entry[] {
    const node = this.nodesByEntry.get(entry);
    if (!node) {
      throw new PathSourceError(`No such entry in listing: ${entry.path}`, 'NOT_FOUND', entry.path);
    }
    if (nodeKind(node) !== 'directory') {
      throw new PathSourceError(`Not a directory: ${entry.path}`, 'NOT_A_DIRECTORY', entry.path);
    }

    return Array.from(node.children.values(), child => {
      const childEntry: Entry = {
        name: child.name,
        path: joinDisplayPath(entry.path, child.name),
        kind: nodeKind(child),
        depth: entry.depth + 1,
        isLast: false,
      };
      if (child.metadata) childEntry.metadata = child.metadata;
      if (child.linkTarget !== undefined) childEntry.linkTarget = child.linkTarget;
      this.nodesByEntry.set(childEntry, child);
      return childEntry;
    });
  }

  realPath(): string | undefined {
    return undefined;
  }
}
