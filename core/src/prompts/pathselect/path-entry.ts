/**
 * Directory listing for the path-select prompt.
 *
 * Symlinks are resolved: an entry's `path` and `kind` describe the target,
 * and `linkPath` keeps the link itself.
 */

import { lstatSync, readdirSync, realpathSync, statSync } from "node:fs";
import { basename, extname, join } from "node:path";

export type PathKind = "file" | "directory";

export interface PathEntry {
  path: string;
  kind: PathKind;
  /** Set when the entry was reached through a symlink. */
  linkPath: string | null;
}

/** What the user may check; directories are always listed so they can be entered. */
export type PathSelectionMode = "file" | "directory" | "fileOrDirectory";

export type PathSortMode = "path" | "size" | "extension";

export type PathFilter = (entry: PathEntry) => boolean;

export interface ListingOptions {
  selectionMode: PathSelectionMode;
  filter: PathFilter;
  showHidden: boolean;
  showSymlinks: boolean;
  sortBy: PathSortMode;
}

// --- Entries ---

export function pathEntry(path: string): PathEntry {
  const target = statSync(path);
  const kind: PathKind = target.isDirectory() ? "directory" : "file";
  if (lstatSync(path).isSymbolicLink()) {
    return { path: realpathSync(path), kind, linkPath: path };
  }
  return { path, kind, linkPath: null };
}

/** e.g. "(dir) src", "notes.txt" or "latest -> /srv/releases/v2". */
export function entryLabel(entry: PathEntry): string {
  if (entry.linkPath !== null) return `${basename(entry.linkPath)} -> ${entry.path}`;
  if (entry.kind === "directory") return `(dir) ${basename(entry.path)}`;
  return basename(entry.path);
}

/** Name used for filtering and hidden-file checks: the link's own name for symlinks. */
export function entryName(entry: PathEntry): string {
  return basename(entry.linkPath ?? entry.path);
}

export function isSelectable(
  entry: PathEntry,
  mode: PathSelectionMode,
  filter: PathFilter,
): boolean {
  if (mode === "file" && entry.kind !== "file") return false;
  if (mode === "directory" && entry.kind !== "directory") return false;
  return filter(entry);
}

// --- Filters ---

function extensionOf(entry: PathEntry): string {
  return extname(entry.path).slice(1).toLowerCase();
}

export const acceptAll: PathFilter = () => true;

/** Matches entries whose extension is one of `extensions`, compared without case. */
export function acceptExtensions(...extensions: string[]): PathFilter {
  const wanted = new Set(extensions.map((ext) => ext.replace(/^\./, "").toLowerCase()));
  return (entry) => wanted.has(extensionOf(entry));
}

export function denyExtensions(...extensions: string[]): PathFilter {
  const accept = acceptExtensions(...extensions);
  return (entry) => !accept(entry);
}

// --- Listing ---

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sizeOf(entry: PathEntry): number {
  return entry.kind === "directory" ? -1 : statSync(entry.path).size;
}

function compareEntries(mode: PathSortMode): (a: PathEntry, b: PathEntry) => number {
  switch (mode) {
    case "path":
      return (a, b) => compareText(a.path, b.path);
    case "size":
      // directories first, then smallest file first
      return (a, b) => sizeOf(a) - sizeOf(b) || compareText(a.path, b.path);
    case "extension":
      return (a, b) => compareText(extensionOf(a), extensionOf(b)) || compareText(a.path, b.path);
  }
}

// dangling symlinks, and entries removed after the directory was read
function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Entries of `dir` that can be entered or selected. Throws the fs error when
 * the directory cannot be read.
 */
export function listDirectory(dir: string, options: ListingOptions): PathEntry[] {
  const entries: PathEntry[] = [];
  for (const name of readdirSync(dir)) {
    let entry: PathEntry;
    try {
      entry = pathEntry(join(dir, name));
    } catch (err) {
      if (isMissing(err)) continue;
      throw err;
    }

    if (!options.showHidden && name.startsWith(".")) continue;
    if (!options.showSymlinks && entry.linkPath !== null) continue;
    const selectable = isSelectable(entry, options.selectionMode, options.filter);
    if (entry.kind === "directory" || selectable) entries.push(entry);
  }
  return entries.sort(compareEntries(options.sortBy));
}
