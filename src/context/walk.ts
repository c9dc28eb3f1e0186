/**
 * Directory listing and the flat file walk.
 *
 * Both the tree renderer and the walk list directories through `listEntries`
 * and decide inclusion through the same PathFilter. Unreadable directories
 * yield no entries, so a bad subtree is skipped instead of failing the run.
 */

import { readdirSync, statSync } from 'fs';
import { join } from 'path';
import type { PathFilter, FileExclusionReason } from './filter.js';

export interface DirEntry {
    name: string;
    absolutePath: string;
    isDirectory: boolean;
    /** False for symlinked directories: they are shown but never entered. */
    traversable: boolean;
}

export interface CollectResult {
    /** Root-relative, `/`-separated, unique, case-insensitively sorted */
    files: string[];
    excluded: { path: string; reason: FileExclusionReason }[];
}

export function toRelativePath(parts: readonly string[]): string {
    return parts.join('/');
}

/** Dangling links count as files; the reader will skip them. */
function isDirectoryTarget(linkPath: string): boolean {
    try {
        return statSync(linkPath).isDirectory();
    } catch {
        return false;
    }
}

export function listEntries(dirPath: string): DirEntry[] {
    let dirents;
    try {
        dirents = readdirSync(dirPath, { withFileTypes: true });
    } catch {
        return [];
    }

    const entries: DirEntry[] = [];
    for (const dirent of dirents) {
        const absolutePath = join(dirPath, dirent.name);

        if (dirent.isDirectory()) {
            entries.push({ name: dirent.name, absolutePath, isDirectory: true, traversable: true });
        } else if (dirent.isFile()) {
            entries.push({ name: dirent.name, absolutePath, isDirectory: false, traversable: false });
        } else if (dirent.isSymbolicLink()) {
            entries.push({ name: dirent.name, absolutePath, isDirectory: isDirectoryTarget(absolutePath), traversable: false });
        }
        // Sockets, FIFOs and devices are never listed
    }

    return entries;
}

/** Case-insensitive path order with a case-sensitive tie-break. */
export function comparePaths(a: string, b: string): number {
    const la = a.toLowerCase();
    const lb = b.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Walk everything reachable from root, pruning on the directory rule and
 * keeping files that pass the file rule.
 */
export function collectFiles(root: string, filter: PathFilter): CollectResult {
    const found = new Set<string>();
    const excluded: CollectResult['excluded'] = [];

    const walk = (dirPath: string, parts: string[]): void => {
        for (const entry of listEntries(dirPath)) {
            const entryParts = [...parts, entry.name];

            if (entry.isDirectory) {
                if (entry.traversable && filter.includeDir(entry.name)) {
                    walk(entry.absolutePath, entryParts);
                }
                continue;
            }

            const relativePath = toRelativePath(entryParts);
            const reason = filter.fileExclusionReason(relativePath, entry.name);
            if (reason) {
                excluded.push({ path: relativePath, reason });
            } else {
                found.add(relativePath);
            }
        }
    };

    walk(root, []);

    return {
        files: [...found].sort(comparePaths),
        excluded: excluded.sort((a, b) => comparePaths(a.path, b.path)),
    };
}

/** Absolute path for a root-relative `/` path on this platform. */
export function resolveRelative(root: string, relativePath: string): string {
    return join(root, ...relativePath.split('/'));
}
