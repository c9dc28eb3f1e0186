/**
 * Path Filter - one inclusion predicate shared by the tree renderer and the
 * file walk, so what the tree shows and what gets emitted never diverge.
 *
 * Directories: pruned when their name is excluded or hidden (leading dot).
 * Files, first failing check wins:
 *   1. exclude globs      2. .gitignore globs     3. include globs (must match one)
 *   4. excluded filenames 5. extension whitelist (lower-cased, "" = none)
 */

import { extname } from 'path';
import { matchesAnyGlob, globToRegExp } from './glob.js';
import type { SnapshotOptions } from '../config/options.js';

export type FileExclusionReason =
    | 'exclude-glob'
    | 'gitignore'
    | 'include-glob'
    | 'excluded-filename'
    | 'extension';

export interface PathFilter {
    includeDir(dirName: string): boolean;
    includeFile(relativePath: string, fileName: string): boolean;
    /** Why a file is rejected, or null when it passes. */
    fileExclusionReason(relativePath: string, fileName: string): FileExclusionReason | null;
}

export type FilterOptions = Pick<
    SnapshotOptions,
    'includeExts' | 'excludeDirs' | 'excludeFiles' | 'includeGlobs' | 'excludeGlobs'
>;

/**
 * Lower-cased extension as used by the whitelist. Dotfiles such as
 * `.gitignore` and names ending in a bare dot have no extension.
 */
export function fileExtension(fileName: string): string {
    const ext = extname(fileName);
    return ext === '.' ? '' : ext.toLowerCase();
}

export function createPathFilter(options: FilterOptions, gitignorePatterns: readonly string[] = []): PathFilter {
    const includeExts = new Set(options.includeExts.map(e => e.toLowerCase()));
    const excludeDirs = new Set(options.excludeDirs);
    const excludeFiles = new Set(options.excludeFiles);
    const includeGlobs = [...options.includeGlobs];
    const excludeGlobs = [...options.excludeGlobs];
    const gitignore = [...gitignorePatterns];

    // Compile up front; matching itself keeps no state
    for (const pattern of [...includeGlobs, ...excludeGlobs, ...gitignore]) {
        globToRegExp(pattern);
    }

    const fileExclusionReason = (relativePath: string, fileName: string): FileExclusionReason | null => {
        if (excludeGlobs.length > 0 && matchesAnyGlob(relativePath, excludeGlobs)) return 'exclude-glob';
        if (gitignore.length > 0 && matchesAnyGlob(relativePath, gitignore)) return 'gitignore';
        if (includeGlobs.length > 0 && !matchesAnyGlob(relativePath, includeGlobs)) return 'include-glob';
        if (excludeFiles.has(fileName)) return 'excluded-filename';
        if (!includeExts.has(fileExtension(fileName))) return 'extension';
        return null;
    };

    return {
        includeDir: (dirName: string) => !excludeDirs.has(dirName) && !dirName.startsWith('.'),
        includeFile: (relativePath: string, fileName: string) => fileExclusionReason(relativePath, fileName) === null,
        fileExclusionReason,
    };
}
