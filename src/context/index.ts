export { validateRoot, buildSnapshot, formatHeader, formatTreeSection, formatFileSection, formatStats } from './snapshot.js';
export type { BuildOptions, SnapshotFile, SnapshotResult, SnapshotStats } from './snapshot.js';

// File reading
export { readTextSafely, shapeTruncated, splitLines, trimNewlines, languageForExtension, languageForFile, TRUNCATION_MARKER } from './reader.js';
export type { FileRecord } from './reader.js';

// Tree + walk
export { renderTree } from './tree.js';
export { collectFiles, listEntries, comparePaths } from './walk.js';
export type { CollectResult, DirEntry } from './walk.js';

// Filtering
export { createPathFilter, fileExtension } from './filter.js';
export type { PathFilter, FilterOptions, FileExclusionReason } from './filter.js';
export { globToRegExp, matchesGlob, matchesAnyGlob } from './glob.js';
export { loadGitignorePatterns, parseGitignore } from './gitignore.js';
export { looksBinary } from './binary.js';
