/**
 * Snapshot Assembler - Full pipeline:
 *
 * 1. Load .gitignore patterns (when enabled) and build the PathFilter
 * 2. Render the ASCII tree
 * 3. Walk root, collect the files that pass, sort case-insensitively
 * 4. Read each file (byte cap, binary sniff), shape truncated text
 * 5. Concatenate header, tree, file sections and the optional stats footer
 *
 * Everything is synchronous and built in memory; the caller writes the
 * document once.
 */

import { existsSync, statSync } from 'fs';
import { resolve, basename } from 'path';
import { createPathFilter } from './filter.js';
import { loadGitignorePatterns } from './gitignore.js';
import { renderTree } from './tree.js';
import { collectFiles, resolveRelative, type CollectResult } from './walk.js';
import {
    readTextSafely,
    shapeTruncated,
    trimNewlines,
    languageForFile,
} from './reader.js';
import type { SnapshotOptions } from '../config/options.js';

export interface SnapshotStats {
    /** Files emitted as sections */
    filesIncluded: number;
    /** Emitted files cut at the byte cap */
    filesTruncated: number;
    /** Selected files dropped as binary or unreadable */
    filesSkipped: number;
}

export interface SnapshotFile {
    relativePath: string;
    language: string;
    size: number;
    truncated: boolean;
}

export interface SnapshotResult {
    /** The final markdown document */
    markdown: string;
    tree: string;
    files: SnapshotFile[];
    /** Selected files that produced no section */
    skippedFiles: string[];
    /** Files the filter rejected, with the rule that rejected them */
    excludedFiles: CollectResult['excluded'];
    gitignorePatterns: string[];
    stats: SnapshotStats;
    timing: {
        treeMs: number;
        walkMs: number;
        readMs: number;
        totalMs: number;
    };
}

export interface BuildOptions {
    /** Verbose logging */
    verbose?: boolean;
}

/**
 * Validate that the root exists and is a directory.
 */
export function validateRoot(root: string): string {
    const abs = resolve(root);

    if (!existsSync(abs)) {
        throw new Error(`Path does not exist: ${root}\nResolved to: ${abs}`);
    }

    if (!statSync(abs).isDirectory()) {
        throw new Error(`Path is not a directory: ${root}\nResolved to: ${abs}`);
    }

    return abs;
}

// ── Markdown sections ───────────────────────────────────────────────────────

export function formatHeader(): string {
    return '# Project Snapshot\n';
}

export function formatTreeSection(tree: string): string {
    return `## Directory Tree\n\`\`\`text\n${tree}\n\`\`\`\n\n`;
}

export function formatFileSection(relativePath: string, language: string, text: string): string {
    return `## ${relativePath}\n\`\`\`${language}\n${text}\n\`\`\`\n\n`;
}

export function formatStats(stats: SnapshotStats, maxBytes: number): string {
    const lines = [
        '---',
        '## Snapshot Stats',
        `- files_included: ${stats.filesIncluded}`,
    ];
    if (maxBytes > 0) {
        lines.push(`- files_truncated_by_bytes: ${stats.filesTruncated}`);
    }
    lines.push(`- files_skipped_as_binary_or_unreadable: ${stats.filesSkipped}`);
    return lines.join('\n') + '\n';
}

// ── Pipeline ────────────────────────────────────────────────────────────────

export function buildSnapshot(options: SnapshotOptions, buildOptions: BuildOptions = {}): SnapshotResult {
    const totalStart = Date.now();
    const { verbose = false } = buildOptions;
    const root = validateRoot(options.root);

    const gitignorePatterns = options.respectGitignore ? loadGitignorePatterns(root) : [];
    const filter = createPathFilter(options, gitignorePatterns);

    if (verbose && options.respectGitignore) {
        console.log(`  .gitignore patterns: ${gitignorePatterns.length}`);
    }

    // ── Step 1: Tree ────────────────────────────────────────────────────────
    const treeStart = Date.now();
    const tree = renderTree(root, filter);
    const treeMs = Date.now() - treeStart;

    if (verbose) {
        console.log(`  Tree rendered in ${treeMs}ms (${tree.split('\n').length} lines)`);
    }

    // ── Step 2: Collect files ───────────────────────────────────────────────
    const walkStart = Date.now();
    const collected = collectFiles(root, filter);
    const walkMs = Date.now() - walkStart;

    if (verbose) {
        console.log(`  Selected ${collected.files.length} files, filtered out ${collected.excluded.length} in ${walkMs}ms`);
    }

    // ── Step 3: Read + format ───────────────────────────────────────────────
    const readStart = Date.now();
    const sections: string[] = [formatHeader(), formatTreeSection(tree)];
    const files: SnapshotFile[] = [];
    const skippedFiles: string[] = [];
    const stats: SnapshotStats = { filesIncluded: 0, filesTruncated: 0, filesSkipped: 0 };

    for (const relativePath of collected.files) {
        const fileName = basename(relativePath);
        const language = languageForFile(fileName);
        const record = readTextSafely(resolveRelative(root, relativePath), options.maxBytes);

        if (record.binarySkipped && !record.text) {
            stats.filesSkipped++;
            skippedFiles.push(relativePath);
            continue;
        }

        let text = record.text;
        if (record.truncated) {
            text = shapeTruncated(text, options.headLines, options.tailLines);
            stats.filesTruncated++;
        }

        sections.push(formatFileSection(relativePath, language, trimNewlines(text)));
        stats.filesIncluded++;
        files.push({ relativePath, language, size: record.size, truncated: record.truncated });
    }
    const readMs = Date.now() - readStart;

    if (verbose) {
        console.log(`  Read ${stats.filesIncluded} files in ${readMs}ms`);
        console.log(`  Skipped ${stats.filesSkipped} binary/unreadable, truncated ${stats.filesTruncated}`);
    }

    // ── Step 4: Stats footer ────────────────────────────────────────────────
    if (options.showStats) {
        sections.push(formatStats(stats, options.maxBytes));
    }

    return {
        markdown: sections.join(''),
        tree,
        files,
        skippedFiles,
        excludedFiles: collected.excluded,
        gitignorePatterns,
        stats,
        timing: { treeMs, walkMs, readMs, totalMs: Date.now() - totalStart },
    };
}
