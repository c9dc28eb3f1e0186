/**
 * Best-effort .gitignore support.
 *
 * Every non-empty, non-comment line of the root's .gitignore becomes a flat
 * glob for the file filter. Negation (`!`), anchoring (`/prefix`) and
 * directory-only markers (`dir/`) are NOT interpreted: the line is used as-is,
 * so `build/` matches nothing and `*.log` matches logs at any depth. This is a
 * known divergence from git.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

export function parseGitignore(content: string): string[] {
    const patterns: string[] = [];

    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#')) continue;
        patterns.push(trimmed);
    }

    return patterns;
}

/**
 * Read `<root>/.gitignore` once. Missing file → no patterns.
 * Undecodable bytes are dropped; an unreadable file is reported and ignored.
 */
export function loadGitignorePatterns(root: string): string[] {
    const gitignorePath = join(root, '.gitignore');
    if (!existsSync(gitignorePath)) return [];

    try {
        const content = readFileSync(gitignorePath, 'utf-8').replace(/\uFFFD/g, '');
        return parseGitignore(content);
    } catch (error) {
        console.warn(`Warning: Could not read ${gitignorePath}: ${error instanceof Error ? error.message : String(error)}`);
        return [];
    }
}
