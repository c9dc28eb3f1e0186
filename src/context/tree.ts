/**
 * Directory Tree Renderer - ASCII-only nested listing of what the filter keeps.
 *
 *   root
 *   |-- src
 *   |   `-- app.py
 *   `-- README
 */

import { basename } from 'path';
import { listEntries, toRelativePath, type DirEntry } from './walk.js';
import type { PathFilter } from './filter.js';

const BRANCH = '|-- ';
const LAST_BRANCH = '`-- ';
const PIPE_INDENT = '|   ';
const SPACE_INDENT = '    ';

function sortEntries(entries: DirEntry[]): DirEntry[] {
    return entries.sort((a, b) => {
        if (a.isDirectory && !b.isDirectory) return -1;
        if (!a.isDirectory && b.isDirectory) return 1;
        const la = a.name.toLowerCase();
        const lb = b.name.toLowerCase();
        if (la !== lb) return la < lb ? -1 : 1;
        return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
}

function* treeHelper(
    dirPath: string,
    parts: string[],
    prefix: string,
    filter: PathFilter
): Generator<string> {
    const visible = sortEntries(
        listEntries(dirPath).filter(e =>
            e.isDirectory
                ? filter.includeDir(e.name)
                : filter.includeFile(toRelativePath([...parts, e.name]), e.name)
        )
    );

    for (let i = 0; i < visible.length; i++) {
        const entry = visible[i];
        const isLast = i === visible.length - 1;

        yield `${prefix}${isLast ? LAST_BRANCH : BRANCH}${entry.name}`;

        if (entry.isDirectory && entry.traversable) {
            yield* treeHelper(
                entry.absolutePath,
                [...parts, entry.name],
                `${prefix}${isLast ? SPACE_INDENT : PIPE_INDENT}`,
                filter
            );
        }
    }
}

/**
 * Render the tree for `root`. Directories come first, then files, each
 * group ordered by lower-cased name. Empty directories are still shown.
 */
export function renderTree(root: string, filter: PathFilter): string {
    const lines = [basename(root)];
    for (const line of treeHelper(root, [], '', filter)) {
        lines.push(line);
    }
    return lines.join('\n');
}
