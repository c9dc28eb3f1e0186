/**
 * Shell-style wildcard matching (`*`, `?`, `[...]`, `[!...]`) on a whole
 * root-relative path string.
 *
 * Matching is flat: `*` also crosses `/`, and a double star is just two
 * stars. `src/*` matches `src/a.py` and `src/deep/b.py` alike, while a
 * pattern that spells out a slash still needs a literal `/` in the path.
 * There is no per-segment or recursive-descent interpretation.
 */

const compiled = new Map<string, RegExp>();

function escapeLiteral(ch: string): string {
    return ch.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

function escapeClassChar(ch: string): string {
    return /[\\\]\[^-]/.test(ch) ? `\\${ch}` : ch;
}

/**
 * Class body to a RegExp atom. Reversed ranges such as `z-a` match nothing
 * and are dropped; a class left empty never matches (or matches any one
 * character when negated).
 */
function translateClass(body: string, negate: boolean): string {
    let members = '';
    let k = 0;
    while (k < body.length) {
        const first = body[k];
        if (body[k + 1] === '-' && k + 2 < body.length) {
            const last = body[k + 2];
            if (first <= last) members += `${escapeClassChar(first)}-${escapeClassChar(last)}`;
            k += 3;
        } else {
            members += escapeClassChar(first);
            k++;
        }
    }

    if (members === '') return negate ? '.' : '(?!)';
    return `[${negate ? '^' : ''}${members}]`;
}

/** Translate one wildcard pattern into an anchored RegExp. */
export function globToRegExp(pattern: string): RegExp {
    const cached = compiled.get(pattern);
    if (cached) return cached;

    let source = '';
    let i = 0;
    const n = pattern.length;

    while (i < n) {
        const ch = pattern[i++];

        if (ch === '*') {
            // Collapse runs of stars, they all mean the same thing here
            while (pattern[i] === '*') i++;
            source += '.*';
        } else if (ch === '?') {
            source += '.';
        } else if (ch === '[') {
            let j = i;
            if (pattern[j] === '!') j++;
            if (pattern[j] === ']') j++;
            while (j < n && pattern[j] !== ']') j++;

            if (j >= n) {
                // Unterminated class: literal bracket
                source += '\\[';
                continue;
            }

            let body = pattern.slice(i, j);
            i = j + 1;

            let negate = false;
            if (body.startsWith('!')) {
                negate = true;
                body = body.slice(1);
            }
            source += translateClass(body, negate);
        } else {
            source += escapeLiteral(ch);
        }
    }

    const regex = new RegExp(`^${source}$`, 's');
    compiled.set(pattern, regex);
    return regex;
}

export function matchesGlob(relativePath: string, pattern: string): boolean {
    return globToRegExp(pattern).test(relativePath);
}

export function matchesAnyGlob(relativePath: string, patterns: readonly string[]): boolean {
    return patterns.some(p => matchesGlob(relativePath, p));
}
