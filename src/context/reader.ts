/**
 * File Reader - bounded reads with binary sniffing and lossy UTF-8 decoding.
 */

import { closeSync, openSync, readFileSync, readSync, statSync } from 'fs';
import { looksBinary } from './binary.js';
import { fileExtension } from './filter.js';

export const TRUNCATION_MARKER = '... [truncated] ...';

export interface FileRecord {
    /** Size on disk in bytes (0 when the file could not be stat'ed) */
    size: number;
    text: string;
    /** Only the first maxBytes + 1 bytes were read */
    truncated: boolean;
    /** Binary-looking or unreadable; text is empty */
    binarySkipped: boolean;
}

function skipped(size: number): FileRecord {
    return { size, text: '', truncated: false, binarySkipped: true };
}

function readHead(filePath: string, length: number): Buffer {
    const buffer = Buffer.alloc(length);
    const fd = openSync(filePath, 'r');
    try {
        let offset = 0;
        while (offset < length) {
            const bytesRead = readSync(fd, buffer, offset, length - offset, offset);
            if (bytesRead === 0) break;
            offset += bytesRead;
        }
        return buffer.subarray(0, offset);
    } finally {
        closeSync(fd);
    }
}

/**
 * Read a file for the snapshot. `maxBytes` of 0 means no cap.
 *
 * Oversized files are sampled (maxBytes + 1 bytes) and flagged truncated.
 * Invalid UTF-8 becomes U+FFFD. I/O errors never throw: the file is
 * reported as skipped.
 */
export function readTextSafely(filePath: string, maxBytes: number): FileRecord {
    let size = 0;
    try {
        size = statSync(filePath).size;

        const capped = maxBytes > 0 && size > maxBytes;
        const data = capped ? readHead(filePath, maxBytes + 1) : readFileSync(filePath);

        if (looksBinary(data)) return skipped(size);

        return { size, text: data.toString('utf-8'), truncated: capped, binarySkipped: false };
    } catch {
        return skipped(size);
    }
}

/**
 * Split on every line boundary (`\r\n`, `\r`, `\n`, vertical tab, form feed,
 * the file/group/record separators, NEL, U+2028, U+2029). No trailing empty
 * entry after a final boundary.
 */
export function splitLines(text: string): string[] {
    const lines = text.split(/\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/);
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return lines;
}

/**
 * Keep the first `headLines` and last `tailLines` lines of truncated text,
 * separated by a marker block. With both counts at zero the text is returned
 * unchanged.
 */
export function shapeTruncated(text: string, headLines: number, tailLines: number): string {
    if (headLines <= 0 && tailLines <= 0) return text;

    const lines = splitLines(text);
    const head = headLines > 0 ? lines.slice(0, headLines) : [];
    const tail = tailLines > 0 ? lines.slice(-tailLines) : [];

    return [...head, '', TRUNCATION_MARKER, '', ...tail].join('\n');
}

/** Remove leading and trailing newline characters only. */
export function trimNewlines(text: string): string {
    return text.replace(/^\n+|\n+$/g, '');
}

/** Map file extension to markdown language hint */
const LANGUAGES: Record<string, string> = {
    '.py': 'python', '.pyi': 'python',
    '.ts': 'typescript', '.tsx': 'typescript',
    '.js': 'javascript', '.jsx': 'javascript', '.mjs': 'javascript', '.cjs': 'javascript',
    '.rs': 'rust',
    '.go': 'go',
    '.java': 'java',
    '.kt': 'kotlin',
    '.rb': 'ruby',
    '.php': 'php',
    '.cs': 'csharp',
    '.cpp': 'cpp', '.cc': 'cpp', '.c': 'c', '.h': 'c',
    '.sql': 'sql',
    '.html': 'html', '.htm': 'html',
    '.css': 'css', '.scss': 'scss',
    '.json': 'json',
    '.yaml': 'yaml', '.yml': 'yaml',
    '.toml': 'toml',
    '.cfg': 'ini', '.ini': 'ini',
    '.xml': 'xml',
    '.md': 'markdown',
    '.txt': 'text',
    '.test': 'test',
};

export function languageForExtension(ext: string): string {
    return LANGUAGES[ext.toLowerCase()] ?? '';
}

export function languageForFile(fileName: string): string {
    return languageForExtension(fileExtension(fileName));
}
