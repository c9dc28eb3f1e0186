/**
 * Config File Support
 *
 * One file to describe a snapshot run. Format by extension:
 * - .json          JSON object
 * - .toml / .tml   TOML table
 * - .ini / .cfg    INI, default section merged with [snapshot]
 * - anything else  tried as JSON
 *
 * Keys are snake_case (`include_exts`, `max_bytes`, ...). All optional.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, extname } from 'path';
import { parse as parseToml } from 'smol-toml';
import {
    DEFAULT_INCLUDE_EXTS,
    DEFAULT_EXCLUDE_DIRS,
    DEFAULT_EXCLUDE_FILES,
    DEFAULT_MAX_BYTES,
    DEFAULT_HEAD_LINES,
    DEFAULT_TAIL_LINES,
    DEFAULT_LABEL,
    DEFAULT_OUT_TEMPLATE,
    type SnapshotConfig,
} from './options.js';

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'root', 'out', 'out_template', 'label',
    'include_exts', 'exclude_dirs', 'exclude_files', 'include_globs', 'exclude_globs',
    'respect_gitignore', 'max_bytes', 'head_lines', 'tail_lines', 'show_stats',
]);

const LIST_KEYS = ['include_exts', 'exclude_dirs', 'exclude_files', 'include_globs', 'exclude_globs'];
const INT_KEYS = ['max_bytes', 'head_lines', 'tail_lines'];
const BOOL_KEYS = ['respect_gitignore', 'show_stats'];

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new Error(`Config "${key}" must be a string`);
    return val;
}

function assertInteger(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    // TOML integers may come back as bigint
    const num = typeof val === 'bigint' ? Number(val) : val;
    if (typeof num !== 'number' || !Number.isInteger(num) || num < 0) {
        throw new Error(`Config "${key}" must be a non-negative integer`);
    }
    return num;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) {
        throw new Error(`Config "${key}" must be an array of strings`);
    }
    const strings: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new Error(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── INI ─────────────────────────────────────────────────────────────────────

function splitList(value: string): string[] {
    return value.trim().split(/[\s,]+/).filter(Boolean);
}

/**
 * Minimal INI reader: keys before any header or under [DEFAULT] form the
 * defaults, overridden by [snapshot]. Other sections are ignored. Values are
 * coerced for the list, integer and boolean keys.
 */
export function parseIni(content: string): Record<string, unknown> {
    const defaults: Record<string, string> = {};
    const snapshot: Record<string, string> = {};
    let current: Record<string, string> | null = defaults;

    for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#') || line.startsWith(';')) continue;

        const header = /^\[([^\]]+)\]$/.exec(line);
        if (header) {
            const name = header[1].trim();
            current = name === 'DEFAULT' ? defaults : name === 'snapshot' ? snapshot : null;
            continue;
        }

        const sepIdx = line.search(/[=:]/);
        if (sepIdx <= 0 || current === null) continue;

        const key = line.slice(0, sepIdx).trim().toLowerCase();
        current[key] = line.slice(sepIdx + 1).trim();
    }

    const merged: Record<string, unknown> = { ...defaults, ...snapshot };

    for (const key of LIST_KEYS) {
        const val = merged[key];
        if (typeof val === 'string') merged[key] = splitList(val);
    }
    for (const key of INT_KEYS) {
        const val = merged[key];
        if (typeof val === 'string' && /^\d+$/.test(val.trim())) merged[key] = parseInt(val, 10);
    }
    for (const key of BOOL_KEYS) {
        const val = merged[key];
        if (typeof val === 'string') merged[key] = ['1', 'true', 'yes', 'on'].includes(val.trim().toLowerCase());
    }

    return merged;
}

// ── Format dispatch ─────────────────────────────────────────────────────────

function parseConfigText(raw: string, absolutePath: string): unknown {
    const ext = extname(absolutePath).toLowerCase();

    if (ext === '.toml' || ext === '.tml') {
        try {
            return parseToml(raw);
        } catch (error) {
            throw new Error(`Invalid TOML in config file: ${absolutePath}\n${error instanceof Error ? error.message : String(error)}`);
        }
    }

    if (ext === '.ini' || ext === '.cfg') {
        return parseIni(raw);
    }

    try {
        return JSON.parse(raw);
    } catch {
        if (ext === '.json') throw new Error(`Invalid JSON in config file: ${absolutePath}`);
        throw new Error(`Unsupported config format: ${absolutePath}`);
    }
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - `root` is kept as written; it resolves from the working directory like `--root`
 * - Throws on missing file, unparsable content or mistyped values
 */
export function loadConfig(configPath: string): SnapshotConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    const parsed = parseConfigText(raw, absolutePath);
    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain an object/table: ${absolutePath}`);
    }

    const obj = parsed;

    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: SnapshotConfig = {};
    if (obj.root !== undefined) config.root = assertString(obj, 'root');
    if (obj.out !== undefined) config.out = assertString(obj, 'out');
    if (obj.out_template !== undefined) config.outTemplate = assertString(obj, 'out_template');
    if (obj.label !== undefined) config.label = assertString(obj, 'label');

    if (obj.include_exts !== undefined) config.includeExts = assertStringArray(obj, 'include_exts');
    if (obj.exclude_dirs !== undefined) config.excludeDirs = assertStringArray(obj, 'exclude_dirs');
    if (obj.exclude_files !== undefined) config.excludeFiles = assertStringArray(obj, 'exclude_files');
    if (obj.include_globs !== undefined) config.includeGlobs = assertStringArray(obj, 'include_globs');
    if (obj.exclude_globs !== undefined) config.excludeGlobs = assertStringArray(obj, 'exclude_globs');

    if (obj.respect_gitignore !== undefined) config.respectGitignore = assertBoolean(obj, 'respect_gitignore');
    if (obj.max_bytes !== undefined) config.maxBytes = assertInteger(obj, 'max_bytes');
    if (obj.head_lines !== undefined) config.headLines = assertInteger(obj, 'head_lines');
    if (obj.tail_lines !== undefined) config.tailLines = assertInteger(obj, 'tail_lines');
    if (obj.show_stats !== undefined) config.showStats = assertBoolean(obj, 'show_stats');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Starter config for the `init` command, every key at its default.
 */
export const CONFIG_TEMPLATE = {
    root: '.',
    out_template: DEFAULT_OUT_TEMPLATE,
    label: DEFAULT_LABEL,
    include_exts: [...DEFAULT_INCLUDE_EXTS],
    exclude_dirs: [...DEFAULT_EXCLUDE_DIRS],
    exclude_files: [...DEFAULT_EXCLUDE_FILES],
    include_globs: [] as string[],
    exclude_globs: [] as string[],
    respect_gitignore: false,
    max_bytes: DEFAULT_MAX_BYTES,
    head_lines: DEFAULT_HEAD_LINES,
    tail_lines: DEFAULT_TAIL_LINES,
    show_stats: true,
};
