/**
 * Snapshot options: the optional-valued input struct, the resolved immutable
 * options, and the single rule that combines CLI input with a config file.
 *
 * Priority per key: CLI flag (when given) > config file > defaults below.
 */

import { homedir } from 'os';
import { resolve } from 'path';

export interface SnapshotConfig {
    root?: string;
    out?: string;
    outTemplate?: string;
    label?: string;
    includeExts?: string[];
    excludeDirs?: string[];
    excludeFiles?: string[];
    includeGlobs?: string[];
    excludeGlobs?: string[];
    respectGitignore?: boolean;
    maxBytes?: number;
    headLines?: number;
    tailLines?: number;
    showStats?: boolean;
}

export interface SnapshotOptions {
    readonly root: string;
    readonly includeExts: readonly string[];
    readonly excludeDirs: readonly string[];
    readonly excludeFiles: readonly string[];
    readonly includeGlobs: readonly string[];
    readonly excludeGlobs: readonly string[];
    readonly respectGitignore: boolean;
    /** Per-file byte cap, 0 = unlimited */
    readonly maxBytes: number;
    readonly headLines: number;
    readonly tailLines: number;
    readonly showStats: boolean;
}

// ── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_INCLUDE_EXTS: readonly string[] = [
    '.py', '.json', '.test', '.sh', '.toml', '.yml', '.yaml', '.cfg', '.ini', '.html',
    '', // files with no extension
];

export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
    '__pycache__', '.git', '.venv', 'venv', '.idea', '.mypy_cache', 'data', 'bu',
    'bootstrap', 'out', 'config', '.ipynb_checkpoints', 'assets', '.pytest_cache',
];

export const DEFAULT_EXCLUDE_FILES: readonly string[] = ['scratch.json', 'scratch.py'];

export const DEFAULT_MAX_BYTES = 0;
export const DEFAULT_HEAD_LINES = 200;
export const DEFAULT_TAIL_LINES = 80;
export const DEFAULT_LABEL = 'snapshot';
export const DEFAULT_OUT_TEMPLATE = 'snapshots/{label}_{date}_{time}.md';

// ── Merge + resolve ─────────────────────────────────────────────────────────

const CONFIG_KEYS = [
    'root', 'out', 'outTemplate', 'label',
    'includeExts', 'excludeDirs', 'excludeFiles', 'includeGlobs', 'excludeGlobs',
    'respectGitignore', 'maxBytes', 'headLines', 'tailLines', 'showStats',
] as const satisfies readonly (keyof SnapshotConfig)[];

function pick<K extends keyof SnapshotConfig>(
    target: SnapshotConfig,
    key: K,
    cli: SnapshotConfig,
    file: SnapshotConfig
): void {
    const value = cli[key] !== undefined ? cli[key] : file[key];
    if (value !== undefined) target[key] = value;
}

/** Per key: the CLI value when set, else the config-file value. */
export function mergeConfigs(cli: SnapshotConfig, file: SnapshotConfig): SnapshotConfig {
    const merged: SnapshotConfig = {};
    for (const key of CONFIG_KEYS) {
        pick(merged, key, cli, file);
    }
    return merged;
}

/** Expand `~` and `$VAR` / `${VAR}` (unset variables are left as written). */
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
    let expanded = input.trim().replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
        (match: string, braced: string | undefined, bare: string | undefined) => {
            const name = braced ?? bare ?? '';
            return env[name] ?? match;
        });

    if (expanded === '~' || expanded.startsWith('~/')) {
        expanded = homedir() + expanded.slice(1);
    }

    return expanded;
}

function nonNegative(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`Option "${name}" must be a non-negative integer. Got: ${value}`);
    }
    return value;
}

export function resolveOptions(config: SnapshotConfig): SnapshotOptions {
    return Object.freeze({
        root: resolve(expandPath(config.root || '.')),
        includeExts: Object.freeze((config.includeExts ?? DEFAULT_INCLUDE_EXTS).map(e => e.toLowerCase())),
        excludeDirs: Object.freeze([...(config.excludeDirs ?? DEFAULT_EXCLUDE_DIRS)]),
        excludeFiles: Object.freeze([...(config.excludeFiles ?? DEFAULT_EXCLUDE_FILES)]),
        includeGlobs: Object.freeze([...(config.includeGlobs ?? [])]),
        excludeGlobs: Object.freeze([...(config.excludeGlobs ?? [])]),
        respectGitignore: config.respectGitignore ?? false,
        maxBytes: nonNegative('maxBytes', config.maxBytes ?? DEFAULT_MAX_BYTES),
        headLines: nonNegative('headLines', config.headLines ?? DEFAULT_HEAD_LINES),
        tailLines: nonNegative('tailLines', config.tailLines ?? DEFAULT_TAIL_LINES),
        showStats: config.showStats ?? true,
    });
}

// ── Output path ─────────────────────────────────────────────────────────────

function pad(n: number, width = 2): string {
    return String(n).padStart(width, '0');
}

/**
 * Explicit `out` wins. Otherwise fill `{label}`, `{date}` (YYYYMMDD) and
 * `{time}` (HHMMSS, local time) into the template.
 */
export function resolveOutputPath(
    config: Pick<SnapshotConfig, 'out' | 'outTemplate' | 'label'>,
    now: Date = new Date()
): string {
    if (config.out) return config.out;

    const template = config.outTemplate || DEFAULT_OUT_TEMPLATE;
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

    const label = config.label || DEFAULT_LABEL;
    return template
        .replace(/\{label\}/g, () => label)
        .replace(/\{date\}/g, () => date)
        .replace(/\{time\}/g, () => time);
}
