/**
 * Command-line surface: the snapshot command (default) and `init`.
 */

import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { createRequire } from 'module';
import { buildSnapshot } from './context/index.js';
import { loadConfig, CONFIG_TEMPLATE } from './config/loader.js';
import {
    mergeConfigs,
    resolveOptions,
    resolveOutputPath,
    type SnapshotConfig,
} from './config/options.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

/** Shape of the parsed flags; variadic flags given with no values come back as `true`. */
export type CliOptions = {
    root?: string;
    out?: string;
    config?: string;
    includeExt?: string[] | true;
    excludeDir?: string[] | true;
    excludeFile?: string[] | true;
    includeGlob?: string[] | true;
    excludeGlob?: string[] | true;
    respectGitignore?: boolean;
    stats?: boolean;
    maxBytes?: number;
    headLines?: number;
    tailLines?: number;
    label?: string;
    outTemplate?: string;
    verbose?: boolean;
};

type ValueSource = (optionName: string) => string | undefined;

function parseCount(value: string): number {
    if (!/^\d+$/.test(value.trim())) {
        throw new InvalidArgumentError('Must be a non-negative integer.');
    }
    return parseInt(value, 10);
}

function listValue(value: string[] | true | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    return value === true ? [] : value;
}

/**
 * Build the CLI half of the merge: only options explicitly given on the
 * command line are set, so config-file values are not shadowed by defaults.
 */
export function cliOverrides(options: CliOptions, source: ValueSource): SnapshotConfig {
    const given = (name: keyof CliOptions) => source(name) === 'cli';
    const config: SnapshotConfig = {};

    if (given('root')) config.root = options.root;
    if (given('out')) config.out = options.out;
    if (given('outTemplate')) config.outTemplate = options.outTemplate;
    if (given('label')) config.label = options.label;

    if (given('includeExt')) config.includeExts = listValue(options.includeExt);
    if (given('excludeDir')) config.excludeDirs = listValue(options.excludeDir);
    if (given('excludeFile')) config.excludeFiles = listValue(options.excludeFile);
    if (given('includeGlob')) config.includeGlobs = listValue(options.includeGlob);
    if (given('excludeGlob')) config.excludeGlobs = listValue(options.excludeGlob);

    if (given('respectGitignore')) config.respectGitignore = options.respectGitignore === true;
    if (given('stats')) config.showStats = options.stats !== false;
    if (given('maxBytes')) config.maxBytes = options.maxBytes;
    if (given('headLines')) config.headLines = options.headLines;
    if (given('tailLines')) config.tailLines = options.tailLines;

    return config;
}

function runSnapshot(command: Command): void {
    const options = command.opts<CliOptions>();
    const cli = cliOverrides(options, name => command.getOptionValueSource(name));

    let fileConfig: SnapshotConfig = {};
    if (options.config) {
        fileConfig = loadConfig(options.config);
    }

    const merged = mergeConfigs(cli, fileConfig);
    const resolved = resolveOptions(merged);
    const outPath = resolveOutputPath(merged);
    const toStdout = outPath === '-';
    const verbose = options.verbose === true && !toStdout;

    if (verbose) {
        if (options.config) console.log(`Config loaded from: ${resolve(options.config)}`);
        console.log(`Root: ${resolved.root}`);
        console.log(`Include extensions: ${resolved.includeExts.map(e => e || '""').join(' ')}`);
        console.log(`Exclude dirs: ${resolved.excludeDirs.join(' ')}`);
        if (resolved.includeGlobs.length > 0) console.log(`Include globs: ${resolved.includeGlobs.join(' ')}`);
        if (resolved.excludeGlobs.length > 0) console.log(`Exclude globs: ${resolved.excludeGlobs.join(' ')}`);
        console.log(`Max bytes: ${resolved.maxBytes || 'unlimited'} (head ${resolved.headLines}, tail ${resolved.tailLines})`);
    }

    const result = buildSnapshot(resolved, { verbose });

    if (toStdout) {
        process.stdout.write(result.markdown);
        return;
    }

    const absolutePath = resolve(outPath);
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, result.markdown, 'utf-8');

    if (verbose) {
        const t = result.timing;
        console.log(`  Total: ${t.totalMs}ms (tree: ${t.treeMs}ms, walk: ${t.walkMs}ms, read: ${t.readMs}ms)`);
    }
    console.log(`Project snapshot saved to: ${outPath}`);
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('repo-snapshot')
        .description('Generate a Markdown project snapshot (ASCII tree + file contents) for LLMs')
        .version(pkg.version)
        .option('--root <dir>', 'Root directory to scan (default: .)')
        .option('-o, --out <file>', 'Output markdown file ("-" for stdout)')
        .option('--config <path>', 'Path to config file (TOML/JSON/INI)')
        .option('--include-ext [exts...]', 'Whitelist of file extensions (e.g. .py .json "")')
        .option('--exclude-dir [dirs...]', 'Directory names to exclude')
        .option('--exclude-file [names...]', 'File names to exclude')
        .option('--include-glob [globs...]', 'Glob(s) a file\'s relative path must match')
        .option('--exclude-glob [globs...]', 'Glob(s) that exclude a file when matched')
        .option('--respect-gitignore', 'Apply root .gitignore lines as flat globs')
        .option('--no-stats', 'Omit the stats footer')
        .option('--max-bytes <n>', 'Max bytes to read per file; 0 = unlimited', parseCount)
        .option('--head-lines <n>', 'If truncated, keep the first N lines', parseCount)
        .option('--tail-lines <n>', 'If truncated, keep the last N lines', parseCount)
        .option('--label <label>', 'Label used in the output filename template')
        .option('--out-template <template>', 'Output filename template: {label}, {date}, {time}')
        .option('--verbose', 'Verbose output')
        .action((_options: CliOptions, command: Command) => {
            try {
                runSnapshot(command);
            } catch (error) {
                console.error('Error:', error instanceof Error ? error.message : error);
                process.exitCode = 1;
            }
        });

    /**
     * Init command - create a starter config file
     */
    program
        .command('init')
        .description('Create a starter config file')
        .argument('[path]', 'Output path for config file', 'snapshot.config.json')
        .action((outputPath: string) => {
            try {
                const absolutePath = resolve(outputPath);
                if (existsSync(absolutePath)) {
                    console.error(`Error: File already exists: ${absolutePath}`);
                    console.error('Delete it first or choose a different path.');
                    process.exitCode = 1;
                    return;
                }
                const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
                writeFileSync(absolutePath, content, 'utf-8');
                console.log(`Created config file: ${absolutePath}`);
                console.log(`Use it with: repo-snapshot --config ${outputPath}`);
            } catch (error) {
                console.error('Error:', error instanceof Error ? error.message : error);
                process.exitCode = 1;
            }
        });

    return program;
}
