export * from './context/index.js';

export { loadConfig, parseIni, CONFIG_TEMPLATE } from './config/loader.js';
export {
    mergeConfigs,
    resolveOptions,
    resolveOutputPath,
    expandPath,
    DEFAULT_INCLUDE_EXTS,
    DEFAULT_EXCLUDE_DIRS,
    DEFAULT_EXCLUDE_FILES,
} from './config/options.js';
export type { SnapshotConfig, SnapshotOptions } from './config/options.js';
