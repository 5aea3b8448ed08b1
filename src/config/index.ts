/**
 * Config: Barrel Export
 */
export {
    DispatchConfigSchema, ExposeSchema, DEFAULT_CONFIG,
    mergeConfig, applyConfigOverrides, parseDispatchConfig, toDispatcherOptions,
} from './DispatchConfig.js';
export type { DispatchConfig, PartialDispatchConfig } from './DispatchConfig.js';
export { loadDispatchConfig, CONFIG_FILENAMES } from './ConfigLoader.js';
