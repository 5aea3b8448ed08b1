/**
 * ConfigLoader: YAML/JSON Configuration File Reader
 *
 * Loads `action-dispatch.yaml` from cwd or a specified path, validates
 * it against {@link DispatchConfigSchema}, and fills in defaults.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { InvalidConfigError } from '../core/errors.js';
import { DEFAULT_CONFIG, parseDispatchConfig, type DispatchConfig } from './DispatchConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'action-dispatch.yaml',
    'action-dispatch.yml',
    'action-dispatch.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect a {@link CONFIG_FILENAMES} entry in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @throws InvalidConfigError if the explicit file is missing, or a file
 *   cannot be read, parsed or validated
 */
export function loadDispatchConfig(configPath?: string, cwd?: string): DispatchConfig {
    const workDir = cwd ?? process.cwd();

    // 1. Explicit path
    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new InvalidConfigError(absPath, 'file not found');
        }
        return parseConfigFile(absPath);
    }

    // 2. Auto-detect
    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    // 3. All defaults
    return { ...DEFAULT_CONFIG };
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): DispatchConfig {
    let raw: unknown;
    try {
        const content = readFileSync(filePath, 'utf-8');
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        throw new InvalidConfigError(filePath, err instanceof Error ? err.message : String(err));
    }

    // An empty YAML document parses to null
    return parseDispatchConfig(raw ?? {}, filePath);
}
