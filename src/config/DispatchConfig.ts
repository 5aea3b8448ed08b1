/**
 * DispatchConfig: Validated Dispatcher Configuration
 *
 * Controls the dispatch mode, console debugging and which actions are
 * exposed. Can be loaded from a YAML/JSON file ({@link loadDispatchConfig})
 * or built programmatically with {@link mergeConfig}.
 *
 * @module
 */
import { z } from 'zod';
import { createDebugObserver, type DebugObserverFn } from '../observability/DebugObserver.js';
import { type DispatcherOptions } from '../core/dispatch/Dispatcher.js';
import { InvalidConfigError } from '../core/errors.js';
import { formatFieldIssues } from '../core/dispatch/FieldIssueFormatter.js';

// ── Schema ───────────────────────────────────────────────

const TagList = z.array(z.string().min(1));

export const ExposeSchema = z.object({
    tags: TagList.optional(),
    anyTag: TagList.optional(),
    exclude: TagList.optional(),
}).strict();

export const DispatchConfigSchema = z.object({
    /** `blocking` awaits async actions; `nonblocking` hands back a pending invocation */
    mode: z.enum(['blocking', 'nonblocking']).default('blocking'),
    /** Print debug events through `console.debug` */
    debug: z.boolean().default(false),
    /** Tag filter restricting which actions can be dispatched */
    expose: ExposeSchema.optional(),
}).strict();

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

/** Shape accepted from files and overrides before defaults are applied */
export type PartialDispatchConfig = z.input<typeof DispatchConfigSchema>;

export const DEFAULT_CONFIG: DispatchConfig = Object.freeze(DispatchConfigSchema.parse({}));

// ── Merging ──────────────────────────────────────────────

/**
 * Merge a partial config over the defaults.
 *
 * @throws InvalidConfigError if the partial does not match {@link DispatchConfigSchema}
 */
export function mergeConfig(partial: PartialDispatchConfig): DispatchConfig {
    return parseDispatchConfig(partial, 'programmatic config');
}

/**
 * Layer overrides over a loaded config. `expose` is replaced as a whole;
 * `undefined` override values are ignored.
 *
 * @throws InvalidConfigError if the result is invalid
 */
export function applyConfigOverrides(config: DispatchConfig, overrides: PartialDispatchConfig): DispatchConfig {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined),
    );
    return parseDispatchConfig({ ...config, ...defined }, 'config overrides');
}

/**
 * Validate raw config input, reporting issues as an {@link InvalidConfigError}
 * naming `source` (a file path or a description of the caller).
 */
export function parseDispatchConfig(raw: unknown, source: string): DispatchConfig {
    const parsed = DispatchConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidConfigError(source, formatFieldIssues(parsed.error.issues, raw).join('; '));
    }
    return parsed.data;
}

// ── Mapping ──────────────────────────────────────────────

/**
 * Build {@link DispatcherOptions} from a config.
 *
 * @param observer - Used when `debug` is on. Defaults to
 *   {@link createDebugObserver}'s console output.
 */
export function toDispatcherOptions(config: DispatchConfig, observer?: DebugObserverFn): DispatcherOptions {
    return {
        mode: config.mode,
        ...(config.expose ? { expose: config.expose } : {}),
        ...(config.debug ? { debug: createDebugObserver(observer) } : {}),
    };
}
