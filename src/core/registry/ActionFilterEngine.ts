/**
 * ActionFilterEngine: Tag-Based Action Selection
 *
 * Selects actions by tag criteria. Supports AND, OR, and exclusion
 * logic with Set-based lookups.
 *
 * Pure-function module: no state, no side effects.
 */
import { type ActionLike } from '../types.js';

// ── Types ────────────────────────────────────────────────

/** Filter options for selective exposure of actions */
export interface ActionFilter {
    /** Only include actions that have ALL these tags (AND logic) */
    readonly tags?: readonly string[];
    /** Only include actions that have at least ONE of these tags (OR logic) */
    readonly anyTag?: readonly string[];
    /** Exclude actions that have ANY of these tags */
    readonly exclude?: readonly string[];
}

// ── Filter Engine ────────────────────────────────────────

/** Build a predicate for a filter. An empty filter matches everything. */
export function compileFilter(filter: ActionFilter): (action: ActionLike) => boolean {
    const requiredTags = filter.tags && filter.tags.length > 0 ? [...filter.tags] : undefined;
    const anyTags = filter.anyTag && filter.anyTag.length > 0 ? new Set(filter.anyTag) : undefined;
    const excludeTags = filter.exclude && filter.exclude.length > 0 ? new Set(filter.exclude) : undefined;

    return (action) => {
        const actionTags = action.tags ?? [];

        if (requiredTags && !requiredTags.every(t => actionTags.includes(t))) return false;
        if (anyTags && !actionTags.some(t => anyTags.has(t))) return false;
        if (excludeTags && actionTags.some(t => excludeTags.has(t))) return false;
        return true;
    };
}

/**
 * Return the keys of the entries whose action matches `filter`,
 * in iteration order.
 */
export function filterActions(
    entries: Iterable<readonly [string, ActionLike]>,
    filter: ActionFilter,
): string[] {
    const matches = compileFilter(filter);
    const keys: string[] = [];
    for (const [key, action] of entries) {
        if (matches(action)) keys.push(key);
    }
    return keys;
}
