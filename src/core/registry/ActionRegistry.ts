/**
 * ActionRegistry: Keyed Store of Actions
 *
 * Holds actions under unique string keys, in insertion order. Every
 * stored value passes the `action` or `async-action` capability check,
 * and the registry itself passes the `registry` check.
 *
 * There is no shared instance: construct one, pass it to a
 * {@link Dispatcher}, and tear it down with {@link ActionRegistry.clear}.
 *
 * All operations are synchronous and never suspend, so two callers racing
 * to `create()` the same key always produce one success and one
 * {@link DuplicateKeyError}.
 *
 * @example
 * ```typescript
 * const registry = new ActionRegistry();
 *
 * registry.create('echo', createAction(({ x }: { x: number }) => x));
 * registry.create('slowAdd', createAsyncAction(async ({ a, b }: { a: number; b: number }) => a + b));
 *
 * registry.keys();           // ['echo', 'slowAdd']
 * registry.retrieve('echo'); // the SyncAction
 *
 * // Teardown (e.g. in tests)
 * registry.clear();
 * ```
 *
 * @module
 */
import { type ActionLike, type ActionSource } from '../types.js';
import { CapabilityMismatchError, DuplicateKeyError, KeyNotFoundError } from '../errors.js';
import { isActionLike, missingCapabilities } from '../capability/CapabilityCheck.js';
import { type DebugObserverFn } from '../../observability/DebugObserver.js';
import { type ActionFilter, filterActions } from './ActionFilterEngine.js';

export class ActionRegistry implements ActionSource {
    /** Marks this object as a keyed store for the `registry` capability role. */
    readonly keystore = 'memory';
    private readonly _actions = new Map<string, ActionLike>();
    private _debug?: DebugObserverFn;

    /**
     * @param entries - Optional initial entries, stored through {@link create}
     */
    constructor(entries: Iterable<readonly [string, unknown]> = []) {
        for (const [key, action] of entries) {
            this.create(key, action);
        }
    }

    // ── Mutations ────────────────────────────────────────

    /**
     * Store an action under a new key.
     *
     * @throws DuplicateKeyError if the key is taken
     * @throws CapabilityMismatchError if the candidate satisfies neither action role
     */
    create(key: string, action: unknown): void {
        if (this._actions.has(key)) {
            throw new DuplicateKeyError(key);
        }
        this._actions.set(key, assertActionLike(action));
        this._emitRegister(key);
    }

    /**
     * Store an action under a key, replacing (and disposing) any previous
     * entry. A replaced entry keeps its position in {@link keys}.
     *
     * @throws CapabilityMismatchError if the candidate satisfies neither action role
     */
    set(key: string, action: unknown): void {
        const next = assertActionLike(action);
        const previous = this._actions.get(key);
        this._actions.set(key, next);
        if (previous && previous !== next) {
            this._emitRemove(key);
            previous.dispose?.();
        }
        this._emitRegister(key);
    }

    /**
     * Remove an action and dispose it.
     *
     * @throws KeyNotFoundError if nothing is registered under the key
     */
    delete(key: string): void {
        const action = this._actions.get(key);
        if (!action) {
            throw new KeyNotFoundError(key, this.keys());
        }
        this._actions.delete(key);
        this._emitRemove(key);
        action.dispose?.();
    }

    /**
     * Remove and dispose every action.
     *
     * All entries are removed even when a dispose hook throws; the
     * failures are rethrown together afterwards.
     *
     * @throws AggregateError if one or more dispose hooks threw
     */
    clear(): void {
        const removed = Array.from(this._actions);
        this._actions.clear();

        const failures: unknown[] = [];
        for (const [key, action] of removed) {
            this._emitRemove(key);
            try {
                action.dispose?.();
            } catch (err) {
                failures.push(err);
            }
        }
        if (failures.length > 0) {
            throw new AggregateError(failures, `${failures.length} action(s) failed to dispose.`);
        }
    }

    // ── Lookups ──────────────────────────────────────────

    /**
     * Get the action registered under a key.
     *
     * @throws KeyNotFoundError if nothing is registered under the key
     */
    retrieve(key: string): ActionLike {
        const action = this._actions.get(key);
        if (!action) {
            throw new KeyNotFoundError(key, this.keys());
        }
        return action;
    }

    /** Get the action registered under a key, or `undefined`. */
    get(key: string): ActionLike | undefined {
        return this._actions.get(key);
    }

    has(key: string): boolean {
        return this._actions.has(key);
    }

    /** Snapshot of the keys in insertion order. Later mutations do not affect it. */
    keys(): string[] {
        return Array.from(this._actions.keys());
    }

    /**
     * Keys of the actions matching a tag filter, in insertion order.
     * Without a filter, same as {@link keys}.
     */
    list(filter: ActionFilter = {}): string[] {
        return filterActions(this._actions, filter);
    }

    /** Number of registered actions. */
    get size(): number {
        return this._actions.size;
    }

    // ── Observability ────────────────────────────────────

    /** Emit `register` / `remove` events to an observer. */
    enableDebug(observer: DebugObserverFn): void {
        this._debug = observer;
    }

    private _emitRegister(key: string): void {
        const action = this._actions.get(key);
        if (this._debug && action) {
            this._debug({ type: 'register', key, kind: action.kind, timestamp: Date.now() });
        }
    }

    private _emitRemove(key: string): void {
        this._debug?.({ type: 'remove', key, timestamp: Date.now() });
    }
}

// ── Internal ─────────────────────────────────────────────

function assertActionLike(candidate: unknown): ActionLike {
    if (isActionLike(candidate)) return candidate;
    // Report against whichever action role the candidate comes closer to
    const missing = missingCapabilities(candidate, 'action');
    const missingAsync = missingCapabilities(candidate, 'async-action');
    if (missingAsync.length < missing.length) {
        throw new CapabilityMismatchError('async-action', missingAsync);
    }
    throw new CapabilityMismatchError('action', missing);
}
