/**
 * Shared contracts for behaviors, actions and the stores that hold them.
 *
 * These interfaces are the compile-time view of the roles that
 * {@link satisfies} checks structurally at run time.
 *
 * @module
 */
import { type ZodType } from 'zod';

// ── Behaviors ────────────────────────────────────────────

/** Invocation style of a behavior, fixed per slot. */
export type BehaviorKind = 'sync' | 'async';

/** Named values delivered to a behavior as one trailing object argument. */
export type NamedArgs = Readonly<Record<string, unknown>>;

/**
 * A callable behavior returning `TReturn`.
 *
 * Declared through a method signature so that handlers with narrower
 * parameter types (`(x: number) => ...`) are assignable.
 */
export type Behavior<TReturn = unknown> = {
    bivarianceHack(...args: unknown[]): TReturn;
}['bivarianceHack'];

/** Call-site arguments for {@link ActionLike.invokeWith}. */
export interface CallSite {
    readonly args?: readonly unknown[];
    readonly named?: NamedArgs;
}

/** Values bound to a behavior when it is installed. */
export interface Binding {
    readonly args?: readonly unknown[];
    readonly named?: NamedArgs;
}

/** Zod schema that dispatch fields are parsed with before invocation. */
export type FieldSchema = ZodType<Record<string, unknown>>;

// ── Actions ──────────────────────────────────────────────

/** Members every action exposes, whatever its kind. */
interface ActionMembers<TReturn> {
    /** Current behavior wrapper (never the raw function). */
    readonly behavior: Behavior<TReturn>;
    invoke(...args: unknown[]): TReturn;
    invokeWith(site: CallSite): TReturn;
    readonly description?: string | undefined;
    readonly tags?: readonly string[] | undefined;
    readonly schema?: FieldSchema | undefined;
    /** Called by the owning registry when the entry is removed. */
    dispose?(): void;
}

/** A blocking action: `invoke` returns the value directly. */
export interface SyncActionLike<TResult = unknown> extends ActionMembers<TResult> {
    readonly kind: 'sync';
}

/** A non-blocking action: `invoke` returns a promise. */
export interface AsyncActionLike<TResult = unknown> extends ActionMembers<Promise<TResult>> {
    readonly kind: 'async';
}

/** Tagged union of both action kinds. */
export type ActionLike = SyncActionLike | AsyncActionLike;

// ── Stores ───────────────────────────────────────────────

/**
 * What the {@link Dispatcher} needs from a store: item lookup and a key listing.
 * {@link ActionRegistry} is one implementation; any keyed store will do.
 */
export interface ActionSource {
    get(key: string): ActionLike | undefined;
    keys(): string[];
}
