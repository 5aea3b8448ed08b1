/**
 * Result\<T\>: Railway-Oriented Dispatch Outcomes
 *
 * A discriminated union for expressing success/failure without throwing.
 * The {@link Dispatcher} returns every outcome this way so a missing key
 * or a failing behavior never surfaces as an unhandled rejection.
 *
 * @example
 * ```typescript
 * const result = await dispatcher.dispatch('echo', { x: 5 });
 * if (!result.ok) return reply(404, result.error.toJSON());
 * const value = result.value;
 * ```
 *
 * @module
 */
import { type ActionError } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/** Failed result carrying a typed {@link ActionError}. */
export interface Failure<E extends ActionError = ActionError> {
    readonly ok: false;
    readonly error: E;
}

/**
 * Either `Success<T>` or `Failure`. Check `result.ok` to narrow.
 */
export type Result<T, E extends ActionError = ActionError> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail<E extends ActionError>(error: E): Failure<E> {
    return { ok: false, error };
}
