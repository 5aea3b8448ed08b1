/**
 * PendingInvocation: Handle for an In-Flight Action Invocation
 *
 * Returned by non-blocking dispatch. The handle moves from `pending` to
 * exactly one terminal state (`fulfilled`, `rejected` or `cancelled`)
 * and `settled` resolves with the matching {@link Result}. It never rejects.
 *
 * Cancelling only affects the handle: the action stays registered, its
 * behavior stays installed, and a later completion of the underlying
 * promise is ignored.
 *
 * @example
 * ```typescript
 * const started = dispatcher.start('slowAdd', { a: 2, b: 3 });
 * if (!started.ok) return;
 * const handle = started.value;
 *
 * handle.cancel('user navigated away');
 * const outcome = await handle.settled;
 * outcome.ok; // false, InvocationCancelledError
 * ```
 *
 * @module
 */
import { ActionInvocationError, InvocationCancelledError } from '../errors.js';
import { type Result, fail, succeed } from '../result.js';

export type InvocationState = 'pending' | 'fulfilled' | 'rejected' | 'cancelled';

type InvocationSource<T> =
    | { readonly promise: PromiseLike<T> }
    | { readonly outcome: Result<T> };

export class PendingInvocation<T = unknown> {
    readonly key: string;
    /** Resolves once with the terminal outcome. Never rejects. */
    readonly settled: Promise<Result<T>>;
    private _state: InvocationState = 'pending';
    private _outcome: Result<T> | undefined;
    private readonly _resolve: (outcome: Result<T>) => void;
    private _detachSignal: (() => void) | undefined;

    private constructor(key: string, source: InvocationSource<T>, signal?: AbortSignal) {
        this.key = key;
        let resolveSettled: (outcome: Result<T>) => void = () => undefined;
        this.settled = new Promise<Result<T>>((resolve) => { resolveSettled = resolve; });
        this._resolve = resolveSettled;

        if ('outcome' in source) {
            this._finish(terminalStateOf(source.outcome), source.outcome);
            return;
        }

        void source.promise.then(
            (value) => this._finish('fulfilled', succeed(value)),
            (err: unknown) => this._finish('rejected', fail(new ActionInvocationError(key, err))),
        );
        if (signal) this._watch(signal);
    }

    /** Track a promise. An `AbortSignal` cancels the handle when it fires. */
    static track<T>(key: string, promise: PromiseLike<T>, signal?: AbortSignal): PendingInvocation<T> {
        return new PendingInvocation(key, { promise }, signal);
    }

    /**
     * A handle that is already in its terminal state: `fulfilled` for a
     * success, `cancelled` for an {@link InvocationCancelledError}, otherwise `rejected`.
     */
    static settle<T>(key: string, outcome: Result<T>): PendingInvocation<T> {
        return new PendingInvocation(key, { outcome });
    }

    get state(): InvocationState {
        return this._state;
    }

    get isSettled(): boolean {
        return this._state !== 'pending';
    }

    /** The terminal outcome, or `undefined` while pending. */
    get outcome(): Result<T> | undefined {
        return this._outcome;
    }

    /**
     * Move a pending handle to `cancelled`.
     *
     * @returns `false` if the handle had already settled
     */
    cancel(reason?: string): boolean {
        return this._finish('cancelled', fail(new InvocationCancelledError(this.key, reason)));
    }

    // ── Internals ────────────────────────────────────────

    private _finish(state: Exclude<InvocationState, 'pending'>, outcome: Result<T>): boolean {
        if (this._state !== 'pending') return false;
        this._state = state;
        this._outcome = outcome;
        this._detachSignal?.();
        this._detachSignal = undefined;
        this._resolve(outcome);
        return true;
    }

    private _watch(signal: AbortSignal): void {
        if (signal.aborted) {
            this.cancel(describeAbortReason(signal.reason));
            return;
        }
        const onAbort = (): void => { this.cancel(describeAbortReason(signal.reason)); };
        signal.addEventListener('abort', onAbort, { once: true });
        this._detachSignal = () => signal.removeEventListener('abort', onAbort);
    }
}

function terminalStateOf(outcome: Result<unknown>): Exclude<InvocationState, 'pending'> {
    if (outcome.ok) return 'fulfilled';
    return outcome.error instanceof InvocationCancelledError ? 'cancelled' : 'rejected';
}

/** @internal */
export function describeAbortReason(reason: unknown): string | undefined {
    if (reason instanceof Error) return reason.message;
    if (typeof reason === 'string') return reason;
    return undefined;
}
