/**
 * Dispatcher: Resolves a Key and Invokes the Action
 *
 * Pipeline: resolve → validate → invoke → observe
 *
 * Each step either succeeds (passes data to the next step) or fails
 * (short-circuits with a typed {@link Result} failure). Nothing escapes
 * as an exception: a missing key is a {@link KeyNotFoundError} failure,
 * a throwing behavior is an {@link ActionInvocationError} failure.
 *
 * Dispatching never mutates the action source.
 *
 * @example
 * ```typescript
 * const registry = new ActionRegistry();
 * registry.create('echo', createAction(({ x }: { x: number }) => x));
 *
 * const dispatcher = new Dispatcher(registry);
 * const result = await dispatcher.dispatch('echo', { x: 5 });
 * if (result.ok) result.value; // 5
 * ```
 *
 * @module
 */
import { type ActionLike, type ActionSource, type NamedArgs } from '../types.js';
import {
    ActionInvocationError, InvalidFieldsError, InvocationCancelledError, KeyNotFoundError,
} from '../errors.js';
import { type Result, fail, succeed } from '../result.js';
import { compileFilter, type ActionFilter } from '../registry/ActionFilterEngine.js';
import { type DebugObserverFn } from '../../observability/DebugObserver.js';
import { type DispatchSpan, type DispatchTracer, SpanStatusCode } from '../../observability/Tracing.js';
import { PendingInvocation, describeAbortReason } from './PendingInvocation.js';
import { formatFieldIssues } from './FieldIssueFormatter.js';

// ── Types ────────────────────────────────────────────────

/**
 * - `blocking`: `dispatch()` resolves with the action's value
 * - `nonblocking`: `dispatch()` resolves with a {@link PendingInvocation}
 *   for async actions; sync actions still return their value
 */
export type DispatchMode = 'blocking' | 'nonblocking';

export interface DispatcherOptions {
    /** @default 'blocking' */
    readonly mode?: DispatchMode;
    /** Only actions matching this filter can be dispatched; others read as missing */
    readonly expose?: ActionFilter;
    readonly debug?: DebugObserverFn;
    readonly tracer?: DispatchTracer;
}

// ============================================================================
// Dispatcher
// ============================================================================

export class Dispatcher {
    readonly mode: DispatchMode;
    private readonly _source: ActionSource;
    private readonly _exposed: ((action: ActionLike) => boolean) | undefined;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _tracer: DispatchTracer | undefined;

    constructor(source: ActionSource, options: DispatcherOptions = {}) {
        this._source = source;
        this.mode = options.mode ?? 'blocking';
        this._exposed = options.expose ? compileFilter(options.expose) : undefined;
        this._debug = options.debug ? guardObserver(options.debug) : undefined;
        this._tracer = options.tracer;
    }

    /**
     * Dispatch `fields` to the action registered under `key`.
     *
     * Fields become the behavior's named arguments: the behavior always
     * receives the (parsed) fields object as its trailing argument, `{}`
     * when none were sent. Resolves with a {@link Result}; never rejects.
     * A throwing debug observer or tracer is reported through
     * `console.warn` and does not change the outcome.
     *
     * @param signal - Cancels the invocation. Already aborted: the behavior
     *   never runs.
     */
    async dispatch(key: string, fields: NamedArgs = {}, signal?: AbortSignal): Promise<Result<unknown>> {
        const started = this.start(key, fields, signal);
        if (!started.ok) return started;

        const handle = started.value;
        if (this.mode === 'nonblocking' && !handle.isSettled) {
            return succeed(handle);
        }
        return handle.settled;
    }

    /**
     * Start an invocation and return its handle without waiting,
     * whatever the configured mode. Sync actions come back settled.
     */
    start(key: string, fields: NamedArgs = {}, signal?: AbortSignal): Result<PendingInvocation> {
        const startedAt = performance.now();
        const span = this._startSpan(key);

        // Step 1: resolve
        const resolved = this._resolve(key);
        if (!resolved.ok) {
            this._debug?.({ type: 'error', key, error: resolved.error.message, step: 'route', timestamp: Date.now() });
            endSpan(span, SpanStatusCode.UNSET, resolved.error.message, 'key_not_found');
            return resolved;
        }
        const action = resolved.value;
        if (span) guarded('tracer', () => span.setAttribute('action.kind', action.kind));
        this._debug?.({ type: 'route', key, timestamp: Date.now() });

        // Step 2: validate
        const validated = this._validate(key, action, fields);
        if (!validated.ok) {
            this._debug?.({ type: 'error', key, error: validated.error.message, step: 'validate', timestamp: Date.now() });
            endSpan(span, SpanStatusCode.UNSET, validated.error.message, 'invalid_fields');
            return validated;
        }

        // Step 3: invoke
        const handle = invoke(key, action, validated.value, signal);

        // Step 4: observe
        if (handle.isSettled) {
            this._report(handle, action, startedAt, span);
        } else {
            void handle.settled.then(() => this._report(handle, action, startedAt, span));
        }
        return succeed(handle);
    }

    // ── Pipeline Steps ───────────────────────────────────

    private _startSpan(key: string): DispatchSpan | undefined {
        const tracer = this._tracer;
        if (!tracer) return undefined;
        return guarded('tracer', () => tracer.startSpan(`action.dispatch ${key}`, {
            attributes: { 'action.key': key },
        }));
    }

    private _resolve(key: string): Result<ActionLike> {
        const action = this._source.get(key);
        if (!action || (this._exposed && !this._exposed(action))) {
            return fail(new KeyNotFoundError(key, this._availableKeys()));
        }
        return succeed(action);
    }

    private _validate(key: string, action: ActionLike, fields: NamedArgs): Result<NamedArgs> {
        if (!action.schema) return succeed(fields);

        const validateStart = performance.now();
        const parsed = action.schema.safeParse(fields);
        const durationMs = performance.now() - validateStart;

        if (!parsed.success) {
            const issues = formatFieldIssues(parsed.error.issues, fields);
            this._debug?.({ type: 'validate', key, valid: false, error: issues[0], durationMs, timestamp: Date.now() });
            return fail(new InvalidFieldsError(key, issues));
        }
        this._debug?.({ type: 'validate', key, valid: true, durationMs, timestamp: Date.now() });
        return succeed(parsed.data);
    }

    private _report(
        handle: PendingInvocation,
        action: ActionLike,
        startedAt: number,
        span: DispatchSpan | undefined,
    ): void {
        const { key } = handle;
        const outcome = handle.outcome;
        const timestamp = Date.now();

        if (handle.state === 'cancelled') {
            this._debug?.({ type: 'cancel', key, timestamp });
            endSpan(span, SpanStatusCode.UNSET, 'cancelled', 'cancelled');
            return;
        }

        const durationMs = performance.now() - startedAt;
        const isError = outcome !== undefined && !outcome.ok;
        this._debug?.({ type: 'execute', key, kind: action.kind, durationMs, isError, timestamp });

        if (outcome && !outcome.ok) {
            const { error } = outcome;
            this._debug?.({ type: 'error', key, error: error.message, step: 'execute', timestamp });
            if (span) {
                const target = span;
                guarded('tracer', () => target.recordException(error));
            }
            endSpan(span, SpanStatusCode.ERROR, error.message, 'invocation_error');
            return;
        }
        endSpan(span, SpanStatusCode.OK);
    }

    private _availableKeys(): string[] {
        const keys = this._source.keys();
        const exposed = this._exposed;
        if (!exposed) return keys;
        return keys.filter((k) => {
            const action = this._source.get(k);
            return action !== undefined && exposed(action);
        });
    }
}

// ── Internal ─────────────────────────────────────────────

/**
 * Run the behavior. The one place that branches on `kind`: a sync
 * behavior completes here, an async one is tracked until it settles.
 */
function invoke(
    key: string,
    action: ActionLike,
    named: NamedArgs,
    signal: AbortSignal | undefined,
): PendingInvocation {
    if (signal?.aborted) {
        return PendingInvocation.settle(key, fail(new InvocationCancelledError(key, describeAbortReason(signal.reason))));
    }

    try {
        switch (action.kind) {
            case 'sync':
                return PendingInvocation.settle(key, succeed(action.invokeWith({ named })));
            case 'async':
                return PendingInvocation.track(key, Promise.resolve(action.invokeWith({ named })), signal);
        }
    } catch (err) {
        return PendingInvocation.settle(key, fail(new ActionInvocationError(key, err)));
    }
}

/** Set the final attributes and status, then end the span even if those calls throw. */
function endSpan(span: DispatchSpan | undefined, code: number, message?: string, errorType?: string): void {
    if (!span) return;
    const target = span;
    if (errorType) {
        const type = errorType;
        guarded('tracer', () => target.setAttribute('action.error_type', type));
    }
    guarded('tracer', () => target.setStatus(message === undefined ? { code } : { code, message }));
    guarded('tracer', () => target.end());
}

// ── Observation Boundary ─────────────────────────────────

function guardObserver(observer: DebugObserverFn): DebugObserverFn {
    return (event) => {
        guarded(`debug observer (${event.type})`, () => observer(event));
    };
}

/**
 * Run an observer or tracer call. A failure is reported through
 * `console.warn` and never reaches the dispatch {@link Result}.
 */
function guarded<T>(source: string, run: () => T): T | undefined {
    try {
        return run();
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[action-dispatch] ${source} threw: ${message}`);
        return undefined;
    }
}
