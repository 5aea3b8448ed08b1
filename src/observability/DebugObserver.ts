/**
 * DebugObserver: Opt-In Observability for Registries and Dispatch
 *
 * Typed debug events emitted when actions are registered or removed and
 * at each stage of a dispatch. When no observer is set (the default),
 * nothing is emitted.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { createDebugObserver } from 'action-dispatch';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to a log pipeline)
 * const debug = createDebugObserver((event) => {
 *     log.write(event.type, event);
 * });
 *
 * registry.enableDebug(debug);
 * const dispatcher = new Dispatcher(registry, { debug });
 * ```
 *
 * @module
 */
import { type BehaviorKind } from '../core/types.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** An action was stored in a registry (through `create` or `set`). */
export interface RegisterEvent {
    readonly type: 'register';
    readonly key: string;
    readonly kind: BehaviorKind;
    readonly timestamp: number;
}

/** An action was removed from a registry (through `delete`, `set` or `clear`). */
export interface RemoveEvent {
    readonly type: 'remove';
    readonly key: string;
    readonly timestamp: number;
}

/**
 * A dispatch resolved its key to an action.
 * First event of every successful lookup.
 */
export interface RouteEvent {
    readonly type: 'route';
    readonly key: string;
    readonly timestamp: number;
}

/** Fields were parsed with the action's schema (pass or fail). */
export interface ValidateEvent {
    readonly type: 'validate';
    readonly key: string;
    readonly valid: boolean;
    /** First issue when `valid` is false */
    readonly error?: string;
    /** Milliseconds spent in schema parsing */
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * The behavior settled. For async actions this is emitted when the
 * promise settles, not when the invocation starts.
 */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly key: string;
    readonly kind: BehaviorKind;
    /** Milliseconds from lookup to settlement */
    readonly durationMs: number;
    /** Whether the behavior threw or rejected */
    readonly isError: boolean;
    readonly timestamp: number;
}

/** A pending invocation was cancelled before it settled. */
export interface CancelEvent {
    readonly type: 'cancel';
    readonly key: string;
    readonly timestamp: number;
}

/** A dispatch failed. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly key: string;
    readonly error: string;
    /** The dispatch step where the failure occurred */
    readonly step: 'route' | 'validate' | 'execute';
    readonly timestamp: number;
}

/** Union of all debug event types. */
export type DebugEvent =
    | RegisterEvent
    | RemoveEvent
    | RouteEvent
    | ValidateEvent
    | ExecuteEvent
    | CancelEvent
    | ErrorEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler prints:
 *
 * ```
 * [action-dispatch] register  echo (sync)
 * [action-dispatch] route     echo
 * [action-dispatch] execute   echo ✓ 0.1ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[action-dispatch]';

        switch (event.type) {
            case 'register':
                console.debug(`${prefix} register  ${event.key} (${event.kind})`);
                break;

            case 'remove':
                console.debug(`${prefix} remove    ${event.key}`);
                break;

            case 'route':
                console.debug(`${prefix} route     ${event.key}`);
                break;

            case 'validate': {
                const status = event.valid ? '✓' : `✗ ${event.error ?? ''}`;
                console.debug(`${prefix} validate  ${event.key} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'execute': {
                const icon = event.isError ? '✗' : '✓';
                console.debug(`${prefix} execute   ${event.key} ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'cancel':
                console.debug(`${prefix} cancel    ${event.key}`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${event.key} [${event.step}] ${event.error}`);
                break;
        }
    };
}
