/**
 * Tracing: OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('my-service')` can be passed
 * to a {@link Dispatcher} directly, without an `@opentelemetry/*` dependency.
 *
 * Status semantics for dispatch spans:
 * - `UNSET` for caller mistakes: unknown key, invalid fields, cancellation
 * - `ERROR` only when the behavior throws or rejects
 * - `OK` otherwise
 *
 * @example
 * ```typescript
 * // Custom tracer (e.g. for testing)
 * const ended: string[] = [];
 * const tracer: DispatchTracer = {
 *     startSpan(name) {
 *         return {
 *             setAttribute() {},
 *             setStatus() {},
 *             end() { ended.push(name); },
 *             recordException() {},
 *         };
 *     },
 * };
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/** Span status codes matching OpenTelemetry's `SpanStatusCode` enum. */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Attribute value type. Matches OpenTelemetry's `SpanAttributeValue`.
 *
 * Widening this to `unknown` would make an OTel `Tracer` unassignable
 * to {@link DispatchTracer} under `strict`.
 */
export type TraceAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Minimal span interface, a structural subtype of OTel's `Span`. */
export interface DispatchSpan {
    setAttribute(key: string, value: TraceAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Not every tracer implementation records events. */
    addEvent?(name: string, attributes?: Record<string, TraceAttributeValue>): void;
    /** Must be called exactly once. */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Minimal tracer interface, a structural subtype of OTel's `Tracer`. */
export interface DispatchTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, TraceAttributeValue>;
    }): DispatchSpan;
}
