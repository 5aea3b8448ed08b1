/**
 * Observability: Barrel Export
 *
 * Public API for debug observers and OpenTelemetry-compatible tracing.
 */

// ── Debug Observer ───────────────────────────────────────
export { createDebugObserver } from './DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn,
    RegisterEvent, RemoveEvent, RouteEvent, ValidateEvent,
    ExecuteEvent, CancelEvent, ErrorEvent,
} from './DebugObserver.js';

// ── Tracing (OpenTelemetry-compatible) ───────────────────
export { SpanStatusCode } from './Tracing.js';
export type { DispatchSpan, DispatchTracer, TraceAttributeValue } from './Tracing.js';
