/**
 * @module
 * @description
 * Capability-checked action registry: register sync and async actions
 * under string keys and dispatch named fields to them.
 */
// ── Core ─────────────────────────────────────────────────
/** @category Core */
export * from './core/index.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export * from './observability/index.js';

// ── Configuration ────────────────────────────────────────
/** @category Configuration */
export * from './config/index.js';
