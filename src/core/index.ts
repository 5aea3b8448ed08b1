/**
 * Core: Barrel Export
 *
 * Public API for behaviors, actions, capability checks, the registry
 * and the dispatcher.
 *
 * Observability and configuration are exported from their own barrel
 * files and re-aggregated in src/index.ts.
 */

// ── Cross-cutting ────────────────────────────────────────
export { succeed, fail } from './result.js';
export type { Result, Success, Failure } from './result.js';
export {
    ActionError,
    TypeKindMismatchError, NotImplementedBehaviorError,
    DuplicateKeyError, KeyNotFoundError, CapabilityMismatchError,
    ActionInvocationError, InvalidFieldsError, InvocationCancelledError,
    InvalidConfigError,
} from './errors.js';
export type { ActionErrorCode, ActionErrorPayload } from './errors.js';

// ── Types & Contracts ────────────────────────────────────
export type {
    BehaviorKind, Behavior, NamedArgs, CallSite, Binding, FieldSchema,
    SyncActionLike, AsyncActionLike, ActionLike, ActionSource,
} from './types.js';

// ── Behaviors ────────────────────────────────────────────
export { bindCall, applyBoundCall } from './behavior/BoundCall.js';
export type { BoundCall } from './behavior/BoundCall.js';
export { BehaviorSlot, behaviorKindOf } from './behavior/BehaviorSlot.js';

// ── Actions ──────────────────────────────────────────────
export { SyncAction, createAction } from './action/SyncAction.js';
export { AsyncAction, createAsyncAction } from './action/AsyncAction.js';
export type { ActionOptions } from './action/ActionOptions.js';

// ── Capability Check ─────────────────────────────────────
export {
    satisfies, missingCapabilities, CAPABILITY_ROLES,
    isActionLike, isSyncActionLike, isAsyncActionLike, isRegistryLike,
} from './capability/CapabilityCheck.js';
export type { CapabilityRole, Requirement, RegistryLike } from './capability/CapabilityCheck.js';

// ── Registry ─────────────────────────────────────────────
export { ActionRegistry } from './registry/ActionRegistry.js';
export { filterActions, compileFilter } from './registry/ActionFilterEngine.js';
export type { ActionFilter } from './registry/ActionFilterEngine.js';

// ── Dispatch ─────────────────────────────────────────────
export { Dispatcher } from './dispatch/Dispatcher.js';
export type { DispatchMode, DispatcherOptions } from './dispatch/Dispatcher.js';
export { PendingInvocation } from './dispatch/PendingInvocation.js';
export type { InvocationState } from './dispatch/PendingInvocation.js';
