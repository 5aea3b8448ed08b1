/**
 * Typed errors raised by slots, actions, registries and the dispatcher.
 *
 * Every error carries a stable `code` and serializes through `toJSON()`
 * so a routing layer can forward it to its own clients.
 *
 * @module
 */
import { type BehaviorKind } from './types.js';

// ── Codes ────────────────────────────────────────────────

export type ActionErrorCode =
    | 'TYPE_KIND_MISMATCH'
    | 'NOT_IMPLEMENTED_BEHAVIOR'
    | 'DUPLICATE_KEY'
    | 'KEY_NOT_FOUND'
    | 'CAPABILITY_MISMATCH'
    | 'ACTION_INVOCATION_ERROR'
    | 'INVALID_FIELDS'
    | 'INVOCATION_CANCELLED'
    | 'INVALID_CONFIG';

/** Serialized form of an {@link ActionError}. */
export interface ActionErrorPayload {
    readonly code: ActionErrorCode;
    readonly message: string;
    readonly [detail: string]: unknown;
}

// ============================================================================
// Base
// ============================================================================

export abstract class ActionError extends Error {
    abstract readonly code: ActionErrorCode;

    /** Extra fields merged into {@link toJSON}. */
    protected details(): Record<string, unknown> {
        return {};
    }

    toJSON(): ActionErrorPayload {
        return { ...this.details(), code: this.code, message: this.message };
    }
}

// ============================================================================
// Behavior Errors
// ============================================================================

const VARIANT_FOR: Record<BehaviorKind, string> = {
    sync: 'SyncAction (createAction)',
    async: 'AsyncAction (createAsyncAction)',
};

const WITH_ARTICLE: Record<BehaviorKind, string> = {
    sync: 'a sync',
    async: 'an async',
};

/**
 * A behavior's invocation style does not match the slot it was assigned to.
 *
 * The message names the variant that accepts the behavior.
 */
export class TypeKindMismatchError extends ActionError {
    readonly code = 'TYPE_KIND_MISMATCH' as const;
    readonly expected: BehaviorKind;
    readonly received: BehaviorKind;

    constructor(expected: BehaviorKind, received: BehaviorKind) {
        super(
            `Cannot assign ${WITH_ARTICLE[received]} behavior to ${WITH_ARTICLE[expected]} slot. ` +
            `Supply ${WITH_ARTICLE[expected]} function, or use ${VARIANT_FOR[received]} instead.`,
        );
        this.name = 'TypeKindMismatchError';
        this.expected = expected;
        this.received = received;
    }

    protected override details(): Record<string, unknown> {
        return { expected: this.expected, received: this.received };
    }
}

/** The placeholder behavior ran before a real one was set. */
export class NotImplementedBehaviorError extends ActionError {
    readonly code = 'NOT_IMPLEMENTED_BEHAVIOR' as const;

    constructor() {
        super('Action has no behavior yet. Call setBehavior() before invoking it.');
        this.name = 'NotImplementedBehaviorError';
    }
}

// ============================================================================
// Registry Errors
// ============================================================================

export class DuplicateKeyError extends ActionError {
    readonly code = 'DUPLICATE_KEY' as const;
    readonly key: string;

    constructor(key: string) {
        super(`Action "${key}" is already registered.`);
        this.name = 'DuplicateKeyError';
        this.key = key;
    }

    protected override details(): Record<string, unknown> {
        return { key: this.key };
    }
}

/** No action is registered (or exposed) under the key. */
export class KeyNotFoundError extends ActionError {
    readonly code = 'KEY_NOT_FOUND' as const;
    readonly key: string;
    readonly availableKeys: readonly string[];

    constructor(key: string, availableKeys: readonly string[] = []) {
        super(`Action "${key}" does not exist.`);
        this.name = 'KeyNotFoundError';
        this.key = key;
        this.availableKeys = Object.freeze([...availableKeys]);
    }

    protected override details(): Record<string, unknown> {
        return { key: this.key, availableKeys: [...this.availableKeys] };
    }
}

/** A candidate does not structurally satisfy the required role. */
export class CapabilityMismatchError extends ActionError {
    readonly code = 'CAPABILITY_MISMATCH' as const;
    readonly role: string;
    readonly missing: readonly string[];

    constructor(role: string, missing: readonly string[]) {
        super(`Object does not satisfy the "${role}" role. Missing: ${missing.join('; ')}.`);
        this.name = 'CapabilityMismatchError';
        this.role = role;
        this.missing = Object.freeze([...missing]);
    }

    protected override details(): Record<string, unknown> {
        return { role: this.role, missing: [...this.missing] };
    }
}

// ============================================================================
// Dispatch Errors
// ============================================================================

/**
 * The invoked behavior threw or rejected.
 *
 * `description` is the original error's message; the original error is
 * kept as `cause`.
 */
export class ActionInvocationError extends ActionError {
    readonly code = 'ACTION_INVOCATION_ERROR' as const;
    readonly key: string;
    readonly description: string;

    constructor(key: string, cause: unknown) {
        const description = cause instanceof Error ? cause.message : String(cause);
        super(`[${key}] ${description}`, { cause });
        this.name = 'ActionInvocationError';
        this.key = key;
        this.description = description;
    }

    protected override details(): Record<string, unknown> {
        return { key: this.key, description: this.description };
    }
}

/** Dispatch fields were rejected by the action's schema. */
export class InvalidFieldsError extends ActionError {
    readonly code = 'INVALID_FIELDS' as const;
    readonly key: string;
    readonly issues: readonly string[];

    constructor(key: string, issues: readonly string[]) {
        super(`Invalid fields for action "${key}":\n${issues.join('\n')}`);
        this.name = 'InvalidFieldsError';
        this.key = key;
        this.issues = Object.freeze([...issues]);
    }

    protected override details(): Record<string, unknown> {
        return { key: this.key, issues: [...this.issues] };
    }
}

/** A pending invocation was cancelled before it settled. */
export class InvocationCancelledError extends ActionError {
    readonly code = 'INVOCATION_CANCELLED' as const;
    readonly key: string;

    constructor(key: string, reason?: string) {
        super(reason ? `Invocation of "${key}" was cancelled: ${reason}` : `Invocation of "${key}" was cancelled.`);
        this.name = 'InvocationCancelledError';
        this.key = key;
    }

    protected override details(): Record<string, unknown> {
        return { key: this.key };
    }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends ActionError {
    readonly code = 'INVALID_CONFIG' as const;
    readonly source: string;

    constructor(source: string, problem: string) {
        super(`Invalid dispatch configuration in ${source}: ${problem}`);
        this.name = 'InvalidConfigError';
        this.source = source;
    }

    protected override details(): Record<string, unknown> {
        return { source: this.source };
    }
}
