/**
 * CapabilityCheck: Structural Role Conformance
 *
 * Decides whether an object can play a role by inspecting the members it
 * exposes: presence and callability, plus the `kind` marker for actions.
 * No base class or declared interface is required, so an in-memory map, a
 * remote store and a hybrid can all take part in the same contract.
 *
 * Every role is a fixed table of {@link Requirement}s:
 *
 *   action        kind = 'sync';  behavior(), invoke(), invokeWith()
 *   async-action  kind = 'async'; behavior(), invoke(), invokeWith()
 *   registry      create()|createAsync(); delete()|deleteAsync(); get(); set();
 *                 retrieve()|retrieveAsync(); keystore
 *   link-parser   scope; generateUri(); decodeUri()
 *   download      scope; beforeDownload(); afterDownload()
 *   upload        scope; beforeUpload(); afterUpload()
 *
 *   scope = enter() + exit()  |  enterAsync() + exitAsync()
 *
 * The `before*` / `after*` hooks are mandatory.
 *
 * Objects that merely expose matching member names pass. The check cannot
 * tell a real implementation from a lookalike.
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import { type ActionLike, type AsyncActionLike, type SyncActionLike } from '../types.js';

// ── Roles ────────────────────────────────────────────────

export type CapabilityRole =
    | 'action'
    | 'async-action'
    | 'registry'
    | 'link-parser'
    | 'download'
    | 'upload';

/** One entry of a role's requirement table. */
export type Requirement =
    | { readonly callable: string }
    | { readonly present: string }
    | { readonly member: string; readonly equals: string }
    | { readonly allOf: readonly Requirement[] }
    | { readonly anyOf: readonly Requirement[] };

const callable = (name: string): Requirement => ({ callable: name });
const anyOf = (...requirements: Requirement[]): Requirement => ({ anyOf: requirements });
const allOf = (...requirements: Requirement[]): Requirement => ({ allOf: requirements });

const SCOPE = anyOf(
    allOf(callable('enter'), callable('exit')),
    allOf(callable('enterAsync'), callable('exitAsync')),
);

const ACTION_MEMBERS = [callable('behavior'), callable('invoke'), callable('invokeWith')];

export const CAPABILITY_ROLES: Readonly<Record<CapabilityRole, readonly Requirement[]>> = Object.freeze({
    'action': [{ member: 'kind', equals: 'sync' }, ...ACTION_MEMBERS],
    'async-action': [{ member: 'kind', equals: 'async' }, ...ACTION_MEMBERS],
    'registry': [
        anyOf(callable('create'), callable('createAsync')),
        anyOf(callable('delete'), callable('deleteAsync')),
        callable('get'),
        callable('set'),
        anyOf(callable('retrieve'), callable('retrieveAsync')),
        { present: 'keystore' },
    ],
    'link-parser': [SCOPE, callable('generateUri'), callable('decodeUri')],
    'download': [SCOPE, callable('beforeDownload'), callable('afterDownload')],
    'upload': [SCOPE, callable('beforeUpload'), callable('afterUpload')],
});

// ── Public API ───────────────────────────────────────────

/**
 * Check whether `candidate` structurally satisfies `role`.
 *
 * Never throws: a member whose getter throws counts as absent.
 */
export function satisfies(candidate: unknown, role: CapabilityRole): boolean {
    return missingCapabilities(candidate, role).length === 0;
}

/**
 * List the requirements of `role` that `candidate` does not meet,
 * as readable descriptions (e.g. `"callable invoke()"`).
 */
export function missingCapabilities(candidate: unknown, role: CapabilityRole): string[] {
    if (!isInspectable(candidate)) return ['an object'];
    const missing: string[] = [];
    for (const requirement of CAPABILITY_ROLES[role]) {
        if (!meets(candidate, requirement)) missing.push(describeRequirement(requirement));
    }
    return missing;
}

/** Type guard for the `action` role. */
export function isSyncActionLike(candidate: unknown): candidate is SyncActionLike {
    return satisfies(candidate, 'action');
}

/** Type guard for the `async-action` role. */
export function isAsyncActionLike(candidate: unknown): candidate is AsyncActionLike {
    return satisfies(candidate, 'async-action');
}

/** Type guard for either action role. */
export function isActionLike(candidate: unknown): candidate is ActionLike {
    return isSyncActionLike(candidate) || isAsyncActionLike(candidate);
}

/** Members a store needs to satisfy the `registry` role. */
export interface RegistryLike {
    readonly keystore: unknown;
    get(key: string): unknown;
    set(key: string, value: unknown): unknown;
}

/** Type guard for the `registry` role. */
export function isRegistryLike(candidate: unknown): candidate is RegistryLike {
    return satisfies(candidate, 'registry');
}

// ── Internals ────────────────────────────────────────────

function isInspectable(candidate: unknown): candidate is object {
    return (typeof candidate === 'object' && candidate !== null) || typeof candidate === 'function';
}

/** @internal Read a member (own or inherited); a throwing getter reads as absent. */
function readMember(target: object, name: string): { found: boolean; value?: unknown } {
    try {
        if (!(name in target)) return { found: false };
        const value: unknown = Reflect.get(target, name);
        return { found: value !== undefined, value };
    } catch {
        return { found: false };
    }
}

function meets(target: object, requirement: Requirement): boolean {
    if ('allOf' in requirement) return requirement.allOf.every(r => meets(target, r));
    if ('anyOf' in requirement) return requirement.anyOf.some(r => meets(target, r));
    if ('callable' in requirement) {
        const member = readMember(target, requirement.callable);
        return member.found && typeof member.value === 'function';
    }
    if ('present' in requirement) return readMember(target, requirement.present).found;
    const member = readMember(target, requirement.member);
    return member.found && member.value === requirement.equals;
}

function describeRequirement(requirement: Requirement): string {
    if ('allOf' in requirement) return requirement.allOf.map(describeRequirement).join(' and ');
    if ('anyOf' in requirement) {
        return requirement.anyOf
            .map(r => ('allOf' in r ? `(${describeRequirement(r)})` : describeRequirement(r)))
            .join(' or ');
    }
    if ('callable' in requirement) return `callable ${requirement.callable}()`;
    if ('present' in requirement) return `member ${requirement.present}`;
    return `${requirement.member} = '${requirement.equals}'`;
}
