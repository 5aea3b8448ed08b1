/**
 * BoundCall: Immutable Partial Application
 *
 * A behavior together with pre-bound positional and named values.
 * Applying it merges the call-site values with the bound ones:
 *
 *   positional: call-site first, then bound
 *   named:      call-site first, bound values fill the remaining names
 *
 * Named values reach the behavior as a single trailing object argument.
 * It is omitted only when the call site passes no `named` record and
 * nothing is bound; an explicit empty record arrives as `{}`.
 *
 * @module
 */
import { type Behavior, type CallSite, type NamedArgs } from '../types.js';

export interface BoundCall<TReturn = unknown> {
    readonly target: Behavior<TReturn>;
    readonly args: readonly unknown[];
    readonly named: NamedArgs;
}

const NO_ARGS: readonly unknown[] = Object.freeze([]);
const NO_NAMED: NamedArgs = Object.freeze({});

/** Create a frozen {@link BoundCall}. The input arrays and records are copied. */
export function bindCall<TReturn>(
    target: Behavior<TReturn>,
    args: readonly unknown[] = NO_ARGS,
    named: NamedArgs = NO_NAMED,
): BoundCall<TReturn> {
    return Object.freeze({
        target,
        args: args.length > 0 ? Object.freeze([...args]) : NO_ARGS,
        named: Object.keys(named).length > 0 ? Object.freeze({ ...named }) : NO_NAMED,
    });
}

/** Invoke the target with call-site values merged over the bound ones. */
export function applyBoundCall<TReturn>(call: BoundCall<TReturn>, site: CallSite = {}): TReturn {
    const args = [...(site.args ?? NO_ARGS), ...call.args];
    if (site.named !== undefined || call.named !== NO_NAMED) {
        args.push(mergeNamed(site.named ?? NO_NAMED, call.named));
    }
    return call.target(...args);
}

/** @internal */
export function mergeNamed(callSite: NamedArgs, bound: NamedArgs): NamedArgs {
    const merged: Record<string, unknown> = { ...callSite };
    for (const [name, value] of Object.entries(bound)) {
        if (!Object.hasOwn(merged, name)) merged[name] = value;
    }
    return merged;
}
