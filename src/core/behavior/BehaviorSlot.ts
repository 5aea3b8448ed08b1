/**
 * BehaviorSlot: Single-Behavior Holder with a Fixed Kind
 *
 * Holds exactly one behavior. The slot's `kind` is fixed at construction
 * and every assignment is checked against it: an `async function` never
 * lands in a `sync` slot, and a plain function never lands in an `async` one.
 *
 * `get()` returns a wrapper bound to the {@link BoundCall} that was current
 * when it was installed, so replacing the behavior never changes an
 * invocation that already started.
 *
 * @module
 */
import { type Behavior, type BehaviorKind, type Binding, type CallSite } from '../types.js';
import { TypeKindMismatchError } from '../errors.js';
import { type BoundCall, applyBoundCall, bindCall } from './BoundCall.js';

/**
 * Classify a function by invocation style.
 *
 * Only native async functions count as `async`; a plain function that
 * happens to return a promise is `sync`.
 */
export function behaviorKindOf(fn: Behavior): BehaviorKind {
    return Object.prototype.toString.call(fn) === '[object AsyncFunction]' ? 'async' : 'sync';
}

export class BehaviorSlot<TReturn> {
    readonly kind: BehaviorKind;
    private _call: BoundCall<TReturn>;
    private _wrapper: Behavior<TReturn>;
    private _implemented = false;

    /**
     * @param placeholder - Installed without a kind check; it is what runs
     *   until {@link set} succeeds for the first time.
     */
    constructor(kind: BehaviorKind, placeholder: Behavior<TReturn>) {
        this.kind = kind;
        this._call = bindCall(placeholder);
        this._wrapper = wrap(this._call);
    }

    /**
     * Install a behavior with optional bound values.
     *
     * @throws TypeKindMismatchError if the behavior's kind differs from the slot's.
     *   The previous behavior stays installed.
     */
    set(behavior: Behavior<TReturn>, binding: Binding = {}): void {
        const received = behaviorKindOf(behavior);
        if (received !== this.kind) {
            throw new TypeKindMismatchError(this.kind, received);
        }
        this._call = bindCall(behavior, binding.args, binding.named);
        this._wrapper = wrap(this._call);
        this._implemented = true;
    }

    /** Current wrapper. Never the raw function passed to {@link set}. */
    get(): Behavior<TReturn> {
        return this._wrapper;
    }

    /** Invoke the current behavior with positional and named call-site values. */
    apply(site: CallSite = {}): TReturn {
        return applyBoundCall(this._call, site);
    }

    /** The bound call currently installed. */
    get call(): BoundCall<TReturn> {
        return this._call;
    }

    /** `false` until a behavior other than the placeholder has been set. */
    get isImplemented(): boolean {
        return this._implemented;
    }
}

/** @internal */
function wrap<TReturn>(call: BoundCall<TReturn>): Behavior<TReturn> {
    const wrapper = (...args: unknown[]): TReturn => applyBoundCall(call, { args });
    Object.defineProperty(wrapper, 'name', { value: call.target.name, configurable: true });
    return wrapper;
}
