/**
 * AsyncAction: Non-Blocking Action
 *
 * Wraps one {@link BehaviorSlot} of kind `async`. `invoke()` returns the
 * behavior's promise without awaiting it; the caller decides when to await.
 *
 * Only native `async` functions are accepted as behaviors.
 *
 * @module
 */
import {
    type AsyncActionLike, type Behavior, type Binding, type CallSite, type FieldSchema,
} from '../types.js';
import { NotImplementedBehaviorError } from '../errors.js';
import { BehaviorSlot } from '../behavior/BehaviorSlot.js';
import { type ActionOptions } from './ActionOptions.js';

async function notImplemented(): Promise<never> {
    throw new NotImplementedBehaviorError();
}

export class AsyncAction<TResult = unknown> implements AsyncActionLike<TResult> {
    readonly kind = 'async' as const;
    readonly description: string | undefined;
    readonly tags: readonly string[];
    readonly schema: FieldSchema | undefined;
    private readonly _slot: BehaviorSlot<Promise<TResult>>;
    private readonly _onDispose: (() => void) | undefined;

    constructor(behavior?: Behavior<Promise<TResult>>, options: ActionOptions = {}) {
        this._slot = new BehaviorSlot<Promise<TResult>>('async', notImplemented);
        if (behavior) this._slot.set(behavior);
        this.description = options.description;
        this.tags = Object.freeze([...(options.tags ?? [])]);
        this.schema = options.schema;
        this._onDispose = options.onDispose;
    }

    get behavior(): Behavior<Promise<TResult>> {
        return this._slot.get();
    }

    get isImplemented(): boolean {
        return this._slot.isImplemented;
    }

    /**
     * Replace the behavior. Invocations already in flight keep the old one.
     *
     * @throws TypeKindMismatchError for a function that is not `async`
     */
    setBehavior(behavior: Behavior<Promise<TResult>>, binding?: Binding): this {
        this._slot.set(behavior, binding);
        return this;
    }

    invoke(...args: unknown[]): Promise<TResult> {
        return this._slot.apply({ args });
    }

    invokeWith(site: CallSite): Promise<TResult> {
        return this._slot.apply(site);
    }

    dispose(): void {
        this._onDispose?.();
    }
}

/** Create an {@link AsyncAction}, optionally with its first behavior. */
export function createAsyncAction<TResult = unknown>(
    behavior?: Behavior<Promise<TResult>>,
    options?: ActionOptions,
): AsyncAction<TResult> {
    return new AsyncAction<TResult>(behavior, options);
}
