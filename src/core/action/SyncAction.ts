/**
 * SyncAction: Blocking Action
 *
 * Wraps one {@link BehaviorSlot} of kind `sync`. `invoke()` runs the
 * behavior and returns its value directly.
 *
 * @example
 * ```typescript
 * const double = createAction((x: number) => x * 2);
 * double.invoke(21); // 42
 *
 * const untyped = createAction();
 * untyped.setBehavior(async () => 1);
 * // ✗ TypeKindMismatchError: ... use AsyncAction (createAsyncAction) instead.
 * ```
 *
 * @module
 */
import {
    type Behavior, type Binding, type CallSite, type FieldSchema, type SyncActionLike,
} from '../types.js';
import { NotImplementedBehaviorError } from '../errors.js';
import { BehaviorSlot } from '../behavior/BehaviorSlot.js';
import { type ActionOptions } from './ActionOptions.js';

function notImplemented(): never {
    throw new NotImplementedBehaviorError();
}

export class SyncAction<TResult = unknown> implements SyncActionLike<TResult> {
    readonly kind = 'sync' as const;
    readonly description: string | undefined;
    readonly tags: readonly string[];
    readonly schema: FieldSchema | undefined;
    private readonly _slot: BehaviorSlot<TResult>;
    private readonly _onDispose: (() => void) | undefined;

    constructor(behavior?: Behavior<TResult>, options: ActionOptions = {}) {
        this._slot = new BehaviorSlot<TResult>('sync', notImplemented);
        if (behavior) this._slot.set(behavior);
        this.description = options.description;
        this.tags = Object.freeze([...(options.tags ?? [])]);
        this.schema = options.schema;
        this._onDispose = options.onDispose;
    }

    get behavior(): Behavior<TResult> {
        return this._slot.get();
    }

    get isImplemented(): boolean {
        return this._slot.isImplemented;
    }

    /**
     * Replace the behavior. Takes effect on the next invocation.
     *
     * @throws TypeKindMismatchError for an `async` function
     */
    setBehavior(behavior: Behavior<TResult>, binding?: Binding): this {
        this._slot.set(behavior, binding);
        return this;
    }

    invoke(...args: unknown[]): TResult {
        return this._slot.apply({ args });
    }

    invokeWith(site: CallSite): TResult {
        return this._slot.apply(site);
    }

    dispose(): void {
        this._onDispose?.();
    }
}

/** Create a {@link SyncAction}, optionally with its first behavior. */
export function createAction<TResult = unknown>(
    behavior?: Behavior<TResult>,
    options?: ActionOptions,
): SyncAction<TResult> {
    return new SyncAction<TResult>(behavior, options);
}
