import { describe, it, expect } from 'vitest';
import { PendingInvocation, describeAbortReason } from '../../src/core/dispatch/PendingInvocation.js';
import {
    ActionInvocationError, InvocationCancelledError, KeyNotFoundError,
} from '../../src/core/errors.js';
import { fail, succeed } from '../../src/core/result.js';

/** A promise with its resolvers exposed. */
function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (err: unknown) => void } {
    let resolve: (value: T) => void = () => undefined;
    let reject: (err: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
    return { promise, resolve, reject };
}

// ============================================================================
// track()
// ============================================================================

describe('PendingInvocation.track()', () => {
    it('should start pending and fulfil with the value', async () => {
        const gate = deferred<number>();
        const handle = PendingInvocation.track('slowAdd', gate.promise);

        expect(handle.state).toBe('pending');
        expect(handle.isSettled).toBe(false);
        expect(handle.outcome).toBeUndefined();

        gate.resolve(5);
        const outcome = await handle.settled;

        expect(outcome).toEqual({ ok: true, value: 5 });
        expect(handle.state).toBe('fulfilled');
        expect(handle.outcome).toBe(outcome);
    });

    it('should reject into ActionInvocationError without rejecting settled', async () => {
        const cause = new Error('disk full');
        const handle = PendingInvocation.track('save', Promise.reject(cause));

        const outcome = await handle.settled;

        expect(handle.state).toBe('rejected');
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(ActionInvocationError);
            expect(outcome.error.message).toBe('[save] disk full');
            expect(outcome.error.cause).toBe(cause);
        }
    });
});

// ============================================================================
// cancel()
// ============================================================================

describe('PendingInvocation.cancel()', () => {
    it('should cancel a pending handle and ignore a later completion', async () => {
        const gate = deferred<number>();
        const handle = PendingInvocation.track('slowAdd', gate.promise);

        expect(handle.cancel('user left')).toBe(true);
        gate.resolve(5);
        const outcome = await handle.settled;

        expect(handle.state).toBe('cancelled');
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(InvocationCancelledError);
            expect(outcome.error.message).toBe('Invocation of "slowAdd" was cancelled: user left');
        }
    });

    it('should return false once settled', async () => {
        const handle = PendingInvocation.track('fast', Promise.resolve(1));
        await handle.settled;

        expect(handle.cancel()).toBe(false);
        expect(handle.state).toBe('fulfilled');
    });

    it('should cancel without a reason', async () => {
        const handle = PendingInvocation.track('slow', deferred<void>().promise);
        handle.cancel();
        const outcome = await handle.settled;
        if (!outcome.ok) expect(outcome.error.message).toBe('Invocation of "slow" was cancelled.');
        expect(outcome.ok).toBe(false);
    });
});

// ============================================================================
// AbortSignal
// ============================================================================

describe('PendingInvocation with an AbortSignal', () => {
    it('should cancel when the signal fires', async () => {
        const controller = new AbortController();
        const handle = PendingInvocation.track('slow', deferred<number>().promise, controller.signal);

        controller.abort('timeout');
        const outcome = await handle.settled;

        expect(handle.state).toBe('cancelled');
        if (!outcome.ok) expect(outcome.error.message).toBe('Invocation of "slow" was cancelled: timeout');
    });

    it('should cancel immediately for an already aborted signal', () => {
        const handle = PendingInvocation.track('slow', deferred<number>().promise, AbortSignal.abort(new Error('gone')));
        expect(handle.state).toBe('cancelled');
    });

    it('should ignore the signal after settling', async () => {
        const controller = new AbortController();
        const handle = PendingInvocation.track('fast', Promise.resolve(3), controller.signal);
        await handle.settled;

        controller.abort();
        expect(handle.state).toBe('fulfilled');
    });
});

// ============================================================================
// settle()
// ============================================================================

describe('PendingInvocation.settle()', () => {
    it('should be fulfilled for a success', () => {
        const handle = PendingInvocation.settle('echo', succeed(5));
        expect(handle.state).toBe('fulfilled');
        expect(handle.outcome).toEqual({ ok: true, value: 5 });
    });

    it('should be cancelled for a cancellation failure', () => {
        const handle = PendingInvocation.settle('echo', fail(new InvocationCancelledError('echo')));
        expect(handle.state).toBe('cancelled');
    });

    it('should be rejected for any other failure', async () => {
        const handle = PendingInvocation.settle('echo', fail(new KeyNotFoundError('echo')));
        expect(handle.state).toBe('rejected');
        const outcome = await handle.settled;
        expect(outcome.ok).toBe(false);
    });
});

describe('describeAbortReason()', () => {
    it('should read messages from errors and strings only', () => {
        expect(describeAbortReason(new Error('boom'))).toBe('boom');
        expect(describeAbortReason('timeout')).toBe('timeout');
        expect(describeAbortReason(42)).toBeUndefined();
        expect(describeAbortReason(undefined)).toBeUndefined();
    });
});
