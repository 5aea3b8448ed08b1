import { describe, it, expect } from 'vitest';
import {
    ActionError, ActionInvocationError, CapabilityMismatchError, DuplicateKeyError,
    InvalidConfigError, InvalidFieldsError, InvocationCancelledError, KeyNotFoundError,
    NotImplementedBehaviorError, TypeKindMismatchError,
} from '../../src/core/errors.js';
import { fail, succeed, type Result } from '../../src/core/result.js';

// ============================================================================
// Error payloads
// ============================================================================

describe('ActionError subclasses', () => {
    it('should all extend ActionError and Error', () => {
        const errors = [
            new TypeKindMismatchError('sync', 'async'),
            new NotImplementedBehaviorError(),
            new DuplicateKeyError('k'),
            new KeyNotFoundError('k'),
            new CapabilityMismatchError('action', ['callable invoke()']),
            new ActionInvocationError('k', new Error('x')),
            new InvalidFieldsError('k', ['a: bad']),
            new InvocationCancelledError('k'),
            new InvalidConfigError('file.yaml', 'bad'),
        ];
        for (const err of errors) {
            expect(err).toBeInstanceOf(ActionError);
            expect(err).toBeInstanceOf(Error);
        }
        expect(errors.map(e => e.name)).toEqual([
            'TypeKindMismatchError',
            'NotImplementedBehaviorError',
            'DuplicateKeyError',
            'KeyNotFoundError',
            'CapabilityMismatchError',
            'ActionInvocationError',
            'InvalidFieldsError',
            'InvocationCancelledError',
            'InvalidConfigError',
        ]);
    });

    it('should name the other variant in a kind mismatch', () => {
        const err = new TypeKindMismatchError('sync', 'async');
        expect(err.message).toBe(
            'Cannot assign an async behavior to a sync slot. ' +
            'Supply a sync function, or use AsyncAction (createAsyncAction) instead.',
        );
        expect(err.toJSON()).toEqual({
            code: 'TYPE_KIND_MISMATCH',
            message: err.message,
            expected: 'sync',
            received: 'async',
        });
    });

    it('should serialize capability mismatches with the missing list', () => {
        const err = new CapabilityMismatchError('registry', ['callable get()', 'member keystore']);
        expect(err.message).toBe('Object does not satisfy the "registry" role. Missing: callable get(); member keystore.');
        expect(err.toJSON()).toEqual({
            code: 'CAPABILITY_MISMATCH',
            message: err.message,
            role: 'registry',
            missing: ['callable get()', 'member keystore'],
        });
    });

    it('should stringify a non-Error cause', () => {
        const err = new ActionInvocationError('k', 'plain string');
        expect(err.description).toBe('plain string');
        expect(err.message).toBe('[k] plain string');
        expect(err.cause).toBe('plain string');
    });

    it('should copy available keys', () => {
        const keys = ['a'];
        const err = new KeyNotFoundError('b', keys);
        keys.push('c');
        expect(err.availableKeys).toEqual(['a']);
        expect(Object.isFrozen(err.availableKeys)).toBe(true);
    });

    it('should keep the config source', () => {
        const err = new InvalidConfigError('/tmp/action-dispatch.yaml', 'mode: bad');
        expect(err.message).toBe('Invalid dispatch configuration in /tmp/action-dispatch.yaml: mode: bad');
        expect(err.toJSON()).toEqual({
            code: 'INVALID_CONFIG',
            message: err.message,
            source: '/tmp/action-dispatch.yaml',
        });
    });

    it('should survive JSON.stringify', () => {
        const json = JSON.stringify(new DuplicateKeyError('echo'));
        expect(JSON.parse(json)).toEqual({
            code: 'DUPLICATE_KEY',
            message: 'Action "echo" is already registered.',
            key: 'echo',
        });
    });
});

// ============================================================================
// Result
// ============================================================================

describe('Result', () => {
    it('should build success and failure values', () => {
        expect(succeed(5)).toEqual({ ok: true, value: 5 });
        const err = new DuplicateKeyError('k');
        expect(fail(err)).toEqual({ ok: false, error: err });
    });

    it('should narrow on ok', () => {
        const results: Result<number>[] = [succeed(1), fail(new KeyNotFoundError('k'))];
        const values = results.map(r => (r.ok ? r.value : r.error.code));
        expect(values).toEqual([1, 'KEY_NOT_FOUND']);
    });
});
