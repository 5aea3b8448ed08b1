import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
    DEFAULT_CONFIG, DispatchConfigSchema, applyConfigOverrides, mergeConfig, toDispatcherOptions,
} from '../../src/config/DispatchConfig.js';
import { type DebugEvent } from '../../src/observability/DebugObserver.js';
import { InvalidConfigError } from '../../src/core/errors.js';

describe('DispatchConfig', () => {
    it('should default to blocking mode with debug off', () => {
        expect(DEFAULT_CONFIG).toEqual({ mode: 'blocking', debug: false });
    });

    it('should merge a partial config over the defaults', () => {
        expect(mergeConfig({ mode: 'nonblocking' })).toEqual({ mode: 'nonblocking', debug: false });
    });

    it('should reject unknown keys and bad values', () => {
        expect(() => DispatchConfigSchema.parse({ mode: 'fast' })).toThrow(ZodError);
        expect(() => DispatchConfigSchema.parse({ verbose: true })).toThrow(ZodError);
    });

    it('should ignore undefined overrides', () => {
        const base = mergeConfig({ mode: 'nonblocking', expose: { tags: ['public'] } });
        const next = applyConfigOverrides(base, { mode: undefined, debug: true });
        expect(next).toEqual({ mode: 'nonblocking', debug: true, expose: { tags: ['public'] } });
    });

    it('should report an invalid partial as InvalidConfigError', () => {
        expect(() => mergeConfig({ expose: { tags: [''] } })).toThrow(InvalidConfigError);
        expect(() => mergeConfig({ expose: { tags: [''] } })).toThrow(
            'Invalid dispatch configuration in programmatic config: ' +
            "expose.tags.0: String must contain at least 1 character(s). You sent: ''.",
        );
    });

    it('should report invalid overrides as InvalidConfigError', () => {
        expect(() => applyConfigOverrides(DEFAULT_CONFIG, { expose: { anyTag: [''] } })).toThrow(
            'Invalid dispatch configuration in config overrides: ' +
            "expose.anyTag.0: String must contain at least 1 character(s). You sent: ''.",
        );
    });

    it('should replace expose as a whole', () => {
        const base = mergeConfig({ expose: { tags: ['public'], exclude: ['admin'] } });
        const next = applyConfigOverrides(base, { expose: { anyTag: ['read'] } });
        expect(next.expose).toEqual({ anyTag: ['read'] });
    });
});

describe('toDispatcherOptions()', () => {
    it('should map mode and leave debug out when disabled', () => {
        expect(toDispatcherOptions(DEFAULT_CONFIG)).toEqual({ mode: 'blocking' });
    });

    it('should carry the expose filter', () => {
        const options = toDispatcherOptions(mergeConfig({ expose: { tags: ['public'] } }));
        expect(options.expose).toEqual({ tags: ['public'] });
    });

    it('should use the given observer when debug is on', () => {
        const events: DebugEvent[] = [];
        const observer = (e: DebugEvent): void => { events.push(e); };
        const options = toDispatcherOptions(mergeConfig({ debug: true }), observer);
        expect(options.debug).toBe(observer);
    });

    it('should fall back to console output when debug is on without an observer', () => {
        const options = toDispatcherOptions(mergeConfig({ debug: true }));
        expect(typeof options.debug).toBe('function');
    });
});
