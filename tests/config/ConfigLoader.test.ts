import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadDispatchConfig, CONFIG_FILENAMES } from '../../src/config/ConfigLoader.js';
import { InvalidConfigError } from '../../src/core/errors.js';

// ============================================================================
// ConfigLoader Tests
// ============================================================================

describe('loadDispatchConfig()', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'action-dispatch-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should return defaults when no file exists', () => {
        expect(loadDispatchConfig(undefined, dir)).toEqual({ mode: 'blocking', debug: false });
    });

    it('should auto-detect action-dispatch.yaml', () => {
        writeFileSync(join(dir, 'action-dispatch.yaml'), [
            'mode: nonblocking',
            'debug: true',
            'expose:',
            '  tags: [public]',
            '  exclude: [admin]',
        ].join('\n'));

        expect(loadDispatchConfig(undefined, dir)).toEqual({
            mode: 'nonblocking',
            debug: true,
            expose: { tags: ['public'], exclude: ['admin'] },
        });
    });

    it('should auto-detect action-dispatch.json', () => {
        writeFileSync(join(dir, 'action-dispatch.json'), JSON.stringify({ mode: 'nonblocking' }));
        expect(loadDispatchConfig(undefined, dir)).toEqual({ mode: 'nonblocking', debug: false });
    });

    it('should prefer the first filename in detection order', () => {
        expect(CONFIG_FILENAMES[0]).toBe('action-dispatch.yaml');
        writeFileSync(join(dir, 'action-dispatch.yaml'), 'mode: nonblocking');
        writeFileSync(join(dir, 'action-dispatch.json'), JSON.stringify({ debug: true }));

        expect(loadDispatchConfig(undefined, dir)).toEqual({ mode: 'nonblocking', debug: false });
    });

    it('should load an explicit path relative to cwd', () => {
        writeFileSync(join(dir, 'custom.yml'), 'debug: true');
        expect(loadDispatchConfig('custom.yml', dir)).toEqual({ mode: 'blocking', debug: true });
    });

    it('should treat an empty YAML file as all defaults', () => {
        writeFileSync(join(dir, 'action-dispatch.yaml'), '');
        expect(loadDispatchConfig(undefined, dir)).toEqual({ mode: 'blocking', debug: false });
    });

    it('should throw InvalidConfigError for a missing explicit file', () => {
        expect(() => loadDispatchConfig('missing.yaml', dir)).toThrow(
            `Invalid dispatch configuration in ${join(dir, 'missing.yaml')}: file not found`,
        );
    });

    it('should throw InvalidConfigError with readable issues', () => {
        const file = join(dir, 'action-dispatch.yaml');
        writeFileSync(file, 'mode: fast');

        expect(() => loadDispatchConfig(undefined, dir)).toThrow(
            `Invalid dispatch configuration in ${file}: ` +
            "mode: Invalid enum value. Expected 'blocking' | 'nonblocking', received 'fast'. " +
            "You sent: 'fast'. Valid options: 'blocking', 'nonblocking'.",
        );
    });

    it('should throw InvalidConfigError for malformed JSON', () => {
        writeFileSync(join(dir, 'action-dispatch.json'), '{ "mode": ');
        expect(() => loadDispatchConfig(undefined, dir)).toThrow(InvalidConfigError);
    });

    it('should throw InvalidConfigError when the file cannot be read', () => {
        mkdirSync(join(dir, 'folder.yaml'));
        expect(() => loadDispatchConfig('folder.yaml', dir)).toThrow(InvalidConfigError);
        expect(() => loadDispatchConfig('folder.yaml', dir)).toThrow(
            `Invalid dispatch configuration in ${join(dir, 'folder.yaml')}: EISDIR`,
        );
    });

    it('should reject unknown keys', () => {
        writeFileSync(join(dir, 'action-dispatch.json'), JSON.stringify({ verbose: true }));
        expect(() => loadDispatchConfig(undefined, dir)).toThrow(
            "(root): Unrecognized key(s) in object: 'verbose'. Remove unrecognized fields: 'verbose'.",
        );
    });
});
