import { describe, it, expect } from 'vitest';
import { toPosixPath, stableStringify } from '../src/index.js';

describe('toPosixPath', () => {
    it('should convert backslashes to forward slashes', () => {
        expect(toPosixPath('web\\dist\\index.html')).toBe('web/dist/index.html');
    });

    it('should handle paths with mixed separators', () => {
        expect(toPosixPath('web/dist\\assets\\app.js')).toBe(
            'web/dist/assets/app.js',
        );
    });

    it('should leave forward slashes unchanged', () => {
        expect(toPosixPath('ui-fixtures/health.json')).toBe(
            'ui-fixtures/health.json',
        );
    });

    it('should handle empty string', () => {
        expect(toPosixPath('')).toBe('');
    });

    it('should handle relative paths with ..', () => {
        expect(toPosixPath('..\\..\\secret.txt')).toBe('../../secret.txt');
    });
});

describe('stableStringify', () => {
    it('should sort keys at every depth', () => {
        expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe(
            '{"a":{"c":3,"d":2},"b":1}',
        );
    });

    it('should keep array order', () => {
        expect(stableStringify({ list: ['z', 'a'] })).toBe('{"list":["z","a"]}');
    });

    it('should sort objects nested inside arrays', () => {
        expect(stableStringify([{ y: 1, x: 2 }])).toBe('[{"x":2,"y":1}]');
    });

    it('should honour indentation', () => {
        expect(stableStringify({ b: true, a: null }, 2)).toBe(
            '{\n  "a": null,\n  "b": true\n}',
        );
    });
});
