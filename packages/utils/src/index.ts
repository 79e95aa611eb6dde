/**
 * @flashless/utils
 *
 * Shared utility functions for flashless packages
 */

/**
 * The current version of flashless
 *
 * Used for displaying version information in the CLI and the server banner.
 */
export const VERSION = '0.1.0';

/**
 * Converts a file path to use POSIX-style forward slashes.
 *
 * Manifest paths and request paths are compared as POSIX strings, so
 * Windows separators are folded before any normalization.
 *
 * @param filePath - The file path to normalize
 * @returns The path with all backslashes replaced with forward slashes
 */
export function toPosixPath(filePath: string): string {
    return filePath.replaceAll('\\', '/');
}

/**
 * Serializes a value to JSON with object keys sorted at every depth.
 *
 * Arrays keep their order. Used for reports that are diffed between runs.
 *
 * @param value - Any JSON-compatible value
 * @param indent - Indentation passed to `JSON.stringify`
 * @returns The serialized JSON text
 *
 * @example
 * ```ts
 * stableStringify({ b: 1, a: { d: 2, c: 3 } });
 * // '{"a":{"c":3,"d":2},"b":1}'
 * ```
 */
export function stableStringify(value: unknown, indent?: number): string {
    return JSON.stringify(value, sortKeysReplacer, indent);
}

function sortKeysReplacer(_key: string, value: unknown): unknown {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        return value;
    }

    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
}
