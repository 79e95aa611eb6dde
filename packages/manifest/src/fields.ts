/**
 * Manifest Field Validators
 *
 * Each validator takes a raw JSON value and the dotted path of the field it
 * came from, and either returns the typed value or throws a
 * {@link FlashlessError} naming that field.
 */

import { FlashlessErrorCode, createFieldError } from './errors.js';

// ============================================================================
// RAW MANIFEST TYPES (before validation)
// ============================================================================

/**
 * A JSON object before validation. All values are unknown.
 */
export type RawObject = { [key: string]: unknown };

/**
 * Represents a raw manifest before validation.
 */
export interface RawManifest extends RawObject {
    /** Schema version (must be the string "1"). */
    version?: unknown;
    /** UI block (required). */
    ui?: unknown;
    /** API block. */
    api?: unknown;
    /** Validation block. */
    validation?: unknown;
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isRawObject(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// FIELD VALIDATORS
// ============================================================================

/**
 * Reads a nested object field.
 *
 * A missing or `null` optional object reads as empty.
 *
 * @param raw - Parent object
 * @param key - Key within the parent
 * @param field - Dotted field path for error messages
 * @param required - Whether absence is an error
 */
export function readObject(
    raw: RawObject,
    key: string,
    field: string,
    required: boolean,
): RawObject | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        if (required) {
            throw createFieldError(
                FlashlessErrorCode.MISSING_FIELD,
                field,
                'is required.',
            );
        }
        return undefined;
    }
    if (!isRawObject(value)) {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be an object.',
        );
    }
    return value;
}

/**
 * Reads a non-empty string field and trims it.
 *
 * @param value - Raw value, or `undefined` when absent
 * @param field - Dotted field path for error messages
 * @param defaultValue - Used when the value is absent
 */
export function readString(
    value: unknown,
    field: string,
    defaultValue?: string,
): string {
    const actual = value === undefined ? defaultValue : value;

    if (actual === undefined || actual === null) {
        throw createFieldError(
            FlashlessErrorCode.MISSING_FIELD,
            field,
            'must be a non-empty string.',
        );
    }
    if (typeof actual !== 'string') {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be a non-empty string.',
        );
    }
    if (actual.trim() === '') {
        throw createFieldError(
            FlashlessErrorCode.MISSING_FIELD,
            field,
            'must be a non-empty string.',
        );
    }
    return actual.trim();
}

export function readBoolean(
    value: unknown,
    field: string,
    defaultValue: boolean,
): boolean {
    if (value === undefined) {
        return defaultValue;
    }
    if (typeof value !== 'boolean') {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be a boolean.',
        );
    }
    return value;
}

/**
 * Reads an integer field with an optional lower bound.
 *
 * @param value - Raw value, or `undefined` when absent
 * @param field - Dotted field path for error messages
 * @param defaultValue - Used when the value is absent
 * @param minimum - Smallest accepted value
 */
export function readInteger(
    value: unknown,
    field: string,
    defaultValue: number,
    minimum?: number,
): number {
    if (value === undefined) {
        return defaultValue;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be an integer.',
        );
    }
    if (minimum !== undefined && value < minimum) {
        throw createFieldError(
            FlashlessErrorCode.OUT_OF_RANGE,
            field,
            `must be >= ${minimum}.`,
        );
    }
    return value;
}

export function readArray(value: unknown, field: string): unknown[] {
    if (!Array.isArray(value)) {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be an array.',
        );
    }
    return value;
}

/**
 * Reads an array of non-empty strings. Entries are returned untrimmed.
 */
export function readStringList(value: unknown, field: string): string[] {
    return readArray(value, field).map((item, index) => {
        if (typeof item !== 'string' || item.trim() === '') {
            throw createFieldError(
                typeof item === 'string'
                    ? FlashlessErrorCode.MISSING_FIELD
                    : FlashlessErrorCode.INVALID_TYPE,
                `${field}[${index}]`,
                'must be a non-empty string.',
            );
        }
        return item;
    });
}

/**
 * Reads a header map. Numbers and booleans are stringified.
 */
export function readHeaders(
    value: unknown,
    field: string,
): Record<string, string> {
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRawObject(value)) {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be an object.',
        );
    }

    const headers: Record<string, string> = {};
    for (const [name, headerValue] of Object.entries(value)) {
        if (
            typeof headerValue !== 'string' &&
            typeof headerValue !== 'number' &&
            typeof headerValue !== 'boolean'
        ) {
            throw createFieldError(
                FlashlessErrorCode.INVALID_TYPE,
                `${field}.${name}`,
                'must be a string.',
            );
        }
        headers[name] = String(headerValue);
    }
    return headers;
}
