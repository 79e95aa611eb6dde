/**
 * Flashless Error Handling
 *
 * A single error class for configuration and validation failures, plus
 * factories for the shapes that recur across the loader, the path guard and
 * the server.
 */

import { FlashlessErrorCode, type ValidationResult } from '@flashless/types';

// Re-export for convenience
export { FlashlessErrorCode };

// ============================================================================
// ERROR CLASS
// ============================================================================

/**
 * Error raised for manifest, path and server setup problems.
 *
 * @example
 * ```typescript
 * try {
 *     await loadManifest(path, projectDir);
 * } catch (error) {
 *     if (error instanceof FlashlessError && error.field) {
 *         console.error(`Fix ${error.field}: ${error.message}`);
 *     }
 * }
 * ```
 */
export class FlashlessError extends Error {
    public readonly name = 'FlashlessError';

    /**
     * @param code - The structured error code for programmatic handling
     * @param message - Human-readable error message
     * @param field - Dotted manifest field path the error refers to, if any
     * @param cause - Optional underlying error
     */
    constructor(
        public readonly code: FlashlessErrorCode,
        message: string,
        public readonly field?: string,
        public readonly cause?: Error,
    ) {
        super(message, cause ? { cause } : undefined);
        Error.captureStackTrace?.(this, FlashlessError);
    }
}

/**
 * Type guard for {@link FlashlessError}.
 */
export function isFlashlessError(error: unknown): error is FlashlessError {
    return error instanceof FlashlessError;
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create an error for a manifest field that failed validation.
 *
 * The message always reads `Manifest field '<field>' <problem>`.
 *
 * @param code - The validation error code
 * @param field - Dotted field path, e.g. `ui.cachePolicy.maxAgeSeconds`
 * @param problem - What is wrong, e.g. `must be >= 0.`
 */
export function createFieldError(
    code: FlashlessErrorCode,
    field: string,
    problem: string,
): FlashlessError {
    return new FlashlessError(
        code,
        `Manifest field '${field}' ${problem}`,
        field,
    );
}

/**
 * Create an error for a relative path that resolves outside its root.
 *
 * @param relative - The offending relative path, as supplied
 */
export function createPathEscapeError(relative: string): FlashlessError {
    return new FlashlessError(
        FlashlessErrorCode.PATH_ESCAPE,
        `Path escapes root directory: ${relative}`,
    );
}

/**
 * Create an error for a listening socket that could not be bound.
 *
 * @param host - Requested host
 * @param port - Requested port
 * @param cause - The socket error
 */
export function createBindError(
    host: string,
    port: number,
    cause: Error,
): FlashlessError {
    return new FlashlessError(
        FlashlessErrorCode.BIND_FAILED,
        `Failed to bind preview server on ${host}:${port}: ${cause.message}`,
        undefined,
        cause,
    );
}

/**
 * Create the error raised when strict mode meets parity misses.
 *
 * Lists all three sets so one run shows everything to fix.
 */
export function createStrictValidationError(
    validation: ValidationResult,
): FlashlessError {
    return new FlashlessError(
        FlashlessErrorCode.STRICT_VALIDATION_FAILED,
        'Strict validation failed: ' +
            `missingRequiredFiles=${JSON.stringify(validation.missingRequiredFiles)} ` +
            `missingFixtures=${JSON.stringify(validation.missingFixtureFiles)} ` +
            `unresolvedRoutes=${JSON.stringify(validation.unresolvedRoutes)}`,
    );
}
