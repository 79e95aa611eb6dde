import { describe, it, expect } from 'vitest';
import {
    FlashlessError,
    FlashlessErrorCode,
    createBindError,
    createFieldError,
    createPathEscapeError,
    createStrictValidationError,
    createValidationResult,
    isFlashlessError,
} from '../src/index.js';

describe('FlashlessError', () => {
    it('should carry code, field and cause', () => {
        const cause = new Error('EADDRINUSE');
        const error = new FlashlessError(
            FlashlessErrorCode.BIND_FAILED,
            'bind failed',
            'server.port',
            cause,
        );

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('FlashlessError');
        expect(error.code).toBe(FlashlessErrorCode.BIND_FAILED);
        expect(error.field).toBe('server.port');
        expect(error.cause).toBe(cause);
        expect(isFlashlessError(error)).toBe(true);
        expect(isFlashlessError(cause)).toBe(false);
    });
});

describe('error factories', () => {
    it('should name the field in field errors', () => {
        const error = createFieldError(
            FlashlessErrorCode.OUT_OF_RANGE,
            'ui.cachePolicy.maxAgeSeconds',
            'must be >= 0.',
        );

        expect(error.message).toBe("Manifest field 'ui.cachePolicy.maxAgeSeconds' must be >= 0.");
        expect(error.field).toBe('ui.cachePolicy.maxAgeSeconds');
    });

    it('should report the escaping path', () => {
        const error = createPathEscapeError('../secret.txt');

        expect(error.code).toBe(FlashlessErrorCode.PATH_ESCAPE);
        expect(error.message).toBe('Path escapes root directory: ../secret.txt');
    });

    it('should wrap bind failures', () => {
        const cause = new Error('listen EADDRINUSE');
        const error = createBindError('127.0.0.1', 8787, cause);

        expect(error.code).toBe(FlashlessErrorCode.BIND_FAILED);
        expect(error.message).toBe(
            'Failed to bind preview server on 127.0.0.1:8787: listen EADDRINUSE',
        );
        expect(error.cause).toBe(cause);
    });

    it('should list every set in strict validation errors', () => {
        const validation = createValidationResult(['b.js', 'a.js'], [], ['/settings']);
        const error = createStrictValidationError(validation);

        expect(error.code).toBe(FlashlessErrorCode.STRICT_VALIDATION_FAILED);
        expect(error.message).toBe(
            'Strict validation failed: missingRequiredFiles=["a.js","b.js"] ' +
                'missingFixtures=[] unresolvedRoutes=["/settings"]',
        );
    });
});
