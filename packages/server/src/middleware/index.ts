/**
 * Hono middleware for the preview server.
 *
 * @packageDocumentation
 */

export {
    loggerMiddleware,
    shouldLogRequest,
    formatRequestLine,
    type LoggerOptions,
    type PreviewEnv,
} from './logger.js';
